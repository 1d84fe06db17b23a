import { describe, it, expect } from "vitest";
import { ReconciliationStore } from "../../src/core/reconcile.js";
import { isUseless, type PriceRecord } from "../../src/core/types.js";
import { sourceFile } from "./helpers.js";

function record(code: string, toptan: number, source: string, overrides: Partial<PriceRecord> = {}): PriceRecord {
  return { code, name: `Ürün ${code}`, toptan, perakende: toptan + 10, liste: toptan + 20, source, sheet: "Sayfa1", row: 1, ...overrides };
}

describe("Reconciliation store", () => {
  it("keeps the first record seen for a code and counts new codes per file", () => {
    const store = new ReconciliationStore();
    const newer = sourceFile("ekim.xlsx");
    const older = sourceFile("eylul.xlsx");

    const codes = Array.from({ length: 10 }, (_, i) => String(3000000000 + i));
    expect(store.merge(codes.map((c) => record(c, 200, newer.name)), newer)).toBe(10);
    expect(store.merge(codes.slice(0, 4).map((c) => record(c, 100, older.name)), older)).toBe(0);

    expect(newer.contributedNewCodes).toBe(10);
    expect(older.contributedNewCodes).toBe(0);
    expect(isUseless(newer)).toBe(false);
    expect(isUseless(older)).toBe(true);
    expect(store.size).toBe(10);
    expect(store.get("3000000000")?.toptan).toBe(200);
  });

  it("never patches a stored record from an older file", () => {
    const store = new ReconciliationStore();
    const newer = sourceFile("yeni.xlsx");
    const older = sourceFile("eski.xlsx");
    store.merge([record("3001234567", 150, newer.name, { name: "" })], newer);
    store.merge([record("3001234567", 120, older.name, { name: "Vida M8" })], older);

    expect(store.get("3001234567")).toEqual(record("3001234567", 150, "yeni.xlsx", { name: "" }));
  });

  it("keeps the first duplicate inside a single file", () => {
    const store = new ReconciliationStore();
    const file = sourceFile("liste.xlsx");
    const added = store.merge([record("3001234567", 150, file.name, { row: 2 }), record("3001234567", 900, file.name, { row: 7 })], file);

    expect(added).toBe(1);
    expect(store.get("3001234567")?.row).toBe(2);
  });

  it("lists records in insertion order", () => {
    const store = new ReconciliationStore();
    const a = sourceFile("a.xlsx");
    const b = sourceFile("b.xlsx");
    store.merge([record("3000000002", 150, a.name), record("3000000001", 150, a.name)], a);
    store.merge([record("3000000003", 150, b.name), record("3000000001", 150, b.name)], b);

    expect(store.table().map((r) => r.code)).toEqual(["3000000002", "3000000001", "3000000003"]);
    expect(b.contributedNewCodes).toBe(1);
  });

  it("a failed file is never useless", () => {
    expect(isUseless(sourceFile("bozuk.xlsx", { status: "failed" }))).toBe(false);
  });
});
