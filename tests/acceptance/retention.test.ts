import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import {
  buildDeletionPlan,
  executePlan,
  planCleanup,
  planRetention,
  planStraySweep,
  retentionCutoff,
} from "../../src/core/retention.js";
import type { DeletionOutcome } from "../../src/core/types.js";
import { NOW, daysBefore, makeTempDir, removeDir, sourceFile } from "./helpers.js";

describe("Retention policy", () => {
  it("cuts off exactly the horizon before now", () => {
    expect(retentionCutoff(NOW, 210)).toBe(daysBefore(210).getTime());
  });

  it("expires extracted files older than the horizon, useful or not", () => {
    const files = [
      sourceFile("yeni.xlsx", { timestamp: daysBefore(10).getTime(), contributedNewCodes: 5 }),
      sourceFile("eski.xlsx", { timestamp: daysBefore(300).getTime(), contributedNewCodes: 5 }),
      sourceFile("sinirda.xlsx", { timestamp: daysBefore(210).getTime(), contributedNewCodes: 5 }),
      sourceFile("bozuk.xlsx", { timestamp: daysBefore(400).getTime(), status: "failed" }),
    ];
    expect(planRetention(files, NOW, 210)).toEqual([{ path: "/prices/eski.xlsx", name: "eski.xlsx", reason: "expired" }]);
  });
});

describe("Cleanup policy", () => {
  it("plans extracted files that added no new codes", () => {
    const files = [
      sourceFile("faydali.xlsx", { contributedNewCodes: 3 }),
      sourceFile("gereksiz.xlsx", { contributedNewCodes: 0 }),
      sourceFile("bozuk.xlsx", { status: "failed" }),
    ];
    expect(planCleanup(files, [])).toEqual([{ path: "/prices/gereksiz.xlsx", name: "gereksiz.xlsx", reason: "useless" }]);
  });

  it("skips files retention already planned", () => {
    const files = [sourceFile("eski.xlsx", { timestamp: daysBefore(300).getTime() })];
    const expired = planRetention(files, NOW, 210);
    expect(planCleanup(files, expired)).toEqual([]);
  });
});

describe("Deletion plan on disk", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir("retention");
    writeFileSync(join(dir, "fatura.PDF"), "%PDF-1.4");
    writeFileSync(join(dir, "notlar.txt"), "keep me");
    writeFileSync(join(dir, "gereksiz.xlsx"), "x");
  });

  afterEach(() => removeDir(dir));

  it("sweeps stray attachments by extension", () => {
    expect(planStraySweep(dir, [".pdf"], ["Fiyat_Listesi.xlsx"])).toEqual([
      { path: join(dir, "fatura.PDF"), name: "fatura.PDF", reason: "stray" },
    ]);
    expect(planStraySweep(dir, [], ["Fiyat_Listesi.xlsx"])).toEqual([]);
  });

  it("never sweeps a file the run writes", () => {
    expect(planStraySweep(dir, [".pdf"], ["Fiyat_Listesi.xlsx", "fatura.pdf"])).toEqual([]);
    const plan = buildDeletionPlan({
      dir,
      files: [],
      now: NOW,
      retentionDays: 210,
      outputFile: "Fiyat_Listesi.xlsx",
      otherOutputs: ["FATURA.pdf"],
    });
    expect(plan).toEqual([]);
  });

  it("orders expired, then useless, then strays", () => {
    const files = [
      sourceFile("gereksiz.xlsx", { path: join(dir, "gereksiz.xlsx") }),
      sourceFile("eski.xlsx", { path: join(dir, "eski.xlsx"), timestamp: daysBefore(250).getTime(), contributedNewCodes: 2 }),
    ];
    const plan = buildDeletionPlan({ dir, files, now: NOW, retentionDays: 210, outputFile: "Fiyat_Listesi.xlsx" });
    expect(plan.map((d) => `${d.reason}:${d.name}`)).toEqual(["expired:eski.xlsx", "useless:gereksiz.xlsx", "stray:fatura.PDF"]);
  });

  it("dry run reports the plan and deletes nothing", async () => {
    const plan = planStraySweep(dir, [".pdf"], ["Fiyat_Listesi.xlsx"]);
    const seen: DeletionOutcome[] = [];
    const outcomes = await executePlan(plan, { dryRun: true, onOutcome: (o) => seen.push(o) });

    expect(outcomes).toEqual([{ path: join(dir, "fatura.PDF"), name: "fatura.PDF", reason: "stray", status: "planned" }]);
    expect(seen).toEqual(outcomes);
    expect(existsSync(join(dir, "fatura.PDF"))).toBe(true);
  });

  it("deletes planned files and reports a failure without throwing", async () => {
    const outcomes = await executePlan([
      { path: join(dir, "yok.xlsx"), name: "yok.xlsx", reason: "useless" },
      { path: join(dir, "gereksiz.xlsx"), name: "gereksiz.xlsx", reason: "useless" },
    ]);

    expect(outcomes[0].status).toBe("failed");
    expect(outcomes[0].error).toContain("ENOENT");
    expect(outcomes[1]).toEqual({ path: join(dir, "gereksiz.xlsx"), name: "gereksiz.xlsx", reason: "useless", status: "deleted" });
    expect(existsSync(join(dir, "gereksiz.xlsx"))).toBe(false);
    expect(existsSync(join(dir, "notlar.txt"))).toBe(true);
  });
});
