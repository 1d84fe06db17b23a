import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import {
  DEFAULT_CONFIG,
  loadConfig,
  normalizeConfig,
  parseExtensions,
  saveConfig,
  setConfigValue,
} from "../../src/core/config.js";
import { makeTempDir, removeDir } from "./helpers.js";

describe("Config", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir("config");
  });

  afterEach(() => removeDir(dir));

  it("uses the defaults when no config file exists", () => {
    expect(loadConfig(join(dir, "config.json"))).toEqual({
      inputDir: ".",
      outputFile: "Fiyat_Listesi.xlsx",
      sheetName: "Fiyat",
      retentionDays: 210,
      codeRule: "fixed",
      inputExtensions: [".xlsx", ".csv"],
      strayExtensions: [".pdf"],
    });
  });

  it("falls back to the defaults for a malformed file", () => {
    const path = join(dir, "config.json");
    writeFileSync(path, "{ not json");
    expect(loadConfig(path)).toEqual(DEFAULT_CONFIG);
  });

  it("round-trips through disk, creating the parent directory", () => {
    const path = join(dir, "nested", "config.json");
    const cfg = setConfigValue(DEFAULT_CONFIG, "retention-days", "90");
    saveConfig(cfg, path);

    expect(loadConfig(path).retentionDays).toBe(90);
    expect(readFileSync(path, "utf-8").endsWith("}\n")).toBe(true);
  });

  it("ignores unknown and ill-typed fields", () => {
    expect(normalizeConfig({ retentionDays: -4, codeRule: "loose", sheetName: "Liste", extra: true })).toEqual({
      ...DEFAULT_CONFIG,
      sheetName: "Liste",
    });
    expect(normalizeConfig(null)).toEqual(DEFAULT_CONFIG);
  });

  it("sets values by CLI key without touching the original", () => {
    const next = setConfigValue(DEFAULT_CONFIG, "code-rule", "prefix");
    expect(next.codeRule).toBe("prefix");
    expect(DEFAULT_CONFIG.codeRule).toBe("fixed");
    expect(setConfigValue(DEFAULT_CONFIG, "stray-extensions", "").strayExtensions).toEqual([]);
  });

  it("rejects unknown keys and bad values", () => {
    expect(() => setConfigValue(DEFAULT_CONFIG, "colour", "red")).toThrow('Unknown config key: "colour"');
    expect(() => setConfigValue(DEFAULT_CONFIG, "retention-days", "1.5")).toThrow(
      'Invalid retention days: "1.5" (must be a positive integer)',
    );
    expect(() => setConfigValue(DEFAULT_CONFIG, "code-rule", "loose")).toThrow(
      'Invalid code rule: "loose". Valid: fixed, prefix',
    );
  });

  it("normalizes extension lists", () => {
    expect(parseExtensions(".XLSX, csv,, txt ")).toEqual([".xlsx", ".csv", ".txt"]);
  });
});
