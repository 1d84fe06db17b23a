import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { CODE_RULES, type CodeRule } from "../extract/code.js";
import { DEFAULT_INPUT_EXTENSIONS } from "./inventory.js";
import { DEFAULT_OUTPUT_FILE, DEFAULT_SHEET_NAME } from "./pipeline.js";
import { DEFAULT_RETENTION_DAYS, DEFAULT_STRAY_EXTENSIONS } from "./retention.js";

const HOME = process.env.HOME ?? process.env.USERPROFILE ?? "~";
export const PRICESYNC_DIR = join(HOME, ".pricesync");
const CONFIG_PATH = join(PRICESYNC_DIR, "config.json");

export interface PriceSyncConfig {
  inputDir: string;
  outputFile: string;
  sheetName: string;
  retentionDays: number;
  codeRule: CodeRule;
  inputExtensions: string[];
  strayExtensions: string[];
}

export const DEFAULT_CONFIG: PriceSyncConfig = {
  inputDir: ".",
  outputFile: DEFAULT_OUTPUT_FILE,
  sheetName: DEFAULT_SHEET_NAME,
  retentionDays: DEFAULT_RETENTION_DAYS,
  codeRule: "fixed",
  inputExtensions: [...DEFAULT_INPUT_EXTENSIONS],
  strayExtensions: [...DEFAULT_STRAY_EXTENSIONS],
};

/** CLI key → config field */
export const CONFIG_KEYS = {
  "input-dir": "inputDir",
  "output-file": "outputFile",
  "sheet-name": "sheetName",
  "retention-days": "retentionDays",
  "code-rule": "codeRule",
  "input-extensions": "inputExtensions",
  "stray-extensions": "strayExtensions",
} as const satisfies Record<string, keyof PriceSyncConfig>;

export type ConfigKey = keyof typeof CONFIG_KEYS;

// ── Parsing ──

export function parseRetentionDays(value: string): number {
  const days = Number(value);
  if (!Number.isInteger(days) || days <= 0) {
    throw new Error(`Invalid retention days: "${value}" (must be a positive integer)`);
  }
  return days;
}

export function parseCodeRule(value: string): CodeRule {
  const rule = CODE_RULES.find((r) => r === value);
  if (!rule) {
    throw new Error(`Invalid code rule: "${value}". Valid: ${CODE_RULES.join(", ")}`);
  }
  return rule;
}

/** ".XLSX, csv" → [".xlsx", ".csv"] */
export function parseExtensions(value: string): string[] {
  return value
    .split(",")
    .map((e) => e.trim().toLowerCase())
    .filter(Boolean)
    .map((e) => (e.startsWith(".") ? e : `.${e}`));
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

/** Keep the known, well-typed fields of a parsed config file; defaults fill the rest. */
export function normalizeConfig(raw: unknown): PriceSyncConfig {
  const cfg: PriceSyncConfig = { ...DEFAULT_CONFIG };
  if (typeof raw !== "object" || raw === null) return cfg;
  const r: Record<string, unknown> = { ...raw };

  if (typeof r.inputDir === "string") cfg.inputDir = r.inputDir;
  if (typeof r.outputFile === "string") cfg.outputFile = r.outputFile;
  if (typeof r.sheetName === "string") cfg.sheetName = r.sheetName;
  if (typeof r.retentionDays === "number" && Number.isInteger(r.retentionDays) && r.retentionDays > 0) {
    cfg.retentionDays = r.retentionDays;
  }
  const rule = CODE_RULES.find((c) => c === r.codeRule);
  if (rule) cfg.codeRule = rule;
  if (isStringArray(r.inputExtensions)) cfg.inputExtensions = r.inputExtensions;
  if (isStringArray(r.strayExtensions)) cfg.strayExtensions = r.strayExtensions;
  return cfg;
}

// ── Disk ──

/** Read config from disk. Returns defaults if the file doesn't exist or is unreadable. */
export function loadConfig(path: string = CONFIG_PATH): PriceSyncConfig {
  if (!existsSync(path)) {
    return { ...DEFAULT_CONFIG };
  }
  try {
    return normalizeConfig(JSON.parse(readFileSync(path, "utf-8")));
  } catch {
    return { ...DEFAULT_CONFIG };
  }
}

/** Write config to disk. Creates parent dirs if needed. */
export function saveConfig(config: PriceSyncConfig, path: string = CONFIG_PATH): void {
  const dir = dirname(path);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  writeFileSync(path, JSON.stringify(config, null, 2) + "\n", "utf-8");
}

export function isConfigKey(key: string): key is ConfigKey {
  return Object.hasOwn(CONFIG_KEYS, key);
}

/** Return a copy of `config` with one CLI key set. Throws with the valid values on bad input. */
export function setConfigValue(config: PriceSyncConfig, key: string, value: string): PriceSyncConfig {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: "${key}"\nValid keys: ${Object.keys(CONFIG_KEYS).join(", ")}`);
  }
  const next = { ...config };
  switch (key) {
    case "input-dir":
      next.inputDir = value;
      break;
    case "output-file":
      next.outputFile = value;
      break;
    case "sheet-name":
      next.sheetName = value;
      break;
    case "retention-days":
      next.retentionDays = parseRetentionDays(value);
      break;
    case "code-rule":
      next.codeRule = parseCodeRule(value);
      break;
    case "input-extensions":
      next.inputExtensions = parseExtensions(value);
      break;
    case "stray-extensions":
      next.strayExtensions = parseExtensions(value);
      break;
  }
  return next;
}

export { CONFIG_PATH };
