import {
  loadConfig,
  saveConfig,
  setConfigValue,
  CONFIG_KEYS,
  CONFIG_PATH,
  type PriceSyncConfig,
} from "../core/config.js";

const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export function describeConfig(cfg: PriceSyncConfig): string[] {
  return [
    `  Input dir:        ${cfg.inputDir}`,
    `  Output file:      ${cfg.outputFile}`,
    `  Sheet name:       ${cfg.sheetName}`,
    `  Retention days:   ${cfg.retentionDays}`,
    `  Code rule:        ${cfg.codeRule}`,
    `  Input extensions: ${cfg.inputExtensions.join(", ")}`,
    `  Stray extensions: ${cfg.strayExtensions.join(", ") || "(none)"}`,
  ];
}

export async function configShow(): Promise<void> {
  const cfg = loadConfig();

  console.log(`${BOLD}pricesync configuration${RESET}`);
  console.log(`${DIM}${CONFIG_PATH}${RESET}\n`);
  for (const line of describeConfig(cfg)) console.log(line);
}

export async function configSet(key: string, value: string): Promise<void> {
  let next: PriceSyncConfig;
  try {
    next = setConfigValue(loadConfig(), key, value);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
  saveConfig(next);
  console.log(`${key} set to: ${value}`);
  console.log(`${DIM}Valid keys: ${Object.keys(CONFIG_KEYS).join(", ")}${RESET}`);
}
