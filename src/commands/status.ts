import { loadConfig } from "../core/config.js";
import { latestRun, type LoggedRun } from "../core/run-logger.js";

const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export function formatLastRun(run: LoggedRun): string[] {
  const lines: string[] = [];
  const when = run.start?.timestamp ?? "unknown time";
  const dir = run.start?.dir ?? "?";

  if (!run.end) {
    lines.push(`Last run: ${when} in ${dir} — did not finish`);
    return lines;
  }

  const s = run.end.summary;
  const mode = run.start?.dryRun ? " (dry run)" : "";
  lines.push(`Last run: ${when} in ${dir}${mode}`);
  if (s.state === "failed") {
    lines.push(`  Failed: ${s.error ?? "no usable input"}`);
    return lines;
  }
  lines.push(`  ${s.records} codes from ${s.files} files (${s.failedFiles} unreadable)`);
  lines.push(`  Publish: ${s.publish}`);
  for (const d of run.deletions) {
    const verb = d.status === "deleted" ? "deleted" : d.status === "planned" ? "would delete" : "delete failed";
    lines.push(`  ${DIM}${verb} (${d.reason}): ${d.file}${RESET}`);
  }
  return lines;
}

export async function status(): Promise<void> {
  const config = loadConfig();

  console.log(`${BOLD}Input:${RESET}  ${config.inputDir}`);
  console.log(`${BOLD}Output:${RESET} ${config.outputFile} (sheet "${config.sheetName}")`);
  console.log(`${BOLD}Retention:${RESET} ${config.retentionDays} days`);
  console.log();

  const run = latestRun();
  if (!run) {
    console.log("No runs yet");
    console.log(`  Run: pricesync run <folder>`);
    return;
  }
  for (const line of formatLastRun(run)) console.log(line);
}
