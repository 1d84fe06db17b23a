import { existsSync, statSync } from "node:fs";
import { join, resolve } from "node:path";
import { randomUUID } from "node:crypto";
import { loadConfig, parseCodeRule, parseRetentionDays, type PriceSyncConfig } from "../core/config.js";
import { runPipeline, type PipelineEvent, type PipelineOptions, type RunResult } from "../core/pipeline.js";
import { RunLogger } from "../core/run-logger.js";
import { CsvSink } from "../sinks/csv.js";
import type { TableSink } from "../sinks/types.js";
import { WorkbookSink } from "../sinks/workbook.js";

const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export interface RunCommandOptions {
  dryRun?: boolean;
  publish?: boolean;
  retentionDays?: string;
  output?: string;
  csv?: string;
  codeRule?: string;
}

/** Merge CLI flags over the saved config. Throws on invalid flag values. */
export function resolveRunOptions(
  dirArg: string | undefined,
  opts: RunCommandOptions,
  config: PriceSyncConfig,
): PipelineOptions {
  const dir = resolve(dirArg ?? config.inputDir);
  const outputFile = opts.output ?? config.outputFile;

  const csvPath = opts.csv ? resolve(opts.csv) : undefined;
  const sinks: TableSink[] = [];
  if (opts.publish !== false) {
    sinks.push(new WorkbookSink(join(dir, outputFile)));
    if (csvPath) sinks.push(new CsvSink(csvPath));
  }

  return {
    dir,
    outputFile,
    sheetName: config.sheetName,
    retentionDays: opts.retentionDays !== undefined ? parseRetentionDays(opts.retentionDays) : config.retentionDays,
    codeRule: opts.codeRule !== undefined ? parseCodeRule(opts.codeRule) : config.codeRule,
    inputExtensions: config.inputExtensions,
    strayExtensions: config.strayExtensions,
    exclude: csvPath ? [csvPath] : [],
    dryRun: opts.dryRun ?? false,
    sinks,
  };
}

/** One console line per event worth showing; null for the rest. */
export function formatEvent(event: PipelineEvent, dryRun = false): string | null {
  switch (event.type) {
    case "inventory":
      return `Scanning: ${event.files} file${event.files !== 1 ? "s" : ""} found in ${event.dir}`;
    case "file_extracted": {
      const via = event.decodedWith ? ` ${DIM}(${event.decodedWith})${RESET}` : "";
      return `  ✅ ${event.file.padEnd(30)} ${event.records} record${event.records !== 1 ? "s" : ""}${via}`;
    }
    case "file_failed":
      return `  ❌ ${event.file} — ${event.error}`;
    case "sheet_error":
      return `  ⚠️  ${event.file} / ${event.sheet} — ${event.error}`;
    case "file_skipped":
      return `  ⚠️  Skipped ${event.file} — ${event.reason}`;
    case "timestamp_fallback":
      return `  ${DIM}${event.file}: using file time (${event.reason})${RESET}`;
    case "file_merged":
      return event.useless
        ? `  ➖ ${event.file} — no new codes`
        : `  ➕ ${event.file} — ${event.newCodes} new code${event.newCodes !== 1 ? "s" : ""}`;
    case "deletion":
      if (event.status === "failed") return `  ❌ Could not delete ${event.file} — ${event.error ?? "unknown error"}`;
      return dryRun || event.status === "planned"
        ? `  📝 Would delete (${event.reason}): ${event.file}`
        : `  🗑️  Deleted (${event.reason}): ${event.file}`;
    case "published":
      return `📊 Published ${event.rows} row${event.rows !== 1 ? "s" : ""} to ${event.sink}`;
    case "publish_failed":
      return `⚠️  ${event.error}`;
    default:
      return null;
  }
}

export function formatSummary(result: RunResult): string {
  const failed = result.files.filter((f) => f.status === "failed").length;
  const parts = [`Done: ${result.table.length} unique code${result.table.length !== 1 ? "s" : ""} from ${result.files.length} file${result.files.length !== 1 ? "s" : ""}`];
  if (failed > 0) parts.push(`(${failed} unreadable)`);
  const deleted = result.deletions.filter((d) => d.status === "deleted").length;
  const planned = result.deletions.filter((d) => d.status === "planned").length;
  if (deleted > 0) parts.push(`(${deleted} deleted)`);
  if (planned > 0) parts.push(`(${planned} would be deleted)`);
  return parts.join(" ");
}

export async function run(dirArg: string | undefined, opts: RunCommandOptions): Promise<void> {
  const config = loadConfig();

  let options: PipelineOptions;
  try {
    options = resolveRunOptions(dirArg, opts, config);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }

  if (!existsSync(options.dir) || !statSync(options.dir).isDirectory()) {
    console.error(`Error: Directory not found: ${options.dir}`);
    process.exit(1);
  }

  const runId = randomUUID().slice(0, 8);
  const logger = new RunLogger(runId);
  logger.logStart(runId, options.dir, options.dryRun ?? false);

  let result: RunResult;
  try {
    result = await runPipeline({
      ...options,
      onEvent: (event) => {
        logger.logEvent(event);
        const line = formatEvent(event, options.dryRun);
        if (line) console.log(line);
      },
    });
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    console.error(`${DIM}Log: ${logger.path}${RESET}`);
    process.exit(1);
  }
  logger.logEnd(result);

  if (result.state === "failed") {
    console.error(`Error: ${result.error?.message ?? "run failed"}`);
    process.exit(1);
  }

  console.log(formatSummary(result));
  if (result.publish.status === "failed") {
    console.warn("⚠️  Prices were extracted but publishing failed. Fix the sink and run again.");
  }
  console.log(`${DIM}Log: ${logger.path}${RESET}`);
}
