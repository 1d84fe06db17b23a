import { appendFileSync, mkdirSync, existsSync, readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { PRICESYNC_DIR } from "./config.js";
import type { PipelineEvent, RunResult } from "./pipeline.js";

export const RUNS_DIR = join(PRICESYNC_DIR, "runs");

export interface RunSummary {
  state: RunResult["state"];
  publish: RunResult["publish"]["status"];
  files: number;
  failedFiles: number;
  records: number;
  deleted: number;
  planned: number;
  error?: string;
}

export type RunLogEntry =
  | { type: "run_start"; timestamp: string; runId: string; dir: string; dryRun: boolean }
  | { type: "event"; timestamp: string; event: PipelineEvent }
  | { type: "run_end"; timestamp: string; durationMs: number; summary: RunSummary };

export function summarize(result: RunResult): RunSummary {
  return {
    state: result.state,
    publish: result.publish.status,
    files: result.files.length,
    failedFiles: result.files.filter((f) => f.status === "failed").length,
    records: result.table.length,
    deleted: result.deletions.filter((d) => d.status === "deleted").length,
    planned: result.deletions.filter((d) => d.status === "planned").length,
    error: result.error?.message,
  };
}

/**
 * RunLogger — appends one JSON line per pipeline event to a run file.
 * Writes are synchronous and unbuffered.
 */
export class RunLogger {
  private filepath: string;
  private readonly started = Date.now();

  constructor(runId: string, runsDir?: string) {
    const dir = runsDir ?? RUNS_DIR;
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });

    const ts = new Date().toISOString().replace(/[:.]/g, "-");
    this.filepath = join(dir, `${ts}_${runId}.jsonl`);
  }

  get path(): string {
    return this.filepath;
  }

  private append(entry: RunLogEntry): void {
    appendFileSync(this.filepath, JSON.stringify(entry) + "\n", "utf-8");
  }

  logStart(runId: string, dir: string, dryRun: boolean): void {
    this.append({ type: "run_start", timestamp: new Date().toISOString(), runId, dir, dryRun });
  }

  logEvent(event: PipelineEvent): void {
    this.append({ type: "event", timestamp: new Date().toISOString(), event });
  }

  logEnd(result: RunResult): void {
    this.append({
      type: "run_end",
      timestamp: new Date().toISOString(),
      durationMs: Date.now() - this.started,
      summary: summarize(result),
    });
  }
}

// ── Reading ──

export interface LoggedRun {
  file: string;
  start?: Extract<RunLogEntry, { type: "run_start" }>;
  end?: Extract<RunLogEntry, { type: "run_end" }>;
  deletions: Array<Extract<PipelineEvent, { type: "deletion" }>>;
}

function isRunLogEntry(value: unknown): value is RunLogEntry {
  if (typeof value !== "object" || value === null || !("type" in value)) return false;
  if (value.type === "event") {
    return "event" in value && typeof value.event === "object" && value.event !== null && "type" in value.event;
  }
  return value.type === "run_start" || value.type === "run_end";
}

/** Parse a run log; malformed lines are skipped. */
export function readRunLog(filepath: string): LoggedRun {
  const run: LoggedRun = { file: filepath, deletions: [] };
  for (const line of readFileSync(filepath, "utf-8").split("\n")) {
    if (!line.trim()) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      continue; // partial line from an interrupted run
    }
    if (!isRunLogEntry(parsed)) continue;
    if (parsed.type === "run_start") run.start = parsed;
    else if (parsed.type === "run_end") run.end = parsed;
    else if (parsed.event.type === "deletion") run.deletions.push(parsed.event);
  }
  return run;
}

/** Most recent run log (file names start with the ISO timestamp). */
export function latestRun(runsDir: string = RUNS_DIR): LoggedRun | null {
  if (!existsSync(runsDir)) return null;
  const files = readdirSync(runsDir).filter((f) => f.endsWith(".jsonl")).sort();
  const last = files.at(-1);
  return last ? readRunLog(join(runsDir, last)) : null;
}
