/**
 * Which input files a run removes.
 *
 * Both policies only plan; executePlan performs the deletions afterwards, so
 * nothing is removed while files are still being extracted. Files that failed
 * extraction are never planned.
 */

import { unlink } from "node:fs/promises";
import { join } from "node:path";
import { messageOf } from "./errors.js";
import { listFiles } from "./inventory.js";
import { isUseless, type DeletionOutcome, type PlannedDeletion, type SourceFile } from "./types.js";

export const DEFAULT_RETENTION_DAYS = 210; // ~7 months
export const DEFAULT_STRAY_EXTENSIONS = [".pdf"];

const DAY_MS = 24 * 60 * 60 * 1000;

export function retentionCutoff(now: Date, horizonDays: number): number {
  return now.getTime() - horizonDays * DAY_MS;
}

/** Extracted files older than the horizon, useful or not. */
export function planRetention(files: readonly SourceFile[], now: Date, horizonDays: number): PlannedDeletion[] {
  const cutoff = retentionCutoff(now, horizonDays);
  return files
    .filter((f) => f.status === "extracted" && f.timestamp < cutoff)
    .map((f) => ({ path: f.path, name: f.name, reason: "expired" as const }));
}

/** Files that added no new code, skipping those already planned. */
export function planCleanup(files: readonly SourceFile[], alreadyPlanned: readonly PlannedDeletion[]): PlannedDeletion[] {
  const planned = new Set(alreadyPlanned.map((d) => d.path));
  return files
    .filter((f) => isUseless(f) && !planned.has(f.path))
    .map((f) => ({ path: f.path, name: f.name, reason: "useless" as const }));
}

/** Non-input attachments (PDFs…) left in the price directory. */
export function planStraySweep(dir: string, extensions: readonly string[], outputs: readonly string[]): PlannedDeletion[] {
  if (extensions.length === 0) return [];
  return listFiles(dir, extensions, outputs).map((name) => ({
    path: join(dir, name),
    name,
    reason: "stray" as const,
  }));
}

export interface PlanInput {
  dir: string;
  files: readonly SourceFile[];
  now: Date;
  retentionDays: number;
  outputFile: string;
  otherOutputs?: readonly string[];
  strayExtensions?: readonly string[];
}

/** Retention first, then cleanup, then the stray sweep. */
export function buildDeletionPlan(input: PlanInput): PlannedDeletion[] {
  const expired = planRetention(input.files, input.now, input.retentionDays);
  const useless = planCleanup(input.files, expired);
  const outputs = [input.outputFile, ...(input.otherOutputs ?? [])];
  const strays = planStraySweep(input.dir, input.strayExtensions ?? DEFAULT_STRAY_EXTENSIONS, outputs);
  return [...expired, ...useless, ...strays];
}

/** Delete every planned file unless `dryRun`. A failed deletion is reported, not thrown. */
export async function executePlan(
  plan: readonly PlannedDeletion[],
  opts: { dryRun?: boolean; onOutcome?: (outcome: DeletionOutcome) => void } = {},
): Promise<DeletionOutcome[]> {
  const outcomes: DeletionOutcome[] = [];
  for (const entry of plan) {
    let outcome: DeletionOutcome;
    if (opts.dryRun) {
      outcome = { ...entry, status: "planned" };
    } else {
      try {
        await unlink(entry.path);
        outcome = { ...entry, status: "deleted" };
      } catch (err) {
        outcome = { ...entry, status: "failed", error: messageOf(err) };
      }
    }
    outcomes.push(outcome);
    opts.onOutcome?.(outcome);
  }
  return outcomes;
}
