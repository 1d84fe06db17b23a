/**
 * Price sync run — inventory → extract → reconcile → clean up → publish.
 *
 *   idle → inventorying → extracting → reconciling → cleaning-up → publishing → done
 *                     ↘ failed (no files)        ↘ failed (no records)
 *
 * Files are extracted one after another and merged strictly newest first.
 * A file that cannot be opened is recorded as failed and left alone: it is
 * neither merged nor deleted. Publishing errors leave the run `done` with
 * `publish.status = "failed"`.
 *
 * The engine prints nothing; progress goes out as PipelineEvents.
 */

import { basename, dirname, resolve } from "node:path";
import { walkWorkbook } from "../extract/walker.js";
import type { CodeRule } from "../extract/code.js";
import { openSource } from "../parsers/workbook.js";
import { TABLE_HEADER, toTableRows, type TableSink } from "../sinks/types.js";
import { NoInputError, SinkPublishError, messageOf } from "./errors.js";
import { takeInventory } from "./inventory.js";
import { ReconciliationStore } from "./reconcile.js";
import { buildDeletionPlan, executePlan, DEFAULT_RETENTION_DAYS } from "./retention.js";
import {
  isUseless,
  type DeletionOutcome,
  type DeletionReason,
  type PriceRecord,
  type SourceFile,
} from "./types.js";

export const DEFAULT_OUTPUT_FILE = "Fiyat_Listesi.xlsx";
export const DEFAULT_SHEET_NAME = "Fiyat";

// ── Types ──

export type PipelineState =
  | "idle"
  | "inventorying"
  | "extracting"
  | "reconciling"
  | "cleaning-up"
  | "publishing"
  | "done"
  | "failed";

export type PipelineEvent =
  | { type: "state"; state: PipelineState }
  | { type: "inventory"; files: number; dir: string }
  | { type: "file_skipped"; file: string; reason: string }
  | { type: "timestamp_fallback"; file: string; reason: string }
  | { type: "file_start"; file: string; index: number; total: number }
  | { type: "sheet_error"; file: string; sheet: string; error: string }
  | { type: "file_extracted"; file: string; records: number; decodedWith?: string }
  | { type: "file_failed"; file: string; error: string }
  | { type: "file_merged"; file: string; records: number; newCodes: number; useless: boolean }
  | { type: "deletion"; file: string; path: string; reason: DeletionReason; status: DeletionOutcome["status"]; error?: string }
  | { type: "published"; sink: string; rows: number }
  | { type: "publish_failed"; sink: string; error: string };

export interface PipelineOptions {
  dir: string;
  outputFile?: string;
  sheetName?: string;
  retentionDays?: number;
  codeRule?: CodeRule;
  inputExtensions?: string[];
  strayExtensions?: string[];
  exclude?: string[];      // further paths that are never input, e.g. an unpublished CSV export
  dryRun?: boolean;        // plan deletions without performing them
  sinks?: TableSink[];     // none → publishing is skipped
  now?: Date;
  onEvent?: (event: PipelineEvent) => void;
}

export interface SinkOutcome {
  sink: string;
  ok: boolean;
  error?: SinkPublishError;
}

export interface PublishOutcome {
  status: "ok" | "failed" | "skipped";
  sinks: SinkOutcome[];
}

export interface RunResult {
  state: "done" | "failed";
  error?: NoInputError;
  files: SourceFile[];
  table: PriceRecord[];
  deletions: DeletionOutcome[];
  publish: PublishOutcome;
}

interface Extraction {
  file: SourceFile;
  records: PriceRecord[];
}

// ── Stages ──

async function extractFile(
  file: SourceFile,
  codeRule: CodeRule,
  emit: (event: PipelineEvent) => void,
): Promise<Extraction> {
  try {
    const workbook = await openSource(file.path);
    const { records, sheets } = walkWorkbook(workbook, file.name, codeRule);
    for (const s of sheets) {
      if (s.error) emit({ type: "sheet_error", file: file.name, sheet: s.sheet, error: s.error.message });
    }
    file.status = "extracted";
    file.recordCount = records.length;
    emit({ type: "file_extracted", file: file.name, records: records.length, decodedWith: workbook.decodedWith });
    return { file, records };
  } catch (err) {
    file.status = "failed";
    file.error = messageOf(err);
    emit({ type: "file_failed", file: file.name, error: file.error });
    return { file, records: [] };
  }
}

async function publish(
  sinks: readonly TableSink[],
  sheetName: string,
  table: readonly PriceRecord[],
  emit: (event: PipelineEvent) => void,
): Promise<PublishOutcome> {
  if (sinks.length === 0) return { status: "skipped", sinks: [] };

  const rows = toTableRows(table);
  const outcomes: SinkOutcome[] = [];
  for (const sink of sinks) {
    try {
      await sink.replaceSheet(sheetName, TABLE_HEADER, rows);
      outcomes.push({ sink: sink.name, ok: true });
      emit({ type: "published", sink: sink.name, rows: rows.length });
    } catch (err) {
      const error = new SinkPublishError(sink.name, err);
      outcomes.push({ sink: sink.name, ok: false, error });
      emit({ type: "publish_failed", sink: sink.name, error: error.message });
    }
  }
  return { status: outcomes.every((o) => o.ok) ? "ok" : "failed", sinks: outcomes };
}

/** Names inside `dir` that the run writes or was told to leave alone, besides the output workbook. */
export function otherOutputs(dir: string, sinks: readonly TableSink[], exclude: readonly string[] = []): string[] {
  const paths = [...sinks.flatMap((s) => (s.path ? [s.path] : [])), ...exclude];
  const root = resolve(dir);
  return paths.filter((p) => dirname(resolve(p)) === root).map((p) => basename(p));
}

// ── Run ──

export async function runPipeline(options: PipelineOptions): Promise<RunResult> {
  const emit = options.onEvent ?? (() => {});
  const outputFile = options.outputFile ?? DEFAULT_OUTPUT_FILE;
  const codeRule = options.codeRule ?? "fixed";
  const now = options.now ?? new Date();
  const sinks = options.sinks ?? [];
  const outputs = otherOutputs(options.dir, sinks, options.exclude);

  const setState = (state: PipelineState) => emit({ type: "state", state });
  const fail = (error: NoInputError, files: SourceFile[]): RunResult => {
    setState("failed");
    return { state: "failed", error, files, table: [], deletions: [], publish: { status: "skipped", sinks: [] } };
  };

  setState("idle");

  // ─── Inventory ───
  setState("inventorying");
  const { files, skipped, timestampWarnings } = await takeInventory(options.dir, {
    outputFile,
    otherOutputs: outputs,
    inputExtensions: options.inputExtensions,
  });
  for (const entry of skipped) {
    emit({ type: "file_skipped", file: entry.name, reason: entry.reason });
  }
  for (const w of timestampWarnings) {
    const file = files.find((f) => f.path === w.path);
    emit({ type: "timestamp_fallback", file: file?.name ?? w.path, reason: w.message });
  }
  emit({ type: "inventory", files: files.length, dir: options.dir });
  if (files.length === 0) return fail(new NoInputError("no-files", options.dir), files);

  // ─── Extract ───
  setState("extracting");
  const extractions: Extraction[] = [];
  for (const [i, file] of files.entries()) {
    emit({ type: "file_start", file: file.name, index: i + 1, total: files.length });
    extractions.push(await extractFile(file, codeRule, emit));
  }

  // ─── Reconcile (newest first) ───
  setState("reconciling");
  const store = new ReconciliationStore();
  for (const { file, records } of extractions) {
    if (file.status !== "extracted") continue;
    const added = store.merge(records, file);
    emit({ type: "file_merged", file: file.name, records: records.length, newCodes: added, useless: isUseless(file) });
  }
  if (store.size === 0) return fail(new NoInputError("no-records", options.dir), files);

  // ─── Retention + cleanup ───
  setState("cleaning-up");
  const plan = buildDeletionPlan({
    dir: options.dir,
    files,
    now,
    retentionDays: options.retentionDays ?? DEFAULT_RETENTION_DAYS,
    outputFile,
    otherOutputs: outputs,
    strayExtensions: options.strayExtensions,
  });
  const deletions = await executePlan(plan, {
    dryRun: options.dryRun,
    onOutcome: (o) =>
      emit({ type: "deletion", file: o.name, path: o.path, reason: o.reason, status: o.status, error: o.error }),
  });

  // ─── Publish ───
  setState("publishing");
  const table = store.table();
  const published = await publish(sinks, options.sheetName ?? DEFAULT_SHEET_NAME, table, emit);

  setState("done");
  return { state: "done", files, table, deletions, publish: published };
}
