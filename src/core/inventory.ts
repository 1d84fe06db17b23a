/**
 * File Inventory — lists the input files of a run, newest first.
 *
 * Effective timestamp = the workbook's embedded "modified" property when it
 * has one, otherwise the filesystem mtime. Equal timestamps are ordered by
 * file name (code-unit order) so reconciliation stays deterministic.
 */

import { existsSync, readdirSync, statSync } from "node:fs";
import { extname, join } from "node:path";
import { documentModified, loadWorkbook } from "../parsers/excel.js";
import { sourceKind } from "../parsers/workbook.js";
import { TimestampResolutionError, messageOf } from "./errors.js";
import type { SourceFile, SourceKind } from "./types.js";

export const DEFAULT_INPUT_EXTENSIONS = [".xlsx", ".csv"];

export interface InventoryOptions {
  outputFile: string;
  otherOutputs?: readonly string[]; // further names the run writes into `dir`
  inputExtensions?: readonly string[];
}

/** A directory entry that vanished or could not be stat'ed during the scan. */
export interface SkippedEntry {
  name: string;
  reason: string;
}

export interface Inventory {
  files: SourceFile[];
  skipped: SkippedEntry[];
  timestampWarnings: TimestampResolutionError[];
}

export interface ResolvedTimestamp {
  timestamp: number;
  source: SourceFile["timestampSource"];
  warning?: TimestampResolutionError;
}

/** Read the embedded "last modified" property of a workbook. */
export async function readDocumentTimestamp(path: string): Promise<number> {
  let modified: Date | undefined;
  try {
    modified = documentModified(await loadWorkbook(path));
  } catch (err) {
    throw new TimestampResolutionError(path, messageOf(err));
  }
  if (!modified) throw new TimestampResolutionError(path, "no modified property");
  return modified.getTime();
}

export async function resolveTimestamp(path: string, kind: SourceKind): Promise<ResolvedTimestamp> {
  const mtime = statSync(path).mtimeMs;
  if (kind !== "workbook") return { timestamp: mtime, source: "filesystem" };
  try {
    return { timestamp: await readDocumentTimestamp(path), source: "metadata" };
  } catch (err) {
    const warning = err instanceof TimestampResolutionError ? err : new TimestampResolutionError(path, messageOf(err));
    return { timestamp: mtime, source: "filesystem", warning };
  }
}

export function isOutputFile(name: string, outputs: readonly string[]): boolean {
  const lower = name.toLowerCase();
  return outputs.some((o) => o.toLowerCase() === lower);
}

export interface DirScan {
  names: string[];
  skipped: SkippedEntry[];
}

/**
 * Regular files directly inside `dir` whose extension is in `extensions`,
 * minus the run's own outputs. Entries that cannot be stat'ed are skipped.
 */
export function scanDir(dir: string, extensions: readonly string[], outputs: readonly string[]): DirScan {
  const scan: DirScan = { names: [], skipped: [] };
  if (!existsSync(dir)) return scan;
  const wanted = new Set(extensions.map((e) => e.toLowerCase()));
  const candidates = readdirSync(dir)
    .filter((name) => wanted.has(extname(name).toLowerCase()))
    .filter((name) => !isOutputFile(name, outputs))
    .sort();

  for (const name of candidates) {
    try {
      if (statSync(join(dir, name)).isFile()) scan.names.push(name);
    } catch (err) {
      scan.skipped.push({ name, reason: messageOf(err) });
    }
  }
  return scan;
}

export function listFiles(dir: string, extensions: readonly string[], outputs: readonly string[]): string[] {
  return scanDir(dir, extensions, outputs).names;
}

export function compareNewestFirst(a: SourceFile, b: SourceFile): number {
  if (a.timestamp !== b.timestamp) return b.timestamp - a.timestamp;
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

export async function takeInventory(dir: string, options: InventoryOptions): Promise<Inventory> {
  const extensions = options.inputExtensions ?? DEFAULT_INPUT_EXTENSIONS;
  const outputs = [options.outputFile, ...(options.otherOutputs ?? [])];
  const { names, skipped } = scanDir(dir, extensions, outputs);
  const files: SourceFile[] = [];
  const timestampWarnings: TimestampResolutionError[] = [];

  for (const name of names) {
    const path = join(dir, name);
    const kind = sourceKind(name);
    let resolved: ResolvedTimestamp;
    try {
      resolved = await resolveTimestamp(path, kind);
    } catch (err) {
      // removed between the scan and the stat
      skipped.push({ name, reason: messageOf(err) });
      continue;
    }
    if (resolved.warning) timestampWarnings.push(resolved.warning);

    files.push({
      path,
      name,
      kind,
      timestamp: resolved.timestamp,
      timestampSource: resolved.source,
      status: "pending",
      recordCount: 0,
      contributedNewCodes: 0,
    });
  }

  files.sort(compareNewestFirst);
  return { files, skipped, timestampWarnings };
}
