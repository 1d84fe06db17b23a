/**
 * Shared test helpers — fixture workbooks and delimited files are built in
 * temporary directories at test time.
 */
import ExcelJS from "exceljs";
import { mkdtempSync, rmSync, utimesSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Cell, SourceFile } from "../../src/core/types.js";

export const NOW = new Date("2026-10-19T12:00:00Z");

export function daysBefore(days: number, from: Date = NOW): Date {
  return new Date(from.getTime() - days * 24 * 60 * 60 * 1000);
}

export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `pricesync-${prefix}-`));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Write an .xlsx with the given sheets; `modified` becomes the embedded document date. */
export async function writeWorkbook(
  path: string,
  sheets: Record<string, Cell[][]>,
  modified?: Date,
): Promise<void> {
  const wb = new ExcelJS.Workbook();
  for (const [name, rows] of Object.entries(sheets)) {
    const sheet = wb.addWorksheet(name);
    for (const row of rows) sheet.addRow(row);
  }
  if (modified) {
    wb.created = modified;
    wb.modified = modified;
  }
  await wb.xlsx.writeFile(path);
}

/** UTF-16LE bytes with a byte-order mark, as spreadsheet "Unicode text" exports write them. */
export function utf16WithBom(text: string): Buffer {
  return Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from(text, "utf16le")]);
}

/** Write a delimited file and pin its mtime. */
export function writeDelimited(path: string, bytes: Buffer | string, mtime: Date): void {
  writeFileSync(path, bytes);
  utimesSync(path, mtime, mtime);
}

export function sourceFile(name: string, overrides: Partial<SourceFile> = {}): SourceFile {
  return {
    path: `/prices/${name}`,
    name,
    kind: "workbook",
    timestamp: NOW.getTime(),
    timestampSource: "metadata",
    status: "extracted",
    recordCount: 0,
    contributedNewCodes: 0,
    ...overrides,
  };
}
