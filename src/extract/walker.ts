import { SheetParseError } from "../core/errors.js";
import type { PriceRecord } from "../core/types.js";
import type { WorkbookSource } from "../parsers/types.js";
import { detectCode, type CodeRule } from "./code.js";
import { extractRecord } from "./row.js";

export interface SheetReport {
  sheet: string;
  rows: number;
  records: number;
  error?: SheetParseError;
}

export interface WalkResult {
  records: PriceRecord[];
  sheets: SheetReport[];
}

/**
 * Run code detection and row extraction over every row of every sheet.
 * A sheet that fails to read is reported and skipped; the walk goes on.
 */
export function walkWorkbook(
  workbook: WorkbookSource,
  source: string,
  codeRule: CodeRule = "fixed",
): WalkResult {
  const records: PriceRecord[] = [];
  const sheets: SheetReport[] = [];

  for (const sheet of workbook.sheets) {
    const found: PriceRecord[] = [];
    let rowCount = 0;
    try {
      const rows = sheet.readRows();
      rowCount = rows.length;
      rows.forEach((row, i) => {
        const codeIndex = detectCode(row, codeRule);
        if (codeIndex === undefined) return;
        const record = extractRecord(row, codeIndex, { source, sheet: sheet.name, row: i + 1, codeRule });
        if (record) found.push(record);
      });
    } catch (err) {
      sheets.push({ sheet: sheet.name, rows: rowCount, records: 0, error: new SheetParseError(sheet.name, err) });
      continue;
    }
    records.push(...found);
    sheets.push({ sheet: sheet.name, rows: rowCount, records: found.length });
  }

  return { records, sheets };
}
