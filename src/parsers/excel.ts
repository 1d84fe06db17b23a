import ExcelJS from "exceljs";
import type { CellValue, Row as SheetRow, Workbook, Worksheet } from "exceljs";
import { existsSync } from "node:fs";
import { WorkbookOpenError } from "../core/errors.js";
import type { Cell, Row } from "../core/types.js";
import type { SheetSource, WorkbookSource } from "./types.js";

/**
 * Flatten an exceljs cell value (rich text, formula, hyperlink…) to a plain
 * cell. Booleans read as 1 and 0, so a TRUE beside a price counts as an amount.
 */
export function toCell(value: CellValue): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === "number" || typeof value === "string") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (value instanceof Date) return value.toISOString();
  if ("richText" in value) return value.richText.map((part) => part.text).join("");
  if ("hyperlink" in value) return String(value.text);
  if ("error" in value) return null;
  return toCell(value.result ?? null);
}

/** Cells of a row in column order; merged cells only carry their value in the top-left cell. */
function readRow(row: SheetRow): Row {
  const cells: Row = [];
  for (let c = 1; c <= row.cellCount; c++) {
    const cell = row.getCell(c);
    const isSlave = cell.isMerged && cell.master.address !== cell.address;
    cells.push(isSlave ? null : toCell(cell.value));
  }
  return cells;
}

function sheetSource(sheet: Worksheet): SheetSource {
  return {
    name: sheet.name,
    readRows() {
      const rows: Row[] = [];
      for (let r = 1; r <= sheet.rowCount; r++) {
        rows.push(readRow(sheet.getRow(r)));
      }
      return rows;
    },
  };
}

export function documentModified(workbook: Workbook): Date | undefined {
  const modified: unknown = workbook.modified;
  return modified instanceof Date && !Number.isNaN(modified.getTime()) ? modified : undefined;
}

export async function loadWorkbook(inputPath: string): Promise<Workbook> {
  if (!existsSync(inputPath)) {
    throw new WorkbookOpenError(inputPath, new Error("File not found"));
  }
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(inputPath);
  } catch (err) {
    throw new WorkbookOpenError(inputPath, err);
  }
  return workbook;
}

export async function readExcel(inputPath: string): Promise<WorkbookSource> {
  const workbook = await loadWorkbook(inputPath);
  return {
    format: "excel",
    sheets: workbook.worksheets.map(sheetSource),
    modified: documentModified(workbook),
  };
}
