import ExcelJS from "exceljs";
import { existsSync } from "node:fs";
import { basename } from "node:path";
import type { TableSink, TableValue } from "./types.js";

/**
 * Writes the table into one sheet of a local workbook. Other sheets of an
 * existing workbook are kept.
 */
export class WorkbookSink implements TableSink {
  readonly name: string;

  constructor(readonly path: string) {
    this.name = basename(path);
  }

  async replaceSheet(sheetName: string, header: readonly string[], rows: readonly TableValue[][]): Promise<void> {
    const workbook = new ExcelJS.Workbook();
    if (existsSync(this.path)) {
      await workbook.xlsx.readFile(this.path);
    }

    const existing = workbook.getWorksheet(sheetName);
    if (existing) workbook.removeWorksheet(existing.id);

    const sheet = workbook.addWorksheet(sheetName);
    sheet.addRow([...header]);
    for (const row of rows) sheet.addRow([...row]);

    workbook.modified = new Date();
    await workbook.xlsx.writeFile(this.path);
  }
}
