import Papa from "papaparse";
import { writeFile } from "node:fs/promises";
import { basename } from "node:path";
import type { TableSink, TableValue } from "./types.js";

/** Writes the table as a UTF-8 CSV file; the file is the sheet, so `sheetName` is not used. */
export class CsvSink implements TableSink {
  readonly name: string;

  constructor(readonly path: string) {
    this.name = basename(path);
  }

  async replaceSheet(_sheetName: string, header: readonly string[], rows: readonly TableValue[][]): Promise<void> {
    const text = Papa.unparse({ fields: [...header], data: rows.map((r) => [...r]) }, { newline: "\n" });
    await writeFile(this.path, text + "\n", "utf-8");
  }
}
