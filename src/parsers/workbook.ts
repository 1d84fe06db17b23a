import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import type { SourceKind } from "../core/types.js";
import { candidateLabel, decodeDelimited } from "./delimited.js";
import { readExcel } from "./excel.js";
import type { WorkbookSource } from "./types.js";

const WORKBOOK_EXTENSIONS = new Set([".xlsx"]);

export function sourceKind(filename: string): SourceKind {
  return WORKBOOK_EXTENSIONS.has(extname(filename).toLowerCase()) ? "workbook" : "delimited";
}

/** A delimited file reads as a single sheet named after the file. */
async function readDelimited(inputPath: string): Promise<WorkbookSource> {
  const bytes = await readFile(inputPath);
  const { rows, candidate } = decodeDelimited(bytes);
  return {
    format: "delimited",
    sheets: [{ name: basename(inputPath), readRows: () => rows }],
    decodedWith: candidateLabel(candidate),
  };
}

/**
 * Open any supported input file. Throws WorkbookOpenError for unreadable
 * workbooks and DecodeError for delimited files no decoder candidate accepts.
 */
export async function openSource(inputPath: string): Promise<WorkbookSource> {
  return sourceKind(inputPath) === "workbook" ? readExcel(inputPath) : readDelimited(inputPath);
}
