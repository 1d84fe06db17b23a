import type { Cell, Row } from "../core/types.js";
import { cellText } from "./cells.js";

export const CODE_RULES = ["fixed", "prefix"] as const;

/**
 * - `fixed`: exactly ten digits starting with 3 (workbook price lists)
 * - `prefix`: digits only, starting with 3, longer than nine (delimited wholesale exports)
 */
export type CodeRule = (typeof CODE_RULES)[number];

const PATTERNS: Record<CodeRule, RegExp> = {
  fixed: /^3\d{9}$/,
  prefix: /^3\d{9,}$/,
};

export function isProductCode(cell: Cell, rule: CodeRule = "fixed"): boolean {
  return PATTERNS[rule].test(cellText(cell).trim());
}

/** Index of the first cell, left to right, holding a product code. */
export function detectCode(row: Row, rule: CodeRule = "fixed"): number | undefined {
  const index = row.findIndex((cell) => isProductCode(cell, rule));
  return index === -1 ? undefined : index;
}
