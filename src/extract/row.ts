/**
 * Row Extractor — reads name and price tiers from a row once its code column is known.
 *
 * Price tiers:
 *   toptan     smallest amount right of the code
 *   perakende  the amount in the column right after toptan; when that column
 *              holds no amount, the second smallest amount in the row
 *   liste      largest amount right of the code
 *
 * perakende is positional, so it can be smaller than toptan's neighbours or
 * even equal to liste. Rows are rejected when toptan is below MIN_TOPTAN.
 */

import type { PriceRecord, Row } from "../core/types.js";
import { isBlank, isPlainNumber, parseAmount, cellText } from "./cells.js";
import { isProductCode, type CodeRule } from "./code.js";

export const MIN_TOPTAN = 100;

export interface RowContext {
  source: string;
  sheet: string;
  row: number; // 1-based
  codeRule?: CodeRule;
}

export interface Amount {
  column: number;
  value: number;
}

/** Positive amounts strictly right of the code column, in column order. */
export function collectAmounts(row: Row, codeIndex: number): Amount[] {
  const amounts: Amount[] = [];
  for (let column = codeIndex + 1; column < row.length; column++) {
    const value = parseAmount(row[column] ?? null);
    if (value !== undefined) amounts.push({ column, value });
  }
  return amounts;
}

export function readName(row: Row, codeIndex: number, rule: CodeRule = "fixed"): string {
  const cell = row[codeIndex + 1] ?? null;
  if (isBlank(cell) || isProductCode(cell, rule) || isPlainNumber(cell)) return "";
  return cellText(cell).trim();
}

export interface Tiers {
  toptan: number;
  perakende: number | undefined;
  liste: number;
}

/** Assign tiers from at least one amount. */
export function assignTiers(amounts: Amount[]): Tiers {
  let lowest = amounts[0];
  let highest = amounts[0];
  for (const amount of amounts) {
    if (amount.value < lowest.value) lowest = amount;
    if (amount.value > highest.value) highest = amount;
  }

  let perakende = amounts.find((a) => a.column === lowest.column + 1)?.value;
  if (perakende === undefined && amounts.length >= 2) {
    const sorted = amounts.map((a) => a.value).sort((a, b) => a - b);
    perakende = sorted[1];
  }

  return { toptan: lowest.value, perakende, liste: highest.value };
}

export function extractRecord(
  row: Row,
  codeIndex: number,
  context: RowContext,
): PriceRecord | undefined {
  const rule = context.codeRule ?? "fixed";
  const amounts = collectAmounts(row, codeIndex);
  if (amounts.length < 2) return undefined;

  const { toptan, perakende, liste } = assignTiers(amounts);
  if (toptan < MIN_TOPTAN) return undefined;
  if (perakende === undefined) return undefined;

  return {
    code: cellText(row[codeIndex] ?? null).trim(),
    name: readName(row, codeIndex, rule),
    toptan,
    perakende,
    liste,
    source: context.source,
    sheet: context.sheet,
    row: context.row,
  };
}
