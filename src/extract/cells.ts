import type { Cell } from "../core/types.js";

const AMOUNT_RE = /^\d*\.?\d+$/;
const PLAIN_NUMBER_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** String form of a cell, untrimmed. Empty cells become "". */
export function cellText(cell: Cell): string {
  return cell === null ? "" : String(cell);
}

export function isBlank(cell: Cell): boolean {
  return cellText(cell).trim() === "";
}

/** True for numeric cells and for text that reads as a plain number ("12", "-3.5", "1e3"). */
export function isPlainNumber(cell: Cell): boolean {
  if (typeof cell === "number") return Number.isFinite(cell);
  return PLAIN_NUMBER_RE.test(cellText(cell).trim());
}

/**
 * Read a cell as a price amount. Numbers are used as is; text may use "," as
 * the decimal separator ("1250,75"). The value is truncated toward zero and
 * only strictly positive results count.
 */
export function parseAmount(cell: Cell): number | undefined {
  let value: number;
  if (typeof cell === "number") {
    if (!Number.isFinite(cell) || cell <= 0) return undefined;
    value = cell;
  } else {
    const text = cellText(cell).replace(/,/g, ".").trim();
    if (!AMOUNT_RE.test(text)) return undefined;
    value = Number.parseFloat(text);
  }
  const whole = Math.trunc(value);
  return whole > 0 ? whole : undefined;
}
