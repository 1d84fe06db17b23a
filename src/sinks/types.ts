import type { PriceRecord } from "../core/types.js";

export type TableValue = string | number;

/**
 * A destination for the reconciled table. `replaceSheet` clears the target
 * sheet and writes the header followed by the rows, in order.
 */
export interface TableSink {
  readonly name: string;
  readonly path?: string; // local file written, if any; never read back as input

  replaceSheet(sheetName: string, header: readonly string[], rows: readonly TableValue[][]): Promise<void>;
}

export const TABLE_HEADER = ["code", "name", "toptan", "perakende", "liste", "source"] as const;

export function toTableRows(records: readonly PriceRecord[]): TableValue[][] {
  return records.map((r) => [r.code, r.name, r.toptan, r.perakende, r.liste, r.source]);
}
