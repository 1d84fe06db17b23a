import type { PriceRecord, SourceFile } from "./types.js";

/**
 * Reconciliation Store — one record per product code, first seen wins.
 *
 * Files are merged newest first, so the first record seen for a code is the
 * most recent one. A stored record is never replaced or patched field by
 * field. Each merge counts the codes a file added on `contributedNewCodes`.
 */
export class ReconciliationStore {
  private readonly records = new Map<string, PriceRecord>();

  merge(records: readonly PriceRecord[], file: SourceFile): number {
    let added = 0;
    for (const record of records) {
      if (this.records.has(record.code)) continue;
      this.records.set(record.code, record);
      added++;
    }
    file.contributedNewCodes += added;
    return added;
  }

  has(code: string): boolean {
    return this.records.has(code);
  }

  get(code: string): PriceRecord | undefined {
    return this.records.get(code);
  }

  get size(): number {
    return this.records.size;
  }

  /** Records in insertion order. */
  table(): PriceRecord[] {
    return [...this.records.values()];
  }
}
