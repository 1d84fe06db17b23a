// ── Rows ──

/** A normalised spreadsheet cell: text, number, or empty. */
export type Cell = string | number | null;
export type Row = Cell[];

// ── Records ──

export interface PriceRecord {
  code: string;
  name: string;        // "" when the row carries no usable name
  toptan: number;      // wholesale: smallest plausible value in the row
  perakende: number;   // retail: column right of toptan, else second smallest
  liste: number;       // list: largest value in the row
  source: string;      // originating file name
  sheet: string;
  row: number;         // 1-based
}

// ── Source files ──

export type SourceKind = "workbook" | "delimited";
export type FileStatus = "pending" | "extracted" | "failed";

export interface SourceFile {
  path: string;
  name: string;
  kind: SourceKind;
  timestamp: number;                          // effective, ms since epoch
  timestampSource: "metadata" | "filesystem";
  status: FileStatus;
  recordCount: number;
  contributedNewCodes: number;                // written only by ReconciliationStore
  error?: string;
}

export function isUseless(file: SourceFile): boolean {
  return file.status === "extracted" && file.contributedNewCodes === 0;
}

// ── Deletion ──

export type DeletionReason = "expired" | "useless" | "stray";

export interface PlannedDeletion {
  path: string;
  name: string;
  reason: DeletionReason;
}

export interface DeletionOutcome extends PlannedDeletion {
  status: "deleted" | "planned" | "failed";
  error?: string;
}
