/**
 * Error taxonomy for a price sync run.
 *
 * Per-file and per-sheet errors are caught where they happen and recorded on
 * the file; only NoInputError ends a run in the failed state.
 */

export class PriceSyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface DecodeAttempt {
  candidate: string; // e.g. "utf-16/tab"
  reason: string;
}

/** Every encoding/delimiter candidate failed for a delimited file. */
export class DecodeError extends PriceSyncError {
  readonly attempts: DecodeAttempt[];

  constructor(attempts: DecodeAttempt[]) {
    super(
      `No decoder candidate succeeded (${attempts.map((a) => `${a.candidate}: ${a.reason}`).join("; ")})`,
    );
    this.attempts = attempts;
  }
}

/** The workbook could not be opened at all. */
export class WorkbookOpenError extends PriceSyncError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Workbook could not be opened: ${path} (${messageOf(cause)})`, { cause });
    this.path = path;
  }
}

/** One sheet of an otherwise readable workbook failed. */
export class SheetParseError extends PriceSyncError {
  readonly sheet: string;

  constructor(sheet: string, cause: unknown) {
    super(`Sheet "${sheet}" could not be parsed: ${messageOf(cause)}`, { cause });
    this.sheet = sheet;
  }
}

/** Embedded document timestamp is missing or unreadable. Never fatal. */
export class TimestampResolutionError extends PriceSyncError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`No document timestamp for ${path}: ${reason}`);
    this.path = path;
  }
}

/** The sink rejected or failed the write. The run still counts as extracted. */
export class SinkPublishError extends PriceSyncError {
  readonly sink: string;

  constructor(sink: string, cause: unknown) {
    super(`Publishing to ${sink} failed: ${messageOf(cause)}`, { cause });
    this.sink = sink;
  }
}

/** No input files, or no record extracted from any of them. */
export class NoInputError extends PriceSyncError {
  readonly reason: "no-files" | "no-records";

  constructor(reason: "no-files" | "no-records", dir: string) {
    super(
      reason === "no-files"
        ? `No input files found in ${dir}`
        : `No price records could be extracted from the files in ${dir}`,
    );
    this.reason = reason;
  }
}

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
