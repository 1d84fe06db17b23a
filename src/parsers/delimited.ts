/**
 * Decoder Chain — turns the bytes of a delimited export into rows.
 *
 * Supplier exports arrive in 16-bit encodings with tab or semicolon
 * delimiters, and nothing in the file says which. Candidates are tried in a
 * fixed order and the first one that decodes and tokenizes is used; the
 * content itself is not judged.
 */

import Papa from "papaparse";
import type { ParseResult } from "papaparse";
import { DecodeError, messageOf, type DecodeAttempt } from "../core/errors.js";
import type { Row } from "../core/types.js";

export type TextEncoding = "utf-16" | "utf-16le" | "utf-8";

export interface DecoderCandidate {
  encoding: TextEncoding; // "utf-16" requires a byte-order mark
  delimiter: "\t" | ";" | ",";
}

export const DECODER_CANDIDATES: readonly DecoderCandidate[] = [
  { encoding: "utf-16", delimiter: "\t" },
  { encoding: "utf-16le", delimiter: "\t" },
  { encoding: "utf-16", delimiter: ";" },
  { encoding: "utf-8", delimiter: "\t" },
  { encoding: "utf-8", delimiter: ";" },
  { encoding: "utf-8", delimiter: "," },
];

export interface DecodedTable {
  rows: Row[];
  candidate: DecoderCandidate;
}

export function candidateLabel(candidate: DecoderCandidate): string {
  const names = { "\t": "tab", ";": "semicolon", ",": "comma" } as const;
  return `${candidate.encoding}/${names[candidate.delimiter]}`;
}

// ── Fallback combinator ──

export type FirstSuccess<C, T> =
  | { ok: true; value: T; candidate: C }
  | { ok: false; failures: Array<{ candidate: C; error: unknown }> };

/** Evaluate `attempt` for each candidate in order; stop at the first that does not throw. */
export function firstSuccess<C, T>(candidates: readonly C[], attempt: (candidate: C) => T): FirstSuccess<C, T> {
  const failures: Array<{ candidate: C; error: unknown }> = [];
  for (const candidate of candidates) {
    try {
      return { ok: true, value: attempt(candidate), candidate };
    } catch (error) {
      failures.push({ candidate, error });
    }
  }
  return { ok: false, failures };
}

// ── Decoding ──

export function decodeText(bytes: Uint8Array, encoding: TextEncoding): string {
  if (encoding === "utf-16") {
    if (bytes[0] === 0xff && bytes[1] === 0xfe) {
      return new TextDecoder("utf-16le", { fatal: true }).decode(bytes);
    }
    if (bytes[0] === 0xfe && bytes[1] === 0xff) {
      return new TextDecoder("utf-16be", { fatal: true }).decode(bytes);
    }
    throw new Error("no byte-order mark");
  }
  return new TextDecoder(encoding, { fatal: true }).decode(bytes);
}

// Stands in for the quote character when quoting is switched off.
const NO_QUOTE = "\u0000";

function parseRows(text: string, delimiter: DecoderCandidate["delimiter"], quoteChar: string): ParseResult<string[]> {
  return Papa.parse<string[]>(text, { delimiter, quoteChar, skipEmptyLines: "greedy" });
}

/**
 * Split text into rows. Malformed quoting (a name such as `"Vida 3/4" kisa`)
 * is not fatal: the text is re-read with quoting off, so quote characters
 * stay in the cell text and no row swallows the ones after it.
 */
export function tokenize(text: string, delimiter: DecoderCandidate["delimiter"]): Row[] {
  let parsed = parseRows(text, delimiter, '"');
  if (parsed.errors.length > 0 && parsed.errors.every((e) => e.type === "Quotes")) {
    parsed = parseRows(text, delimiter, NO_QUOTE);
  }
  if (parsed.errors.length > 0) {
    const first = parsed.errors[0];
    throw new Error(`row ${first.row ?? "?"}: ${first.message}`);
  }
  if (!parsed.data.some((row) => row.length > 1)) {
    throw new Error("delimiter does not split any line");
  }
  return parsed.data;
}

export function decodeDelimited(
  bytes: Uint8Array,
  candidates: readonly DecoderCandidate[] = DECODER_CANDIDATES,
): DecodedTable {
  const result = firstSuccess(candidates, (candidate) =>
    tokenize(decodeText(bytes, candidate.encoding), candidate.delimiter),
  );
  if (!result.ok) {
    const attempts: DecodeAttempt[] = result.failures.map((f) => ({
      candidate: candidateLabel(f.candidate),
      reason: messageOf(f.error),
    }));
    throw new DecodeError(attempts);
  }
  return { rows: result.value, candidate: result.candidate };
}
