import type { Row } from "../core/types.js";

export interface SheetSource {
  name: string;
  readRows(): Row[];    // may throw; the walker turns that into a SheetParseError
}

export interface WorkbookSource {
  format: "excel" | "delimited";
  sheets: SheetSource[];
  modified?: Date;      // embedded "last modified" document property
  decodedWith?: string; // delimited files: the decoder candidate that succeeded
}
