export * from "./core/types.js";
export * from "./core/errors.js";
export { runPipeline, DEFAULT_OUTPUT_FILE, DEFAULT_SHEET_NAME } from "./core/pipeline.js";
export type { PipelineEvent, PipelineOptions, PipelineState, PublishOutcome, RunResult } from "./core/pipeline.js";
export { takeInventory, resolveTimestamp, compareNewestFirst } from "./core/inventory.js";
export { ReconciliationStore } from "./core/reconcile.js";
export { buildDeletionPlan, executePlan, planRetention, planCleanup, planStraySweep } from "./core/retention.js";
export { detectCode, isProductCode, CODE_RULES, type CodeRule } from "./extract/code.js";
export { extractRecord, assignTiers, collectAmounts, MIN_TOPTAN } from "./extract/row.js";
export { walkWorkbook } from "./extract/walker.js";
export { decodeDelimited, firstSuccess, DECODER_CANDIDATES } from "./parsers/delimited.js";
export { openSource } from "./parsers/workbook.js";
export { WorkbookSink } from "./sinks/workbook.js";
export { CsvSink } from "./sinks/csv.js";
export { TABLE_HEADER, toTableRows, type TableSink, type TableValue } from "./sinks/types.js";
