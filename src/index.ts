export { FusionEngine, FusionStateError, extractSubnet, selectBestOs } from "./fusion/index.js";
export { getParser, getSupportedFormats, parseFile } from "./parsers/index.js";
export { findScanFiles } from "./storage/index.js";
export { fuseFiles, fuseInput, orderScanFiles } from "./pipeline.js";
export type { ScanFile } from "./pipeline.js";
export { Enricher, loadReferenceData } from "./enrich/enricher.js";
export { analyze } from "./analysis/analyzer.js";
export { buildReportContext, prepareReport } from "./report.js";
export { renderTerminalReport } from "./render/terminal.js";
export { renderHtmlReport, writeHtmlReport } from "./render/html.js";
export { buildWorkbook, writeExcelReport } from "./render/excel.js";
export { loadConfig } from "./config.js";
export type { ScanFusionConfig } from "./config.js";
export * from "./types.js";
