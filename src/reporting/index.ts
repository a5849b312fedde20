export type { ReportInput, ReportRenderer } from "./types.js";
export { createReportData, type ReportData } from "./data.js";
export { ReportGenerator, HTML_REPORT_FILENAME, JSON_REPORT_FILENAME } from "./generator.js";
