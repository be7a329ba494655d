export { ConsoleReportSink, formatListing } from "./consoleSink.js";
export { CsvReportSink } from "./csvSink.js";
export { REPORT_COLUMNS, escapeCsv, formatCsv, toReportRow, type ReportRow } from "./rows.js";
