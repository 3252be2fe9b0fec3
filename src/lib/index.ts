export type { ObjectRef, RiskIndicator, RiskKind, ScanReport, Severity, Verdict } from "../analyzers/types.js";
export { RULES, SEVERITY_BY_KIND, type RuleDef } from "../analyzers/catalog.js";
export { scanDocument, type ScanOptions } from "./scanner.js";
export { sanitizeDocument, type SanitizeOptions } from "./sanitizer.js";
export { formatReportText, toIndicatorViews, type IndicatorView } from "./report.js";
export { computeVerdict, countBySeverity, type SeverityCounts } from "./verdict.js";
export {
  IrreparableStructureError,
  MalformedDocumentError,
  NothingToSanitizeError,
  PdfWardenError,
  ReportMismatchError,
  UnsupportedEncryptionError,
  UploadTooLargeError,
  type ErrorCode
} from "./errors.js";
