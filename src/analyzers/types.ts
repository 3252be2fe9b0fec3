export const RISK_KINDS = [
  "EmbeddedJavaScript",
  "LaunchAction",
  "EmbeddedFile",
  "AutoAction",
  "SuspiciousStream",
  "Other"
] as const;

export type RiskKind = (typeof RISK_KINDS)[number];

export type Severity = "High" | "Medium" | "Low";

export type Verdict = "Clean" | "Warning" | "Dangerous";

export type ObjectRef = {
  object_number: number;
  generation: number;
};

export type RiskIndicator = {
  kind: RiskKind;
  object_reference: ObjectRef;
  description: string;
  severity: Severity;
};

export type ScanReport = {
  document_id: string;
  indicators: RiskIndicator[];
  overall_verdict: Verdict;
};

// What an analyzer reports before severity is attached by the scanner.
export type RuleMatch = {
  kind: RiskKind;
  object_reference: ObjectRef;
  description: string;
};
