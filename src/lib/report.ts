import type { ObjectRef, RiskKind, ScanReport, Severity } from "../analyzers/types.js";
import { formatRef } from "../pdf/objects.js";
import { countBySeverity } from "./verdict.js";

export type IndicatorView = {
  kind: RiskKind;
  severity: Severity;
  location: string;
  object_reference: ObjectRef;
  description: string;
};

export function toIndicatorViews(report: ScanReport): IndicatorView[] {
  return report.indicators.map((i) => ({
    kind: i.kind,
    severity: i.severity,
    location: formatRef(i.object_reference),
    object_reference: i.object_reference,
    description: i.description
  }));
}

export function formatReportText(report: ScanReport, fileName?: string): string {
  const subject = fileName ? `${fileName} (sha256 ${report.document_id})` : `sha256 ${report.document_id}`;
  const lines = [`PDF security report for ${subject}`];

  if (report.indicators.length === 0) {
    lines.push("Verdict: Clean (no risk indicators)");
    return lines.join("\n");
  }

  const counts = countBySeverity(report.indicators);
  const noun = report.indicators.length === 1 ? "indicator" : "indicators";
  lines.push(
    `Verdict: ${report.overall_verdict} (${report.indicators.length} ${noun}: ` +
      `${counts.High} high, ${counts.Medium} medium, ${counts.Low} low)`
  );
  for (const v of toIndicatorViews(report)) {
    lines.push(`- [${v.severity}] ${v.kind} at ${v.location}: ${v.description}`);
  }
  return lines.join("\n");
}
