import type { RiskIndicator, Severity, Verdict } from "../analyzers/types.js";

export type SeverityCounts = Record<Severity, number>;

export function countBySeverity(indicators: readonly RiskIndicator[]): SeverityCounts {
  const counts: SeverityCounts = { High: 0, Medium: 0, Low: 0 };
  for (const i of indicators) counts[i.severity] += 1;
  return counts;
}

/** Clean iff there are no indicators, Dangerous iff any is High, Warning otherwise. */
export function computeVerdict(indicators: readonly RiskIndicator[]): Verdict {
  if (indicators.length === 0) return "Clean";
  if (indicators.some((i) => i.severity === "High")) return "Dangerous";
  return "Warning";
}
