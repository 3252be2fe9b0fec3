import { analyzeAutoActionRisk } from "../analyzers/autoActionRisk.js";
import { SEVERITY_BY_KIND } from "../analyzers/catalog.js";
import { analyzeEmbeddedFileRisk } from "../analyzers/embeddedFileRisk.js";
import { analyzeJavaScriptRisk } from "../analyzers/javascriptRisk.js";
import { analyzeLaunchRisk } from "../analyzers/launchRisk.js";
import { analyzeOtherRisk } from "../analyzers/otherRisk.js";
import { analyzeStreamRisk } from "../analyzers/streamRisk.js";
import { RISK_KINDS, type RiskIndicator, type RuleMatch, type ScanReport } from "../analyzers/types.js";
import { loadObjectGraph, refKey, type ObjectGraph } from "../pdf/graph.js";
import { compareRefs } from "../pdf/objects.js";
import { UploadTooLargeError } from "./errors.js";
import { computeVerdict } from "./verdict.js";

export type ScanOptions = {
  /** Upper bound on the document size, normally the upload limit of the caller. */
  maxDocumentBytes?: number;
};

export async function scanDocument(bytes: Uint8Array, options: ScanOptions = {}): Promise<ScanReport> {
  assertWithinLimit(bytes, options.maxDocumentBytes);
  const graph = await loadObjectGraph(bytes);
  return runScan(graph);
}

export function runScan(graph: ObjectGraph): ScanReport {
  const indicators = collectMatches(graph)
    .map(toIndicator)
    .sort((a, b) => compareRefs(a.object_reference, b.object_reference) || kindOrder(a) - kindOrder(b));
  return {
    document_id: graph.document_id,
    indicators,
    overall_verdict: computeVerdict(indicators)
  };
}

export function assertWithinLimit(bytes: Uint8Array, maxDocumentBytes: number | undefined): void {
  if (maxDocumentBytes !== undefined && bytes.byteLength > maxDocumentBytes) {
    throw new UploadTooLargeError(maxDocumentBytes, bytes.byteLength);
  }
}

function collectMatches(graph: ObjectGraph): RuleMatch[] {
  const all = [
    ...analyzeJavaScriptRisk(graph),
    ...analyzeLaunchRisk(graph),
    ...analyzeEmbeddedFileRisk(graph),
    ...analyzeAutoActionRisk(graph),
    ...analyzeStreamRisk(graph),
    ...analyzeOtherRisk(graph)
  ];

  // One indicator per kind and object; the first description wins.
  const seen = new Set<string>();
  const out: RuleMatch[] = [];
  for (const m of all) {
    const key = `${m.kind}|${refKey(m.object_reference)}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(m);
  }
  return out;
}

function toIndicator(m: RuleMatch): RiskIndicator {
  return {
    kind: m.kind,
    object_reference: m.object_reference,
    description: m.description,
    severity: SEVERITY_BY_KIND[m.kind]
  };
}

function kindOrder(indicator: RiskIndicator): number {
  return RISK_KINDS.indexOf(indicator.kind);
}
