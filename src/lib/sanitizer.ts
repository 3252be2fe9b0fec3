import { PDFDict, PDFName, PDFRawStream, PDFRef, PDFStream } from "pdf-lib";
import { findAutoTriggers } from "../analyzers/autoActionRisk.js";
import { findAttachmentLinks, isEmbeddedFileStream } from "../analyzers/embeddedFileRisk.js";
import { hasXfa, isOtherAction } from "../analyzers/otherRisk.js";
import type { RiskIndicator, ScanReport } from "../analyzers/types.js";
import { loadObjectGraph, refKey, type GraphObject, type ObjectGraph } from "../pdf/graph.js";
import { Names, findDicts, formatRef, isJavaScriptAction, isLaunchAction } from "../pdf/objects.js";
import { sha256HexBytes } from "./canonicalJson.js";
import { IrreparableStructureError, NothingToSanitizeError, ReportMismatchError } from "./errors.js";
import { assertWithinLimit, runScan, type ScanOptions } from "./scanner.js";

export type SanitizeOptions = ScanOptions;

type StreamRemedy = "placeholder" | "drop";

type RemedyPlan = {
  clear: PDFDict[];
  remove_entries: Array<{ dict: PDFDict; key: PDFName }>;
  streams: Map<string, { ref: PDFRef; remedy: StreamRemedy }>;
};

// Entries that describe the encoded data; meaningless once the data is gone.
const STREAM_ENCODING_KEYS = [
  Names.Filter,
  Names.DecodeParms,
  Names.Length,
  Names.DL,
  Names.F,
  Names.FFilter,
  Names.FDecodeParms
];

/**
 * Produces a copy of `bytes` with every construct named in `report` removed or
 * neutralized. Nothing is returned unless the copy re-scans as Clean.
 */
export async function sanitizeDocument(
  bytes: Uint8Array,
  report: ScanReport,
  options: SanitizeOptions = {}
): Promise<Uint8Array> {
  if (report.overall_verdict === "Clean") throw new NothingToSanitizeError();
  assertWithinLimit(bytes, options.maxDocumentBytes);
  if (sha256HexBytes(bytes) !== report.document_id) throw new ReportMismatchError();

  const graph = await loadObjectGraph(bytes);
  const plan = planRemedies(graph, report.indicators);
  applyPlan(graph, plan);

  const sanitized = await graph.document.save({
    useObjectStreams: false,
    addDefaultPage: false,
    updateFieldAppearances: false
  });

  const rescan = runScan(await loadObjectGraph(sanitized));
  if (rescan.overall_verdict !== "Clean") {
    const left = rescan.indicators.map((i) => `${i.kind} at ${formatRef(i.object_reference)}`).join(", ");
    throw new IrreparableStructureError(`sanitized output still carries risk indicators: ${left}`);
  }
  return sanitized;
}

export function planRemedies(graph: ObjectGraph, indicators: readonly RiskIndicator[]): RemedyPlan {
  const plan: RemedyPlan = { clear: [], remove_entries: [], streams: new Map() };
  const byKey = new Map(graph.objects.map((o) => [refKey(o.ref), o]));
  const triggers = findAutoTriggers(graph);
  const attachments = findAttachmentLinks(graph);

  for (const indicator of indicators) {
    const key = refKey(indicator.object_reference);
    const obj = byKey.get(key);
    if (!obj) {
      throw new IrreparableStructureError(`object ${key} named in the report does not exist in the document`);
    }

    switch (indicator.kind) {
      case "EmbeddedJavaScript":
        for (const action of clearableActions(graph, obj, isJavaScriptAction)) {
          const script = action.get(Names.JS);
          if (script instanceof PDFRef && graph.context.lookup(script) instanceof PDFStream) {
            addStream(plan, script, "drop");
          }
          plan.clear.push(action);
        }
        break;
      case "LaunchAction":
        plan.clear.push(...clearableActions(graph, obj, isLaunchAction));
        break;
      case "Other":
        plan.clear.push(...clearableActions(graph, obj, isOtherAction));
        for (const dict of findDicts(obj.value, hasXfa)) {
          plan.remove_entries.push({ dict, key: Names.XFA });
        }
        break;
      case "AutoAction":
        for (const t of triggers) {
          if (refKey(t.location) === key) plan.remove_entries.push({ dict: t.holder_dict, key: t.key });
        }
        break;
      case "EmbeddedFile": {
        const links = attachments.get(key) ?? [];
        if (!isEmbeddedFileStream(obj.value) && links.length === 0) break;
        addStream(plan, obj.ref, "placeholder");
        for (const { ef, key: entry } of links) plan.remove_entries.push({ dict: ef, key: entry });
        break;
      }
      case "SuspiciousStream":
        if (obj.value instanceof PDFStream) addStream(plan, obj.ref, "drop");
        break;
    }
  }
  return plan;
}

function clearableActions(graph: ObjectGraph, obj: GraphObject, test: (dict: PDFDict) => boolean): PDFDict[] {
  const actions = findDicts(obj.value, test);
  if (actions.some((a) => a === obj.value) && graph.structural.has(refKey(obj.ref))) {
    const role = obj.ref === graph.root ? "document catalog" : "page tree node";
    throw new IrreparableStructureError(
      `object ${refKey(obj.ref)} is the ${role} and is itself an action dictionary; emptying it would break the document`
    );
  }
  return actions;
}

function addStream(plan: RemedyPlan, ref: PDFRef, remedy: StreamRemedy): void {
  const key = refKey(ref);
  // A placeholder already drops the data, so it wins over a plain drop.
  if (plan.streams.get(key)?.remedy === "placeholder") return;
  plan.streams.set(key, { ref, remedy });
}

function applyPlan(graph: ObjectGraph, plan: RemedyPlan): void {
  for (const { dict, key } of plan.remove_entries) dict.delete(key);

  for (const dict of plan.clear) {
    for (const key of dict.keys()) dict.delete(key);
  }

  for (const { ref, remedy } of plan.streams.values()) {
    const current = graph.context.lookup(ref);
    if (!(current instanceof PDFStream)) continue;
    const dict = graph.context.obj({});
    if (remedy === "drop") {
      for (const [key, value] of current.dict.entries()) {
        if (!STREAM_ENCODING_KEYS.includes(key)) dict.set(key, value);
      }
    }
    graph.context.assign(ref, PDFRawStream.of(dict, new Uint8Array(0)));
  }
}
