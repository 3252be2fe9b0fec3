import { PDFDict, PDFRef } from "pdf-lib";
import type { ObjectGraph } from "../pdf/graph.js";
import { Names, findDicts, formatRef, isJavaScriptAction, preview, textOf, toObjectRef } from "../pdf/objects.js";
import type { RuleMatch } from "./types.js";

export function analyzeJavaScriptRisk(graph: ObjectGraph): RuleMatch[] {
  const matches: RuleMatch[] = [];
  for (const obj of graph.objects) {
    const actions = findDicts(obj.value, isJavaScriptAction);
    if (actions.length === 0) continue;
    const label = actions.length === 1 ? "JavaScript action" : `${actions.length} JavaScript actions`;
    matches.push({
      kind: "EmbeddedJavaScript",
      object_reference: obj.object_reference,
      description: `${label} (${describeScript(actions[0])})`
    });
  }
  return matches;
}

function describeScript(action: PDFDict): string {
  const js = action.get(Names.JS);
  if (js instanceof PDFRef) return `script in ${formatRef(toObjectRef(js))}`;
  const text = textOf(js);
  if (text !== undefined) return `script "${preview(text)}"`;
  return "no script body";
}
