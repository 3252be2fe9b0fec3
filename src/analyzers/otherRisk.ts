import { PDFDict } from "pdf-lib";
import type { ObjectGraph } from "../pdf/graph.js";
import { Names, actionType, findDicts, nameText } from "../pdf/objects.js";
import type { RuleMatch } from "./types.js";

// Actions that send data out of the document or pull other documents in.
const OTHER_ACTIONS = new Set(["SubmitForm", "ImportData", "GoToR", "GoToE", "RichMediaExecute"]);

export function isOtherAction(dict: PDFDict): boolean {
  const s = actionType(dict);
  return s !== undefined && OTHER_ACTIONS.has(nameText(s));
}

export function hasXfa(dict: PDFDict): boolean {
  return dict.has(Names.XFA);
}

export function analyzeOtherRisk(graph: ObjectGraph): RuleMatch[] {
  const matches: RuleMatch[] = [];
  for (const obj of graph.objects) {
    const found = findDicts(obj.value, (d) => isOtherAction(d) || hasXfa(d));
    if (found.length === 0) continue;
    const labels = [...new Set(found.map(describe))];
    matches.push({
      kind: "Other",
      object_reference: obj.object_reference,
      description: labels.join("; ")
    });
  }
  return matches;
}

function describe(dict: PDFDict): string {
  const s = actionType(dict);
  if (s !== undefined && OTHER_ACTIONS.has(nameText(s))) return `/${nameText(s)} action`;
  return "XFA form definition";
}
