import { PDFDict, type PDFObject } from "pdf-lib";
import type { ObjectGraph } from "../pdf/graph.js";
import { Names, findDicts, isLaunchAction, preview, textOf } from "../pdf/objects.js";
import type { RuleMatch } from "./types.js";

export function analyzeLaunchRisk(graph: ObjectGraph): RuleMatch[] {
  const matches: RuleMatch[] = [];
  for (const obj of graph.objects) {
    const actions = findDicts(obj.value, isLaunchAction);
    if (actions.length === 0) continue;
    const target = launchTarget(actions[0]);
    matches.push({
      kind: "LaunchAction",
      object_reference: obj.object_reference,
      description: target === undefined ? "Launch action with no target" : `Launch action targeting "${preview(target)}"`
    });
  }
  return matches;
}

// /F is a file specification: a string, or a dictionary with /UF or /F.
// The Windows-specific launch parameters keep theirs under /Win.
function launchTarget(action: PDFDict): string | undefined {
  return fileSpecText(action.lookup(Names.F)) ?? winTarget(action);
}

function winTarget(action: PDFDict): string | undefined {
  const win = action.lookup(Names.Win);
  return win instanceof PDFDict ? textOf(win.lookup(Names.F)) : undefined;
}

function fileSpecText(spec: PDFObject | undefined): string | undefined {
  if (spec instanceof PDFDict) return textOf(spec.lookup(Names.UF)) ?? textOf(spec.lookup(Names.F));
  return textOf(spec);
}
