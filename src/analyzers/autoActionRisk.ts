import { PDFDict, PDFName, PDFRef, type PDFObject } from "pdf-lib";
import type { GraphObject, ObjectGraph } from "../pdf/graph.js";
import { Names, actionType, findDicts, nameText, toObjectRef } from "../pdf/objects.js";
import type { ObjectRef, RuleMatch } from "./types.js";

export type AutoTrigger = {
  holder: GraphObject;
  holder_dict: PDFDict;
  key: PDFName;
  /** The referenced action (or /AA dictionary) when the entry is indirect, the holder otherwise. */
  location: ObjectRef;
  description: string;
};

/**
 * Every /OpenAction and /AA entry in the graph that fires an action on its own.
 * An /OpenAction that is a destination array, or a /GoTo without /Next, only
 * navigates and is left out.
 */
export function findAutoTriggers(graph: ObjectGraph): AutoTrigger[] {
  const out: AutoTrigger[] = [];
  for (const holder of graph.objects) {
    const dicts = findDicts(holder.value, (d) => d.has(Names.OpenAction) || d.has(Names.AA));
    for (const dict of dicts) {
      const openAction = openActionDescription(graph, dict.get(Names.OpenAction));
      if (openAction !== undefined) {
        out.push(trigger(holder, dict, Names.OpenAction, openAction));
      }
      const additional = additionalActionsDescription(graph, dict.get(Names.AA));
      if (additional !== undefined) {
        out.push(trigger(holder, dict, Names.AA, additional));
      }
    }
  }
  return out;
}

export function analyzeAutoActionRisk(graph: ObjectGraph): RuleMatch[] {
  return findAutoTriggers(graph).map((t) => ({
    kind: "AutoAction",
    object_reference: t.location,
    description: t.description
  }));
}

function trigger(holder: GraphObject, dict: PDFDict, key: PDFName, description: string): AutoTrigger {
  const entry = dict.get(key);
  return {
    holder,
    holder_dict: dict,
    key,
    location: entry instanceof PDFRef ? toObjectRef(entry) : holder.object_reference,
    description
  };
}

function openActionDescription(graph: ObjectGraph, entry: PDFObject | undefined): string | undefined {
  const action = graph.context.lookup(entry);
  if (!(action instanceof PDFDict)) return undefined;
  const s = actionType(action);
  if (s === undefined) return undefined;
  if (s === Names.GoTo && !action.has(Names.Next)) return undefined;
  return `/OpenAction runs a /${nameText(s)} action when the document opens`;
}

function additionalActionsDescription(graph: ObjectGraph, entry: PDFObject | undefined): string | undefined {
  const aa = graph.context.lookup(entry);
  if (!(aa instanceof PDFDict)) return undefined;
  const triggers = aa
    .entries()
    .filter(([, action]) => graph.context.lookup(action) instanceof PDFDict)
    .map(([event]) => nameText(event));
  if (triggers.length === 0) return undefined;
  return `/AA fires actions on ${triggers.join(", ")}`;
}
