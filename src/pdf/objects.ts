import { PDFArray, PDFDict, PDFHexString, PDFName, PDFRef, PDFStream, PDFString, type PDFObject } from "pdf-lib";
import type { ObjectRef } from "../analyzers/types.js";

export const Names = {
  AA: PDFName.of("AA"),
  DecodeParms: PDFName.of("DecodeParms"),
  DL: PDFName.of("DL"),
  EF: PDFName.of("EF"),
  EmbeddedFile: PDFName.of("EmbeddedFile"),
  F: PDFName.of("F"),
  FDecodeParms: PDFName.of("FDecodeParms"),
  FFilter: PDFName.of("FFilter"),
  Filter: PDFName.of("Filter"),
  GoTo: PDFName.of("GoTo"),
  JavaScript: PDFName.of("JavaScript"),
  JS: PDFName.of("JS"),
  Kids: PDFName.of("Kids"),
  Launch: PDFName.of("Launch"),
  Length: PDFName.of("Length"),
  Next: PDFName.of("Next"),
  OpenAction: PDFName.of("OpenAction"),
  Pages: PDFName.of("Pages"),
  S: PDFName.of("S"),
  Type: PDFName.of("Type"),
  UF: PDFName.of("UF"),
  Win: PDFName.of("Win"),
  XFA: PDFName.of("XFA")
} as const;

export function toObjectRef(ref: PDFRef): ObjectRef {
  return { object_number: ref.objectNumber, generation: ref.generationNumber };
}

export function formatRef(ref: ObjectRef): string {
  return `${ref.object_number} ${ref.generation} R`;
}

export function compareRefs(a: ObjectRef, b: ObjectRef): number {
  return a.object_number - b.object_number || a.generation - b.generation;
}

/** "/JavaScript" → "JavaScript". */
export function nameText(name: PDFName): string {
  return name.asString().replace(/^\//, "");
}

export function textOf(value: PDFObject | undefined): string | undefined {
  if (value instanceof PDFString || value instanceof PDFHexString) return value.decodeText();
  return undefined;
}

export function preview(text: string, max = 60): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  return collapsed.length > max ? `${collapsed.slice(0, max)}...` : collapsed;
}

/**
 * Collects every dictionary reachable from `value` through direct objects
 * (nested dictionaries, arrays and stream dictionaries) that satisfies `test`.
 * Indirect references are not followed: each indirect object is visited on its own.
 */
export function findDicts(value: PDFObject, test: (dict: PDFDict) => boolean): PDFDict[] {
  const out: PDFDict[] = [];
  const stack: PDFObject[] = [value];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current instanceof PDFStream) {
      stack.push(current.dict);
      continue;
    }
    if (current instanceof PDFDict) {
      if (test(current)) out.push(current);
      const children = current.entries().map(([, child]) => child);
      for (let i = children.length - 1; i >= 0; i -= 1) stack.push(children[i]);
      continue;
    }
    if (current instanceof PDFArray) {
      const items = current.asArray();
      for (let i = items.length - 1; i >= 0; i -= 1) stack.push(items[i]);
    }
  }
  return out;
}

/** The action type of an action dictionary (`/S`), if it has one. */
export function actionType(dict: PDFDict): PDFName | undefined {
  const s = dict.lookup(Names.S);
  return s instanceof PDFName ? s : undefined;
}

export function isJavaScriptAction(dict: PDFDict): boolean {
  return actionType(dict) === Names.JavaScript || dict.has(Names.JS);
}

export function isLaunchAction(dict: PDFDict): boolean {
  return actionType(dict) === Names.Launch;
}
