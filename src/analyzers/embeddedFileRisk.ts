import { PDFDict, PDFName, PDFRef, PDFStream } from "pdf-lib";
import { refKey, type ObjectGraph } from "../pdf/graph.js";
import { Names, findDicts } from "../pdf/objects.js";
import type { RuleMatch } from "./types.js";

/** An `/EF` entry of a file specification that points at an attachment stream. */
export type AttachmentLink = { ef: PDFDict; key: PDFName };

export function isEmbeddedFileStream(value: unknown): value is PDFStream {
  return value instanceof PDFStream && value.dict.lookup(Names.Type) === Names.EmbeddedFile;
}

/**
 * Streams reached through an `/EF` dictionary, keyed by reference. `/Type` is
 * optional on an embedded file stream, so the link is what makes it one.
 */
export function findAttachmentLinks(graph: ObjectGraph): Map<string, AttachmentLink[]> {
  const links = new Map<string, AttachmentLink[]>();
  for (const obj of graph.objects) {
    for (const spec of findDicts(obj.value, (d) => d.has(Names.EF))) {
      const ef = spec.lookup(Names.EF);
      if (!(ef instanceof PDFDict)) continue;
      for (const [key, entry] of ef.entries()) {
        if (!(entry instanceof PDFRef) || !(graph.context.lookup(entry) instanceof PDFStream)) continue;
        const k = refKey(entry);
        links.set(k, [...(links.get(k) ?? []), { ef, key }]);
      }
    }
  }
  return links;
}

export function analyzeEmbeddedFileRisk(graph: ObjectGraph): RuleMatch[] {
  const attached = findAttachmentLinks(graph);
  const matches: RuleMatch[] = [];
  for (const obj of graph.objects) {
    if (!(obj.value instanceof PDFStream)) continue;
    if (!isEmbeddedFileStream(obj.value) && !attached.has(refKey(obj.ref))) continue;
    matches.push({
      kind: "EmbeddedFile",
      object_reference: obj.object_reference,
      description: `Embedded file stream (${obj.value.getContentsSize()} encoded bytes)`
    });
  }
  return matches;
}
