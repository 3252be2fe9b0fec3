import { PDFArray, PDFDict, PDFDocument, PDFRef, type PDFContext, type PDFObject } from "pdf-lib";
import type { ObjectRef } from "../analyzers/types.js";
import { sha256HexBytes } from "../lib/canonicalJson.js";
import { MalformedDocumentError, UnsupportedEncryptionError, errorMessage } from "../lib/errors.js";
import { Names, compareRefs, formatRef, toObjectRef } from "./objects.js";

export type GraphObject = {
  ref: PDFRef;
  object_reference: ObjectRef;
  value: PDFObject;
};

export type ObjectGraph = {
  document_id: string;
  document: PDFDocument;
  context: PDFContext;
  root: PDFRef;
  /** Indirect objects in ascending (object number, generation) order. */
  objects: GraphObject[];
  /** Keys ("n g R") of the catalog and every page-tree node reachable from it. */
  structural: Set<string>;
};

const HEADER_WINDOW = 1024;
const TRAILER_WINDOW = 1024;
const ENCRYPT_ENTRY = /\/Encrypt\s*(?:\d+\s+\d+\s+R|<<)/;
const TRAILER_DICT = /(?:^|[\r\n])trailer\s*<<([\s\S]*?)startxref/g;
// An object dictionary directly followed by stream data, not crossing into another object.
const STREAM_DICT = /\d+\s+\d+\s+obj\s*<<((?:(?!endobj)[\s\S])*?)>>\s*stream/g;
const XREF_TYPE = /\/Type\s*\/XRef\b/;

export async function loadObjectGraph(bytes: Uint8Array): Promise<ObjectGraph> {
  if (bytes.byteLength === 0) {
    throw new MalformedDocumentError("document is empty");
  }

  const text = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("latin1");
  if (!text.slice(0, HEADER_WINDOW).includes("%PDF-")) {
    throw new MalformedDocumentError("missing %PDF- header");
  }
  if (!text.slice(-TRAILER_WINDOW).includes("%%EOF")) {
    throw new MalformedDocumentError("missing %%EOF marker; the file appears to be truncated");
  }
  // Encrypted object streams do not parse, so this has to be caught before loading.
  if (declaresEncryption(text)) {
    throw new UnsupportedEncryptionError();
  }

  let document: PDFDocument;
  try {
    // pdf-lib reads the body linearly rather than trusting xref offsets, which
    // also covers files whose cross-reference table is missing or wrong.
    document = await PDFDocument.load(new Uint8Array(bytes), {
      ignoreEncryption: true,
      updateMetadata: false,
      throwOnInvalidObject: true
    });
  } catch (e) {
    throw new MalformedDocumentError(`unable to parse PDF: ${errorMessage(e)}`, { cause: e });
  }

  const context = document.context;
  if (document.isEncrypted || context.trailerInfo.Encrypt !== undefined) {
    throw new UnsupportedEncryptionError();
  }

  const root = context.trailerInfo.Root;
  if (!(root instanceof PDFRef)) {
    throw new MalformedDocumentError("trailer has no /Root reference");
  }
  const catalog = context.lookup(root);
  if (!(catalog instanceof PDFDict)) {
    throw new MalformedDocumentError(`document catalog ${root.toString()} is missing or not a dictionary`);
  }
  if (!(catalog.lookup(Names.Pages) instanceof PDFDict)) {
    throw new MalformedDocumentError("document catalog has no /Pages dictionary");
  }

  const objects = context
    .enumerateIndirectObjects()
    .map(([ref, value]) => ({ ref, object_reference: toObjectRef(ref), value }))
    .sort((a, b) => compareRefs(a.object_reference, b.object_reference));

  return {
    document_id: sha256HexBytes(bytes),
    document,
    context,
    root,
    objects,
    structural: collectStructuralRefs(context, root, catalog)
  };
}

// Only trailers and cross-reference stream dictionaries can carry /Encrypt.
function declaresEncryption(text: string): boolean {
  for (const m of text.matchAll(TRAILER_DICT)) {
    if (ENCRYPT_ENTRY.test(m[1])) return true;
  }
  for (const m of text.matchAll(STREAM_DICT)) {
    if (XREF_TYPE.test(m[1]) && ENCRYPT_ENTRY.test(m[1])) return true;
  }
  return false;
}

export function refKey(ref: ObjectRef | PDFRef): string {
  return ref instanceof PDFRef ? formatRef(toObjectRef(ref)) : formatRef(ref);
}

function collectStructuralRefs(context: PDFContext, root: PDFRef, catalog: PDFDict): Set<string> {
  const out = new Set<string>([refKey(root)]);
  const pending: Array<PDFObject | undefined> = [catalog.get(Names.Pages)];
  while (pending.length > 0) {
    const next = pending.pop();
    if (!(next instanceof PDFRef) || out.has(refKey(next))) continue;
    out.add(refKey(next));
    const node = context.lookup(next);
    if (!(node instanceof PDFDict)) continue;
    const kids = node.lookup(Names.Kids);
    if (kids instanceof PDFArray) pending.push(...kids.asArray());
  }
  return out;
}
