import { PDFArray, PDFName, PDFRawStream, decodePDFRawStream } from "pdf-lib";
import type { ObjectGraph } from "../pdf/graph.js";
import { Names, nameText } from "../pdf/objects.js";
import { errorMessage } from "../lib/errors.js";
import type { RuleMatch } from "./types.js";

const DECODABLE_FILTERS = new Set(["FlateDecode", "LZWDecode", "ASCIIHexDecode", "ASCII85Decode", "RunLengthDecode"]);
// Image codecs are only ever the last stage of a chain; their output is pixels and is not inspected.
const IMAGE_CODECS = new Set(["DCTDecode", "JPXDecode", "CCITTFaxDecode", "JBIG2Decode"]);

type Signature = { label: string; matches: (data: Buffer) => boolean };

const SIGNATURES: Signature[] = [
  { label: "a Windows PE executable header", matches: isPortableExecutable },
  { label: "an ELF executable header", matches: (d) => startsWith(d, [0x7f, 0x45, 0x4c, 0x46]) },
  {
    label: "a Mach-O executable header",
    matches: (d) =>
      startsWith(d, [0xfe, 0xed, 0xfa, 0xce]) ||
      startsWith(d, [0xfe, 0xed, 0xfa, 0xcf]) ||
      startsWith(d, [0xce, 0xfa, 0xed, 0xfe]) ||
      startsWith(d, [0xcf, 0xfa, 0xed, 0xfe])
  },
  { label: "a script interpreter line (#!)", matches: (d) => startsWith(d, [0x23, 0x21, 0x2f]) },
  { label: "the DOS stub text of a Windows executable", matches: (d) => d.includes("This program cannot be run in DOS mode", 0, "latin1") },
  { label: "a base64-encoded PE header", matches: (d) => d.includes("TVqQAAMAAAAEAAAA", 0, "latin1") }
];

export type FilterChain = { ok: true; filters: string[] } | { ok: false; reason: string };

export function readFilterChain(stream: PDFRawStream): FilterChain {
  const filter = stream.dict.lookup(Names.Filter);
  if (filter === undefined) return { ok: true, filters: [] };
  if (filter instanceof PDFName) return validateChain([nameText(filter)]);
  if (filter instanceof PDFArray) {
    const filters: string[] = [];
    for (let i = 0; i < filter.size(); i += 1) {
      const name = filter.lookup(i);
      if (!(name instanceof PDFName)) return { ok: false, reason: "filter chain contains a non-name entry" };
      filters.push(nameText(name));
    }
    return validateChain(filters);
  }
  return { ok: false, reason: "/Filter is neither a name nor an array" };
}

function validateChain(filters: string[]): FilterChain {
  for (let i = 0; i < filters.length; i += 1) {
    const f = filters[i];
    if (f === "Crypt") return { ok: false, reason: "/Crypt filter cannot be validated without the document key" };
    if (IMAGE_CODECS.has(f)) {
      if (i !== filters.length - 1) return { ok: false, reason: `image codec /${f} is not the last filter` };
      continue;
    }
    if (!DECODABLE_FILTERS.has(f)) return { ok: false, reason: `unknown filter /${f}` };
  }
  return { ok: true, filters };
}

/** Why a stream is suspicious, or undefined when it is not. */
export function inspectStream(stream: PDFRawStream): string | undefined {
  const chain = readFilterChain(stream);
  if (!chain.ok) return chain.reason;

  const codecAt = chain.filters.findIndex((f) => IMAGE_CODECS.has(f));
  if (codecAt === 0) return undefined;
  const filters = codecAt === -1 ? chain.filters : chain.filters.slice(0, codecAt);

  let decoded: Uint8Array;
  try {
    decoded = decodeThrough(stream, filters);
  } catch (e) {
    return `data does not decode through ${filters.map((f) => `/${f}`).join(" ")}: ${errorMessage(e)}`;
  }

  const data = Buffer.from(decoded.buffer, decoded.byteOffset, decoded.byteLength);
  const hit = SIGNATURES.find((s) => s.matches(data));
  return hit ? `decoded data contains ${hit.label}` : undefined;
}

// Decodes through the leading `filters` of the chain only.
function decodeThrough(stream: PDFRawStream, filters: string[]): Uint8Array {
  if (filters.length === 0) return stream.contents;
  const full = stream.dict.lookup(Names.Filter);
  if (!(full instanceof PDFArray) || full.size() === filters.length) return decodePDFRawStream(stream).decode();

  const dict = stream.dict.clone();
  const prefix = PDFArray.withContext(dict.context);
  for (const f of filters) prefix.push(PDFName.of(f));
  dict.set(Names.Filter, prefix);

  const parms = stream.dict.lookup(Names.DecodeParms);
  if (parms instanceof PDFArray) {
    const kept = PDFArray.withContext(dict.context);
    for (let i = 0; i < filters.length && i < parms.size(); i += 1) kept.push(parms.get(i));
    dict.set(Names.DecodeParms, kept);
  } else {
    dict.delete(Names.DecodeParms);
  }
  return decodePDFRawStream(PDFRawStream.of(dict, stream.contents)).decode();
}

export function analyzeStreamRisk(graph: ObjectGraph): RuleMatch[] {
  const matches: RuleMatch[] = [];
  for (const obj of graph.objects) {
    if (!(obj.value instanceof PDFRawStream)) continue;
    const reason = inspectStream(obj.value);
    if (reason === undefined) continue;
    matches.push({
      kind: "SuspiciousStream",
      object_reference: obj.object_reference,
      description: `Suspicious stream: ${reason}`
    });
  }
  return matches;
}

function startsWith(data: Buffer, magic: number[]): boolean {
  if (data.length < magic.length) return false;
  return magic.every((b, i) => data[i] === b);
}

// "MZ", then e_lfanew at 0x3c pointing at "PE\0\0".
function isPortableExecutable(data: Buffer): boolean {
  if (!startsWith(data, [0x4d, 0x5a]) || data.length < 0x40) return false;
  const offset = data.readUInt32LE(0x3c);
  if (offset + 4 > data.length) return false;
  return data[offset] === 0x50 && data[offset + 1] === 0x45 && data[offset + 2] === 0 && data[offset + 3] === 0;
}
