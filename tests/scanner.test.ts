import { deflateSync } from "node:zlib";
import { describe, expect, test } from "vitest";
import { PDFDocument, PDFName, PDFString } from "pdf-lib";
import { scanDocument } from "../src/lib/scanner.js";
import { canonicalJson } from "../src/lib/canonicalJson.js";
import { UploadTooLargeError } from "../src/lib/errors.js";
import { buildPdf, cleanPdf, fakePortableExecutable, onePageObjects, openActionJavaScriptPdf } from "./fixtures/pdf.js";

const ref = (object_number: number) => ({ object_number, generation: 0 });

describe("scanner", () => {
  test("a plain text document is clean", async () => {
    const report = await scanDocument(cleanPdf());
    expect(report.indicators).toEqual([]);
    expect(report.overall_verdict).toBe("Clean");
  });

  test("an /OpenAction pointing at a JavaScript action is flagged twice on the same object", async () => {
    const report = await scanDocument(openActionJavaScriptPdf());
    expect(report.indicators).toEqual([
      {
        kind: "EmbeddedJavaScript",
        object_reference: ref(6),
        description: 'JavaScript action (script "app.alert(1)")',
        severity: "High"
      },
      {
        kind: "AutoAction",
        object_reference: ref(6),
        description: "/OpenAction runs a /JavaScript action when the document opens",
        severity: "Medium"
      }
    ]);
    expect(report.overall_verdict).toBe("Dangerous");
  });

  test("one indicator per object even when it nests several scripts", async () => {
    const bytes = buildPdf([
      ...onePageObjects({ page: "/Annots [7 0 R 8 0 R]" }),
      { num: 7, body: "<< /Type /Annot /Subtype /Link /Rect [0 0 10 10] /A << /S /JavaScript /JS (a()) >> >>" },
      {
        num: 8,
        body:
          "<< /Type /Annot /Subtype /Link /Rect [0 0 10 10] " +
          "/A << /S /JavaScript /JS (b()) /Next << /S /JavaScript /JS (c()) >> >> >>"
      }
    ]);
    const report = await scanDocument(bytes);
    expect(report.indicators.map((i) => [i.kind, i.object_reference.object_number, i.description])).toEqual([
      ["EmbeddedJavaScript", 7, 'JavaScript action (script "a()")'],
      ["EmbeddedJavaScript", 8, '2 JavaScript actions (script "b()")']
    ]);
  });

  test("a script held in a stream is described by its reference", async () => {
    const bytes = buildPdf([
      ...onePageObjects({ page: "/Annots [7 0 R]" }),
      { num: 6, dict: "", stream: "app.launchURL('x')" },
      { num: 7, body: "<< /Type /Annot /Subtype /Link /Rect [0 0 10 10] /A << /S /JavaScript /JS 6 0 R >> >>" }
    ]);
    const report = await scanDocument(bytes);
    expect(report.indicators).toEqual([
      {
        kind: "EmbeddedJavaScript",
        object_reference: ref(7),
        description: "JavaScript action (script in 6 0 R)",
        severity: "High"
      }
    ]);
  });

  test("launch actions name their target", async () => {
    const bytes = buildPdf([
      ...onePageObjects({ page: "/Annots [7 0 R 8 0 R]" }),
      { num: 7, body: "<< /Type /Annot /Subtype /Link /Rect [0 0 10 10] /A << /S /Launch /F (calc.exe) >> >>" },
      {
        num: 8,
        body: "<< /Type /Annot /Subtype /Link /Rect [0 0 10 10] /A << /S /Launch /Win << /F (cmd.exe) /P (/c dir) >> >> >>"
      }
    ]);
    const report = await scanDocument(bytes);
    expect(report.indicators).toEqual([
      { kind: "LaunchAction", object_reference: ref(7), description: 'Launch action targeting "calc.exe"', severity: "High" },
      { kind: "LaunchAction", object_reference: ref(8), description: 'Launch action targeting "cmd.exe"', severity: "High" }
    ]);
    expect(report.overall_verdict).toBe("Dangerous");
  });

  test("embedded files are a warning", async () => {
    const bytes = buildPdf([
      ...onePageObjects({ catalog: "/Names << /EmbeddedFiles << /Names [(a.txt) 7 0 R] >> >>" }),
      { num: 6, dict: "/Type /EmbeddedFile", stream: "hello attachment" },
      { num: 7, body: "<< /Type /Filespec /F (a.txt) /EF << /F 6 0 R >> >>" }
    ]);
    const report = await scanDocument(bytes);
    expect(report.indicators).toEqual([
      {
        kind: "EmbeddedFile",
        object_reference: ref(6),
        description: "Embedded file stream (16 encoded bytes)",
        severity: "Medium"
      }
    ]);
    expect(report.overall_verdict).toBe("Warning");
  });

  test("an attachment stream without /Type is found through its file specification", async () => {
    const bytes = buildPdf([
      ...onePageObjects({ catalog: "/Names << /EmbeddedFiles << /Names [(notes.exe) 7 0 R] >> >>" }),
      { num: 6, dict: "", stream: "hello attachment" },
      { num: 7, body: "<< /Type /Filespec /F (notes.exe) /EF << /F 6 0 R >> >>" }
    ]);
    const report = await scanDocument(bytes);
    expect(report.indicators).toEqual([
      {
        kind: "EmbeddedFile",
        object_reference: ref(6),
        description: "Embedded file stream (16 encoded bytes)",
        severity: "Medium"
      }
    ]);
    expect(report.overall_verdict).toBe("Warning");
  });

  test("additional actions are located on the dictionary that holds them when inline", async () => {
    const bytes = buildPdf([
      ...onePageObjects({ page: "/AA << /O 6 0 R /C 6 0 R >>" }),
      { num: 6, body: "<< /S /URI /URI (https://example.com/) >>" }
    ]);
    const report = await scanDocument(bytes);
    expect(report.indicators).toEqual([
      { kind: "AutoAction", object_reference: ref(3), description: "/AA fires actions on O, C", severity: "Medium" }
    ]);
  });

  test("navigation-only open actions are not flagged", async () => {
    const destination = await scanDocument(buildPdf(onePageObjects({ catalog: "/OpenAction [3 0 R /Fit]" })));
    const goTo = await scanDocument(buildPdf(onePageObjects({ catalog: "/OpenAction << /S /GoTo /D [3 0 R /Fit] >>" })));
    expect(destination.overall_verdict).toBe("Clean");
    expect(goTo.overall_verdict).toBe("Clean");
  });

  test("suspicious streams", async () => {
    const elf = Buffer.alloc(32, 0);
    Buffer.from([0x7f, 0x45, 0x4c, 0x46, 2, 1, 1]).copy(elf);
    const bytes = buildPdf([
      ...onePageObjects(),
      { num: 6, dict: "/Filter /FooDecode", stream: "abc" },
      { num: 7, dict: "/Filter /FlateDecode", stream: "not really compressed" },
      { num: 8, dict: "/Filter /FlateDecode", stream: deflateSync(elf) },
      { num: 9, dict: "", stream: fakePortableExecutable() },
      { num: 10, dict: "/Filter [/DCTDecode /FlateDecode]", stream: "abc" },
      { num: 11, dict: "/Filter /Crypt", stream: "abc" },
      {
        num: 12,
        dict: "/Type /XObject /Subtype /Image /Width 1 /Height 1 /ColorSpace /DeviceGray /BitsPerComponent 8 /Filter /DCTDecode",
        stream: Buffer.from([0xff, 0xd8, 0xff, 0xd9])
      },
      { num: 13, dict: "/Filter /FlateDecode", stream: deflateSync(Buffer.from("BT (plain text) Tj ET", "latin1")) }
    ]);
    const report = await scanDocument(bytes);
    const byObject = new Map(report.indicators.map((i) => [i.object_reference.object_number, i.description]));

    expect(report.indicators.every((i) => i.kind === "SuspiciousStream" && i.severity === "Low")).toBe(true);
    expect([...byObject.keys()]).toEqual([6, 7, 8, 9, 10, 11]);
    expect(byObject.get(6)).toBe("Suspicious stream: unknown filter /FooDecode");
    expect(byObject.get(7)).toMatch(/^Suspicious stream: data does not decode through \/FlateDecode: /);
    expect(byObject.get(8)).toBe("Suspicious stream: decoded data contains an ELF executable header");
    expect(byObject.get(9)).toBe("Suspicious stream: decoded data contains a Windows PE executable header");
    expect(byObject.get(10)).toBe("Suspicious stream: image codec /DCTDecode is not the last filter");
    expect(byObject.get(11)).toBe("Suspicious stream: /Crypt filter cannot be validated without the document key");
    expect(report.overall_verdict).toBe("Warning");
  });

  test("stages ahead of an image codec are decoded and checked", async () => {
    const bytes = buildPdf([
      ...onePageObjects(),
      { num: 6, dict: "/Filter [/FlateDecode /DCTDecode]", stream: deflateSync(fakePortableExecutable()) },
      { num: 7, dict: "/Filter [/FlateDecode /DCTDecode]", stream: "garbage not flate" },
      {
        num: 8,
        dict: "/Filter [/FlateDecode /DCTDecode] /DecodeParms [null null]",
        stream: deflateSync(Buffer.from([0xff, 0xd8, 0xff, 0xd9]))
      }
    ]);
    const report = await scanDocument(bytes);
    const byObject = new Map(report.indicators.map((i) => [i.object_reference.object_number, i.description]));

    expect([...byObject.keys()]).toEqual([6, 7]);
    expect(byObject.get(6)).toBe("Suspicious stream: decoded data contains a Windows PE executable header");
    expect(byObject.get(7)).toMatch(/^Suspicious stream: data does not decode through \/FlateDecode: /);
  });

  test("an /Encrypt entry inside page text is not mistaken for encryption", async () => {
    const bytes = buildPdf([
      ...onePageObjects(),
      { num: 6, dict: "", stream: "BT /F1 12 Tf 72 700 Td (the trailer says /Encrypt 9 0 R) Tj ET" }
    ]);
    const report = await scanDocument(bytes);
    expect(report.overall_verdict).toBe("Clean");
  });

  test("form submission and XFA are reported as other active content", async () => {
    const bytes = buildPdf([
      ...onePageObjects({ catalog: "/AcroForm << /Fields [] /XFA 6 0 R >>", page: "/Annots [7 0 R]" }),
      { num: 6, dict: "", stream: "<xdp:xdp/>" },
      {
        num: 7,
        body: "<< /Type /Annot /Subtype /Widget /Rect [0 0 10 10] /A << /S /SubmitForm /F (https://example.com/submit) >> >>"
      }
    ]);
    const report = await scanDocument(bytes);
    expect(report.indicators).toEqual([
      { kind: "Other", object_reference: ref(1), description: "XFA form definition", severity: "Low" },
      { kind: "Other", object_reference: ref(7), description: "/SubmitForm action", severity: "Low" }
    ]);
  });

  test("indicators are ordered by object, then by kind", async () => {
    const bytes = buildPdf([
      ...onePageObjects({ catalog: "/OpenAction 9 0 R", page: "/Annots [6 0 R]" }),
      { num: 6, body: "<< /Type /Annot /Subtype /Link /Rect [0 0 10 10] /A << /S /Launch /F (run.sh) >> >>" },
      { num: 9, body: "<< /S /JavaScript /JS (this.print()) >>" }
    ]);
    const report = await scanDocument(bytes);
    expect(report.indicators.map((i) => `${i.kind}@${i.object_reference.object_number}`)).toEqual([
      "LaunchAction@6",
      "EmbeddedJavaScript@9",
      "AutoAction@9"
    ]);
  });

  test("documents written with object streams are scanned", async () => {
    const doc = await PDFDocument.create();
    doc.addPage().drawText("Hello");
    const action = doc.context.register(doc.context.obj({ S: "JavaScript", JS: PDFString.of("app.alert(2)") }));
    doc.catalog.set(PDFName.of("OpenAction"), action);
    const bytes = await doc.save({ useObjectStreams: true });

    const report = await scanDocument(bytes);
    const at = { object_number: action.objectNumber, generation: action.generationNumber };
    expect(report.indicators.map((i) => [i.kind, i.object_reference])).toEqual([
      ["EmbeddedJavaScript", at],
      ["AutoAction", at]
    ]);
  });

  test("scanning is deterministic and leaves the input untouched", async () => {
    const bytes = openActionJavaScriptPdf();
    const before = Buffer.from(bytes);

    const first = await scanDocument(bytes);
    const second = await scanDocument(bytes);

    expect(second).toEqual(first);
    expect(canonicalJson(second)).toBe(canonicalJson(first));
    expect(Buffer.from(bytes).equals(before)).toBe(true);
  });

  test("documents above the size limit are refused before parsing", async () => {
    const scan = scanDocument(new Uint8Array(11), { maxDocumentBytes: 10 });
    await expect(scan).rejects.toBeInstanceOf(UploadTooLargeError);
    await expect(scan).rejects.toThrow("document exceeds the upload limit of 10 bytes (got 11 bytes)");
  });
});
