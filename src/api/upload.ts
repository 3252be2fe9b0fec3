import type { Request } from "express";
import { z } from "zod";

const DEFAULT_FILE_NAME = "document.pdf";
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

const JsonUpload = z
  .object({
    pdf_b64: z
      .string()
      .min(1)
      .transform((s) => s.replace(/\s+/g, ""))
      .refine((s) => BASE64.test(s), "pdf_b64 must be base64"),
    file_name: z.string().min(1).max(255).optional()
  })
  .strict();

export type Upload =
  | { ok: true; bytes: Uint8Array; file_name: string }
  | { ok: false; status: number; error_code: string; message: string };

/**
 * Reads the uploaded document: raw `application/pdf` bytes (name in the
 * `file_name` query parameter) or a JSON body `{ pdf_b64, file_name? }`.
 */
export function readUpload(req: Request): Upload {
  if (Buffer.isBuffer(req.body)) {
    const queryName = req.query.file_name;
    return {
      ok: true,
      bytes: new Uint8Array(req.body),
      file_name: typeof queryName === "string" && queryName.length > 0 ? queryName : DEFAULT_FILE_NAME
    };
  }

  // The raw parser leaves bodiless requests untouched.
  if (req.is("application/pdf")) {
    return { ok: false, status: 400, error_code: "BAD_REQUEST", message: "request body is empty" };
  }

  if (!req.is("application/json")) {
    return {
      ok: false,
      status: 415,
      error_code: "UNSUPPORTED_MEDIA_TYPE",
      message: "send the document as application/pdf or as JSON { pdf_b64 }"
    };
  }

  const parsed = JsonUpload.safeParse(req.body);
  if (!parsed.success) {
    return { ok: false, status: 400, error_code: "BAD_REQUEST", message: parsed.error.message };
  }
  return {
    ok: true,
    bytes: new Uint8Array(Buffer.from(parsed.data.pdf_b64, "base64")),
    file_name: parsed.data.file_name ?? DEFAULT_FILE_NAME
  };
}

/** "report.pdf" → "report.sanitized.pdf", limited to characters safe in a header. */
export function sanitizedFileName(fileName: string): string {
  const base = baseName(fileName).replace(/\.pdf$/i, "");
  const safe = base.replace(/[^A-Za-z0-9._-]/g, "_") || "document";
  return `${safe}.sanitized.pdf`;
}

function baseName(fileName: string): string {
  const parts = fileName.split(/[\\/]/);
  return parts[parts.length - 1] ?? fileName;
}
