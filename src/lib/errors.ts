export type ErrorCode =
  | "MALFORMED_DOCUMENT"
  | "UNSUPPORTED_ENCRYPTION"
  | "IRREPARABLE_STRUCTURE"
  | "UPLOAD_TOO_LARGE"
  | "NOTHING_TO_SANITIZE"
  | "REPORT_MISMATCH";

export class PdfWardenError extends Error {
  readonly error_code: ErrorCode;
  readonly http_status: number;

  constructor(error_code: ErrorCode, http_status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.error_code = error_code;
    this.http_status = http_status;
  }
}

export class MalformedDocumentError extends PdfWardenError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("MALFORMED_DOCUMENT", 422, message, options);
  }
}

/** The document is encrypted; nothing in it can be inspected without a credential. */
export class UnsupportedEncryptionError extends PdfWardenError {
  constructor(message = "document is encrypted and cannot be inspected without a password") {
    super("UNSUPPORTED_ENCRYPTION", 422, message);
  }
}

export class IrreparableStructureError extends PdfWardenError {
  constructor(message: string) {
    super("IRREPARABLE_STRUCTURE", 422, message);
  }
}

export class UploadTooLargeError extends PdfWardenError {
  readonly limit_bytes: number;

  constructor(limit_bytes: number, actual_bytes?: number) {
    const detail = actual_bytes === undefined ? "" : ` (got ${actual_bytes} bytes)`;
    super("UPLOAD_TOO_LARGE", 413, `document exceeds the upload limit of ${limit_bytes} bytes${detail}`);
    this.limit_bytes = limit_bytes;
  }
}

export class NothingToSanitizeError extends PdfWardenError {
  constructor() {
    super("NOTHING_TO_SANITIZE", 409, "document is clean; there is nothing to sanitize");
  }
}

export class ReportMismatchError extends PdfWardenError {
  constructor() {
    super("REPORT_MISMATCH", 409, "scan report was produced for a different document");
  }
}

export function isPdfWardenError(e: unknown): e is PdfWardenError {
  return e instanceof PdfWardenError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
