import type { ErrorRequestHandler, Response } from "express";
import { errorMessage, isPdfWardenError } from "../lib/errors.js";

export function sendError(res: Response, status: number, error_code: string, message: string): Response {
  return res.status(status).json({ error: { error_code, message } });
}

/** Maps scanner/sanitizer failures to the error envelope; anything else is a 500. */
export function sendFailure(res: Response, e: unknown, route: string): Response {
  if (isPdfWardenError(e)) {
    return sendError(res, e.http_status, e.error_code, e.message);
  }
  console.error(`${route} failed: ${errorMessage(e)}`);
  return sendError(res, 500, "INTERNAL", "internal error");
}

function bodyParserErrorType(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("type" in err)) return undefined;
  return typeof err.type === "string" ? err.type : undefined;
}

export function buildBodyErrorHandler(maxUploadBytes: number): ErrorRequestHandler {
  return (err, _req, res, next) => {
    const type = bodyParserErrorType(err);
    if (type === "entity.too.large") {
      return sendError(res, 413, "UPLOAD_TOO_LARGE", `request body exceeds the upload limit of ${maxUploadBytes} bytes`);
    }
    if (type === "entity.parse.failed") {
      return sendError(res, 400, "BAD_REQUEST", "request body is not valid JSON");
    }
    return next(err);
  };
}
