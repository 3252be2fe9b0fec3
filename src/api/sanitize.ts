import type { Router } from "express";
import express from "express";
import type { AppConfig } from "../config.js";
import { sanitizeDocument } from "../lib/sanitizer.js";
import { scanDocument } from "../lib/scanner.js";
import { sendError, sendFailure } from "./errors.js";
import { readUpload, sanitizedFileName } from "./upload.js";

export function buildSanitizeRouter(args: { config: AppConfig }): Router {
  const { config } = args;
  const router = express.Router();
  const limits = { maxDocumentBytes: config.MAX_UPLOAD_BYTES };

  router.post("/sanitize", async (req, res) => {
    const upload = readUpload(req);
    if (!upload.ok) {
      return sendError(res, upload.status, upload.error_code, upload.message);
    }

    try {
      const report = await scanDocument(upload.bytes, limits);
      const sanitized = await sanitizeDocument(upload.bytes, report, limits);
      return res
        .status(200)
        .set({
          "content-type": "application/pdf",
          "content-disposition": `attachment; filename="${sanitizedFileName(upload.file_name)}"`,
          "x-pdf-verdict": report.overall_verdict,
          "x-pdf-document-id": report.document_id,
          "x-pdf-removed-indicators": String(report.indicators.length)
        })
        .send(Buffer.from(sanitized));
    } catch (e) {
      return sendFailure(res, e, "sanitize");
    }
  });

  return router;
}
