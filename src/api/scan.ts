import type { Router } from "express";
import express from "express";
import { v4 as uuidv4 } from "uuid";
import type { ScanReport } from "../analyzers/types.js";
import type { AppConfig } from "../config.js";
import { canonicalSha256 } from "../lib/canonicalJson.js";
import { formatReportText, toIndicatorViews } from "../lib/report.js";
import { scanDocument } from "../lib/scanner.js";
import { countBySeverity } from "../lib/verdict.js";
import { sendError, sendFailure } from "./errors.js";
import { readUpload } from "./upload.js";

export function buildScanRouter(args: { config: AppConfig }): Router {
  const { config } = args;
  const router = express.Router();

  router.post("/scan", async (req, res) => {
    const upload = readUpload(req);
    if (!upload.ok) {
      return sendError(res, upload.status, upload.error_code, upload.message);
    }

    try {
      const report = await scanDocument(upload.bytes, { maxDocumentBytes: config.MAX_UPLOAD_BYTES });
      return res.status(200).json(toScanResponse(uuidv4(), upload.file_name, report));
    } catch (e) {
      return sendFailure(res, e, "scan");
    }
  });

  return router;
}

export function toScanResponse(scan_id: string, file_name: string, report: ScanReport) {
  return {
    scan_id,
    file_name,
    document_id: report.document_id,
    overall_verdict: report.overall_verdict,
    indicator_counts: countBySeverity(report.indicators),
    indicators: toIndicatorViews(report),
    report_sha256: canonicalSha256(report),
    report_text: formatReportText(report, file_name)
  };
}
