import type { Router } from "express";
import express from "express";
import { RISK_KINDS } from "../analyzers/types.js";
import type { AppConfig } from "../config.js";

export function buildMetaRouter(args: { config: AppConfig }): Router {
  const { config } = args;
  const router = express.Router();

  router.get("/version", (_req, res) => {
    return res.status(200).json({
      version: config.VERSION ?? "dev",
      risk_kinds: RISK_KINDS,
      max_upload_bytes: config.MAX_UPLOAD_BYTES
    });
  });

  return router;
}
