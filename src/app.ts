import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import express from "express";
import helmet from "helmet";
import cors from "cors";
import rateLimit from "express-rate-limit";
import swaggerUi from "swagger-ui-express";
import YAML from "yaml";
import type { AppConfig } from "./config.js";
import { buildBodyErrorHandler } from "./api/errors.js";
import { buildScanRouter } from "./api/scan.js";
import { buildSanitizeRouter } from "./api/sanitize.js";
import { buildRulesRouter } from "./api/rules.js";
import { buildMetaRouter } from "./api/meta.js";

export function buildApp(args: { config: AppConfig }) {
  const { config } = args;
  const app = express();
  const uploadLimitBytes = config.MAX_UPLOAD_BYTES ?? 20 * 1024 * 1024;
  const jsonLimitBytes = config.HTTP_JSON_BODY_LIMIT_BYTES ?? 28 * 1024 * 1024;
  const rateLimitWindowMs = config.RATE_LIMIT_WINDOW_MS ?? 60_000;
  const rateLimitMax = config.RATE_LIMIT_MAX ?? 120;

  if (config.TRUST_PROXY ?? false) {
    app.set("trust proxy", 1);
  }

  app.use(helmet());
  app.use(cors({ exposedHeaders: ["content-disposition", "x-pdf-verdict", "x-pdf-document-id", "x-pdf-removed-indicators"] }));
  app.use(
    rateLimit({
      windowMs: rateLimitWindowMs,
      max: rateLimitMax,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (_req, res) =>
        res.status(429).json({
          error: {
            error_code: "RATE_LIMITED",
            message: "too many requests"
          }
        })
    })
  );
  app.use(express.raw({ type: "application/pdf", limit: uploadLimitBytes }));
  app.use(express.json({ limit: jsonLimitBytes }));
  app.use(buildBodyErrorHandler(uploadLimitBytes));

  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const openapiYaml = fs.readFileSync(path.join(moduleDir, "../openapi/pdf-warden.openapi.yaml"), "utf8");
  const openapiObj = YAML.parse(openapiYaml);
  app.get("/openapi.json", (_req, res) => res.json(openapiObj));
  app.use("/docs", swaggerUi.serve, swaggerUi.setup(openapiObj));

  app.use("/v1", buildScanRouter({ config }));
  app.use("/v1", buildSanitizeRouter({ config }));
  app.use("/v1", buildRulesRouter());
  app.use("/v1", buildMetaRouter({ config }));

  app.get("/healthz", (_req, res) => res.json({ ok: true }));

  return app;
}
