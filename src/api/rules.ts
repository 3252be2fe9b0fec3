import type { Router } from "express";
import express from "express";
import { RULES } from "../analyzers/catalog.js";

export function buildRulesRouter(): Router {
  const router = express.Router();

  router.get("/rules", (_req, res) => {
    return res.status(200).json({ rules: RULES });
  });

  router.get("/rules/:kind", (req, res) => {
    const rule = RULES.find((r) => r.kind === req.params.kind);
    if (!rule) {
      return res.status(404).json({ error: { error_code: "NOT_FOUND", message: "rule not found" } });
    }
    return res.status(200).json(rule);
  });

  return router;
}
