import express from "express";
import multer from "multer";
import {
  buildAdvisoryRecord,
  errorRecord,
  type AdvisoryRecord,
} from "../advice/advisor";
import type { KnowledgeBase } from "../advice/knowledge";
import { pickTopPrediction, type ClassificationGateway } from "../inference/gateway";
import { logger } from "../../utils/log";
import type { UploadStore } from "./uploadStore";

export const SERVICE_NAME = "Farm Advisor API";

export type AnalyzeDeps = {
  gateway: ClassificationGateway;
  uploads: UploadStore;
  knowledge: KnowledgeBase;
  maxUploadBytes: number;
};

export function isImageUpload(mimetype: string | undefined): boolean {
  return (mimetype ?? "").toLowerCase().startsWith("image/");
}

export function analyzeRouter(deps: AnalyzeDeps) {
  const router = express.Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.maxUploadBytes, files: 1 },
  });

  router.get("/", (_req, res) => {
    res.json({ status: "ok", service: SERVICE_NAME });
  });

  router.get("/health", (_req, res) => {
    res.json({ ok: true, model: deps.gateway.modelId, modelLoaded: deps.gateway.isLoaded() });
  });

  router.post("/analyze", upload.single("file"), async (req, res) => {
    const started = Date.now();
    const log = logger("analyze", req.requestId);
    const f = req.file;

    if (!f) {
      log.info("Rejected request without a file");
      return res.status(400).json({ detail: "No file uploaded." });
    }

    const originalName = f.originalname || "upload";
    log.info(`Received file: ${originalName}`);

    if (!isImageUpload(f.mimetype)) {
      log.info(`Rejected non-image upload: ${f.mimetype || "unknown"}`);
      return res.status(400).json({ detail: "Only image uploads are supported." });
    }

    let tempPath: string | null = null;
    let results: AdvisoryRecord[];

    try {
      tempPath = await deps.uploads.save(f.buffer, originalName);
      log.info(`File saved as ${tempPath}`);

      const predictions = await deps.gateway.classify(tempPath);
      const best = pickTopPrediction(predictions);
      results = [buildAdvisoryRecord(best, deps.knowledge)];

      const secs = ((Date.now() - started) / 1000).toFixed(2);
      log.info(`Prediction returned: ${JSON.stringify(results)} in ${secs} seconds`);
    } catch (e) {
      log.error("Prediction error", e);
      results = [errorRecord()];
    } finally {
      if (tempPath) {
        try {
          await deps.uploads.remove(tempPath);
          log.info(`Temporary file ${tempPath} removed`);
        } catch (e) {
          log.error("Error removing temp file", e);
        }
      }
    }

    return res.json(results);
  });

  return router;
}
