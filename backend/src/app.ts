import express from "express";
import cors from "cors";
import { requestId } from "./middleware/requestId";
import { errorHandler } from "./middleware/errorHandler";
import { analyzeRouter, type AnalyzeDeps } from "./modules/analyze/router";

export function createApp(deps: AnalyzeDeps) {
  const app = express();

  app.use(cors());
  app.use(requestId());

  app.use(analyzeRouter(deps));

  app.use(errorHandler());

  return app;
}
