import type { Request, Response, NextFunction } from "express";
import multer from "multer";
import { logger } from "../utils/log";

export function errorStatus(err: unknown): number {
  if (err instanceof multer.MulterError) {
    return err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
  }
  const message = err instanceof Error ? err.message : "";
  return message.startsWith("INVALID") ? 400 : 500;
}

export function errorHandler() {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const message = err instanceof Error && err.message ? err.message : "UNKNOWN_ERROR";
    const status = errorStatus(err);

    if (status >= 500) logger("http", req.requestId).error("Unhandled error", err);

    res.status(status).json({ error: message });
  };
}
