import type { Request, Response, NextFunction } from "express";
import crypto from "node:crypto";

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export function requestId() {
  return function (req: Request, res: Response, next: NextFunction) {
    const incoming = String(req.header("x-request-id") || "").trim();
    req.requestId = incoming || crypto.randomUUID();
    res.setHeader("x-request-id", req.requestId);
    next();
  };
}
