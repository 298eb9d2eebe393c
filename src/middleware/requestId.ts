import type { Request, Response, NextFunction } from "express";
import crypto from "node:crypto";

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

/** Honours a caller-supplied `x-request-id`, otherwise mints a UUID; echoed back on the response. */
export function requestId() {
  return function (req: Request, res: Response, next: NextFunction) {
    const incoming = String(req.header("x-request-id") ?? "").trim();
    req.requestId = incoming && incoming.length <= 128 ? incoming : crypto.randomUUID();
    res.setHeader("x-request-id", req.requestId);
    next();
  };
}
