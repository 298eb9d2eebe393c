import type { Request, Response, NextFunction } from "express";

declare global {
  namespace Express {
    interface Request {
      auth?: { userId: string };
    }
  }
}

// Stub auth: identity comes from a trusted upstream via header.
export function requireAuth() {
  return function (req: Request, res: Response, next: NextFunction) {
    const userId = String(req.header("x-user-id") ?? "").trim();

    if (!userId || userId.length > 128) {
      return res.status(401).json({
        error: "UNAUTHENTICATED",
        message: "Missing x-user-id header (stub auth).",
      });
    }

    req.auth = { userId };
    next();
  };
}
