import type { Request, Response, NextFunction } from "express";
import type { Db } from "../db/connection";
import { ensureUser } from "../modules/profile/bootstrap";

/** What a service needs to know about the caller. */
export type AppContext = {
  userId: string;
  requestId: string;
  ip: string | null;
  userAgent: string | null;
};

declare global {
  namespace Express {
    interface Request {
      ctx?: AppContext;
    }
  }
}

export function getCtx(req: Request): AppContext {
  if (!req.ctx) throw new Error("CTX_MISSING");
  return req.ctx;
}

export function apiMeta(req: Request) {
  return { requestId: req.ctx?.requestId ?? req.requestId ?? null };
}

export function apiOk<T>(req: Request, data: T) {
  return { meta: apiMeta(req), data };
}

export function resolveContext(opts: { db: Db; defaultTargetCalories: number }) {
  return function (req: Request, res: Response, next: NextFunction) {
    const userId = req.auth?.userId;
    if (!userId) return res.status(401).json({ error: "UNAUTHENTICATED" });

    ensureUser(opts.db, userId, opts.defaultTargetCalories);

    req.ctx = {
      userId,
      requestId: req.requestId ?? `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 10)}`,
      ip: req.ip ?? null,
      userAgent: req.header("user-agent") ?? null,
    };

    next();
  };
}
