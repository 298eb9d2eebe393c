import type { Request, NextFunction } from "express";
import { MulterError } from "multer";
import { ZodError } from "zod";
import { AppError, errorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";

const log = createLogger("http");

export function statusForCode(code: string): number {
  return code.startsWith("FORBIDDEN") ? 403 :
    code.startsWith("INVALID") ? 400 :
    code.endsWith("NOT_FOUND") ? 404 :
    code === "UNAUTHENTICATED" ? 401 :
    500;
}

type ErrorRequest = Pick<Request, "method" | "originalUrl" | "ctx" | "requestId">;
type ErrorResponse = { status(code: number): { json(body: unknown): unknown } };

export function errorHandler() {
  return (err: unknown, req: ErrorRequest, res: ErrorResponse, _next: NextFunction) => {
    const requestId = req.ctx?.requestId ?? req.requestId ?? null;

    if (err instanceof ZodError) {
      return res.status(400).json({
        error: "INVALID_INPUT",
        issues: err.flatten().fieldErrors,
        requestId,
      });
    }

    if (err instanceof MulterError) {
      const tooLarge = err.code === "LIMIT_FILE_SIZE";
      return res.status(tooLarge ? 413 : 400).json({
        error: tooLarge ? "FILE_TOO_LARGE" : "INVALID_UPLOAD",
        requestId,
      });
    }

    if (err instanceof AppError) {
      const status = err.status ?? statusForCode(err.code);
      if (status >= 500) log.error(`${req.method} ${req.originalUrl} failed: ${err.code}`, err.details ?? "");

      return res.status(status).json(
        err.details === undefined
          ? { error: err.code, requestId }
          : { error: err.code, details: err.details, requestId }
      );
    }

    const code = errorMessage(err);
    const status = statusForCode(code);

    if (status >= 500) log.error(`${req.method} ${req.originalUrl} failed:`, err);

    // Unexpected errors never leak their message.
    res.status(status).json({ error: status >= 500 ? "INTERNAL_ERROR" : code, requestId });
  };
}
