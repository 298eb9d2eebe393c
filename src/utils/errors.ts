/**
 * Error carrying an upper-snake code (also used as the message) and an optional HTTP status.
 * The error handler falls back to mapping by code shape when no status is given.
 */
export class AppError extends Error {
  readonly code: string;
  readonly status?: number;
  readonly details?: unknown;

  constructor(code: string, status?: number, details?: unknown) {
    super(code);
    this.name = "AppError";
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === "string" ? err : "UNKNOWN_ERROR";
}
