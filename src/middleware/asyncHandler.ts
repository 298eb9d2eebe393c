import type { Request, Response, NextFunction, RequestHandler } from "express";

/** Express 4 does not see rejected promises; forward them to the error handler. */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}
