import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import type { Logger } from "pino";
import { ZodError } from "zod";
import { isAppError } from "../core/errors.js";

/** Express 4 does not forward rejected promises from handlers; this does. */
export function asyncRoute(fn: (req: Request, res: Response) => Promise<unknown>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

export function errorHandler(log: Logger): ErrorRequestHandler {
  return (err: unknown, _req, res, next) => {
    if (res.headersSent) return next(err);

    if (isAppError(err)) {
      return res.status(err.status).json({ ok: false, error: err.code, message: err.message, details: err.details });
    }
    if (err instanceof ZodError) {
      return res.status(400).json({
        ok: false,
        error: "validation_failed",
        message: "invalid request",
        details: { issues: err.issues.map(i => ({ path: i.path.join("."), message: i.message })) }
      });
    }
    // body-parser marks malformed JSON with status 400
    if (err instanceof SyntaxError && "status" in err && err.status === 400) {
      return res.status(400).json({ ok: false, error: "invalid_json" });
    }

    log.error({ err }, "request failed");
    return res.status(500).json({ ok: false, error: "internal_error" });
  };
}
