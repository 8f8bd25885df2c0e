import type { Request, Response, NextFunction } from "express";
import { GatewayError } from "../errors";
import type { ErrorResponse } from "../types";
import { logger } from "../utils/logger";

// body-parser and other http-errors style failures carry status/expose
function clientStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if (!("status" in err) || typeof err.status !== "number") return undefined;
  return err.status >= 400 && err.status < 500 ? err.status : undefined;
}

export function errorHandler(err: unknown, req: Request, res: Response<ErrorResponse>, _next: NextFunction) {
  if (err instanceof GatewayError) {
    const log = err.status >= 500 ? logger.error : logger.warn;
    log("request_error", { method: req.method, path: req.path, status: err.status, code: err.code, message: err.message });
    res.status(err.status).json({ error: err.message, code: err.code });
    return;
  }

  const status = clientStatus(err);
  if (status !== undefined) {
    const message = err instanceof Error && err.message ? err.message : "Bad request";
    logger.warn("request_error", { method: req.method, path: req.path, status, message });
    res.status(status).json({ error: message, code: "bad_request" });
    return;
  }

  logger.error("request_error", {
    method: req.method,
    path: req.path,
    status: 500,
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json({ error: "Internal error", code: "internal_error" });
}
