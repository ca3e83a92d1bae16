import type { Response } from "express";
import type pino from "pino";
import { isCodingError } from "../services/codingError.js";

export function sendError(res: Response, error: unknown, logger: pino.Logger, fallbackCode = "internal_error") {
  if (isCodingError(error)) {
    if (error.statusCode >= 500) logger.error({ err: error, code: error.code }, error.message);
    return res.status(error.statusCode).json({ error: error.code, detail: error.message });
  }
  logger.error({ err: error }, "Unhandled request failure");
  return res.status(500).json({
    error: fallbackCode,
    detail: error instanceof Error ? error.message : "unknown_error"
  });
}
