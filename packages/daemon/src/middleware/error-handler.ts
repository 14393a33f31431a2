/**
 * Control API error handler.
 *
 * Maps thrown errors to HTTP responses:
 *   - ZodError      -> 400 with the validation issues
 *   - DevPeaceError -> status by code prefix (VALIDATION_ 400, NOT_FOUND_ 404,
 *                      CONFIG_ 500, GATEWAY_ 502, STORAGE_ 503)
 *   - anything else -> 500
 *
 * The full error is always logged. Stack traces are only included in
 * responses outside production.
 */

import type { ErrorRequestHandler } from "express";
import type { Logger } from "pino";
import { ZodError } from "zod";
import { DevPeaceError } from "@devpeace/shared";

const isProduction = process.env.NODE_ENV === "production";

export function statusForCode(code: string): number {
  if (code.startsWith("VALIDATION_")) return 400;
  if (code.startsWith("NOT_FOUND_")) return 404;
  if (code.startsWith("CONFIG_")) return 500;
  if (code.startsWith("GATEWAY_")) return 502;
  if (code.startsWith("STORAGE_")) return 503;
  return 500;
}

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, _req, res, _next) => {
    const error = err instanceof Error ? err : new Error(String(err));

    if (error instanceof ZodError) {
      logger.warn({ issues: error.issues }, "Request validation failed");
      res.status(400).json({ error: "Validation failed", details: error.issues });
      return;
    }

    if (error instanceof DevPeaceError) {
      const status = statusForCode(error.code);
      if (status >= 500) {
        logger.error({ err: error, code: error.code }, `Request error: ${error.message}`);
      } else {
        logger.warn({ code: error.code, context: error.context }, `Request error: ${error.message}`);
      }
      res.status(status).json({
        error: error.message,
        code: error.code,
        ...(isProduction ? {} : { stack: error.stack }),
      });
      return;
    }

    logger.error({ err: error }, `Request error: ${error.message}`);
    res.status(500).json({
      error: "Internal server error",
      ...(isProduction ? {} : { stack: error.stack }),
    });
  };
}
