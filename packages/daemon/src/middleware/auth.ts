/**
 * Bearer token authentication for the control API.
 *
 * Compares the presented token against `control.api_key` in constant time
 * (crypto.timingSafeEqual). An empty configured key rejects everything.
 */

import { timingSafeEqual } from "node:crypto";
import type { NextFunction, Request, Response } from "express";

export function createAuthMiddleware(
  apiKey: string,
): (req: Request, res: Response, next: NextFunction) => void {
  const expected = Buffer.from(apiKey, "utf-8");

  const reject = (res: Response): void => {
    res.status(401).json({ error: "Missing or invalid API key" });
  };

  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers.authorization;
    if (expected.length === 0 || !header || !header.startsWith("Bearer ")) {
      reject(res);
      return;
    }

    const received = Buffer.from(header.slice(7), "utf-8");
    // timingSafeEqual throws on a length mismatch
    if (received.length !== expected.length || !timingSafeEqual(received, expected)) {
      reject(res);
      return;
    }

    next();
  };
}
