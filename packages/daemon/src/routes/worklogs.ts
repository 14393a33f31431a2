/**
 * Worklog endpoints:
 *   - GET  /worklogs?status=   — entries, optionally filtered by status
 *   - POST /worklogs/retry {id?} — reset failed/needs_attention entries
 */

import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import {
  retryBodySchema,
  worklogQuerySchema,
  type RetryResponse,
  type WorklogListResponse,
} from "@devpeace/shared";
import type { DaemonControl } from "../control.js";

export function createWorklogsRouter(control: DaemonControl): Router {
  const router = Router();

  router.get("/worklogs", (req: Request, res: Response, next: NextFunction) => {
    const query = worklogQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: "Invalid query parameters", details: query.error.issues });
      return;
    }
    try {
      const body: WorklogListResponse = { worklogs: control.worklogs(query.data) };
      res.json(body);
    } catch (err) {
      next(err);
    }
  });

  router.post("/worklogs/retry", (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = retryBodySchema.parse(req.body ?? {});
      const body: RetryResponse = { retried: control.retry(id) };
      res.json(body);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
