/**
 * Daemon status and watch lifecycle:
 *   - GET  /status
 *   - POST /watch/start — (re)start every watcher, re-enabling failed ones
 *   - POST /watch/stop  — stop watchers, closing open sessions as `stopped`
 */

import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import type { DaemonControl } from "../control.js";

export function createStatusRouter(control: DaemonControl): Router {
  const router = Router();

  router.get("/status", (_req: Request, res: Response) => {
    res.json(control.status());
  });

  router.post("/watch/start", (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(control.start());
    } catch (err) {
      next(err);
    }
  });

  router.post("/watch/stop", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await control.stop());
    } catch (err) {
      next(err);
    }
  });

  return router;
}
