/**
 * Orphan endpoints, for sessions recorded on branches without an issue key:
 *   - GET    /orphans                          — unresolved orphans
 *   - POST   /orphans/:id/associate {issue_key} — convert to a pending worklog
 *   - DELETE /orphans/:id                      — discard
 */

import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import {
  associateOrphanBodySchema,
  type OrphanListResponse,
  type OrphanResponse,
  type WorklogResponse,
} from "@devpeace/shared";
import type { DaemonControl } from "../control.js";

export function createOrphansRouter(control: DaemonControl): Router {
  const router = Router();

  router.get("/orphans", (_req: Request, res: Response) => {
    const body: OrphanListResponse = { orphans: control.orphans() };
    res.json(body);
  });

  router.post("/orphans/:id/associate", (req: Request, res: Response, next: NextFunction) => {
    try {
      const { issue_key } = associateOrphanBodySchema.parse(req.body);
      const body: WorklogResponse = { entry: control.associateOrphan(req.params.id, issue_key) };
      res.status(201).json(body);
    } catch (err) {
      next(err);
    }
  });

  router.delete("/orphans/:id", (req: Request, res: Response, next: NextFunction) => {
    try {
      const body: OrphanResponse = { orphan: control.discardOrphan(req.params.id) };
      res.json(body);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
