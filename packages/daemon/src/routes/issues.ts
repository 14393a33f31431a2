/**
 * POST /issues/:key/transition {status}: move an issue to a status by hand.
 */

import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import { issueTransitionBodySchema, type IssueTransitionResponse } from "@devpeace/shared";
import type { DaemonControl } from "../control.js";

export function createIssuesRouter(control: DaemonControl): Router {
  const router = Router();

  router.post("/issues/:key/transition", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { status } = issueTransitionBodySchema.parse(req.body);
      const body: IssueTransitionResponse = await control.transitionIssue(req.params.key, status);
      res.json(body);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
