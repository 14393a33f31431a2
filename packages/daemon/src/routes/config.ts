/**
 * PUT /config/jira {url, user, token}: verify new tracker credentials, store
 * them and lift any auth block. Rejected credentials answer 502 and change
 * nothing. The token is never echoed back.
 */

import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import { jiraCredentialsBodySchema, type TrackerConfigResponse } from "@devpeace/shared";
import type { DaemonControl } from "../control.js";

export function createConfigRouter(control: DaemonControl): Router {
  const router = Router();

  router.put("/config/jira", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const credentials = jiraCredentialsBodySchema.parse(req.body);
      const body: TrackerConfigResponse = await control.configure(credentials);
      res.json(body);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
