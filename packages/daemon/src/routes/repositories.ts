/**
 * Watched repository registry endpoints:
 *   - GET    /repositories          — list
 *   - POST   /repositories {path}   — add (idempotent by resolved path)
 *   - DELETE /repositories {path}   — remove, closing the open session
 */

import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import {
  repositoryPathBodySchema,
  type RepositoryListResponse,
  type RepositoryResponse,
} from "@devpeace/shared";
import type { DaemonControl } from "../control.js";

export function createRepositoriesRouter(control: DaemonControl): Router {
  const router = Router();

  router.get("/repositories", (_req: Request, res: Response) => {
    const body: RepositoryListResponse = { repositories: control.list() };
    res.json(body);
  });

  router.post("/repositories", (req: Request, res: Response, next: NextFunction) => {
    try {
      const { path } = repositoryPathBodySchema.parse(req.body);
      const body: RepositoryResponse = { repository: control.add(path) };
      res.status(201).json(body);
    } catch (err) {
      next(err);
    }
  });

  router.delete("/repositories", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { path } = repositoryPathBodySchema.parse(req.body);
      const body: RepositoryResponse = { repository: await control.remove(path) };
      res.json(body);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
