/**
 * GET /api/health, unauthenticated, for the CLI to tell whether the
 * daemon is up before presenting a key.
 */

import { Router } from "express";
import type { HealthResponse } from "@devpeace/shared";
import type { DaemonControl } from "../control.js";

/** Reported in health responses */
export const VERSION = "0.1.0";

const startTime = Date.now();

export function createHealthRouter(control: Pick<DaemonControl, "status">): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    const body: HealthResponse = {
      status: "ok",
      running: control.status().running,
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      version: VERSION,
    };
    res.json(body);
  });

  return router;
}
