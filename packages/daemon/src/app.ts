/**
 * Express application factory for the control API.
 *
 * Separated from run.ts so tests can create an app and listen on an
 * ephemeral port without the rest of the daemon.
 *
 * Middleware stack (order matters):
 *   1. express.json()  — parse JSON bodies (64kb limit)
 *   2. helmet()        — security headers
 *   3. cors()          — disabled; the only client is the local CLI
 *   4. pino-http       — request logging, health checks excluded
 *   5. /api/health     — mounted before auth
 *   6. Bearer auth     — everything else under /api
 *   7. Routes
 *   8. Error handler   — must be last
 */

import express from "express";
import cors from "cors";
import helmet from "helmet";
import { pinoHttp } from "pino-http";
import type { Logger } from "pino";
import type { DaemonControl } from "./control.js";
import { createAuthMiddleware } from "./middleware/auth.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { createConfigRouter } from "./routes/config.js";
import { createHealthRouter } from "./routes/health.js";
import { createIssuesRouter } from "./routes/issues.js";
import { createOrphansRouter } from "./routes/orphans.js";
import { createRepositoriesRouter } from "./routes/repositories.js";
import { createStatusRouter } from "./routes/status.js";
import { createWorklogsRouter } from "./routes/worklogs.js";

export interface AppDeps {
  control: DaemonControl;
  /** Bearer token the CLI must present */
  apiKey: string;
  logger: Logger;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.use(express.json({ limit: "64kb" }));
  app.use(helmet());
  app.use(cors({ origin: false }));
  app.use(
    pinoHttp({
      logger: deps.logger.child({ component: "control-api" }),
      autoLogging: {
        ignore: (req) => req.url === "/api/health",
      },
    }),
  );

  app.use("/api/health", createHealthRouter(deps.control));
  app.use("/api", createAuthMiddleware(deps.apiKey));

  app.use("/api", createRepositoriesRouter(deps.control));
  app.use("/api", createStatusRouter(deps.control));
  app.use("/api", createOrphansRouter(deps.control));
  app.use("/api", createWorklogsRouter(deps.control));
  app.use("/api", createIssuesRouter(deps.control));
  app.use("/api", createConfigRouter(deps.control));

  app.use(createErrorHandler(deps.logger.child({ component: "control-api" })));

  return app;
}
