/**
 * @devpeace/daemon — process host: logger, control API and run loop.
 */

export { createApp, type AppDeps } from "./app.js";
export type { DaemonControl } from "./control.js";
export { createLogger, type LoggerOptions } from "./logger.js";
export { createAuthMiddleware } from "./middleware/auth.js";
export { createErrorHandler, statusForCode } from "./middleware/error-handler.js";
export { VERSION } from "./routes/health.js";
export {
  loadOrInitConfig,
  runDaemon,
  startDaemon,
  type DaemonOptions,
  type RunningDaemon,
} from "./run.js";
