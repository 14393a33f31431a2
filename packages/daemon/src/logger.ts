/**
 * pino logger factory for the daemon process.
 *
 * Two transports:
 *   - stdout: pretty-printed in development (pino-pretty), JSON when
 *     NODE_ENV=production
 *   - file:   JSON to <home>/logs/daemon.log, always
 *
 * LOG_LEVEL controls the level (default "info").
 */

import * as path from "node:path";
import { pino, type Logger } from "pino";
import { getLogDir } from "@devpeace/core";

export interface LoggerOptions {
  /** Appears as `name` in every record */
  name?: string;
  /** File under the log directory */
  filename?: string;
  level?: string;
  /** Defaults to the devpeace home's logs/ directory */
  logDir?: string;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? process.env.LOG_LEVEL ?? "info";
  const isProduction = process.env.NODE_ENV === "production";
  const filePath = path.join(opts.logDir ?? getLogDir(), opts.filename ?? "daemon.log");

  const stdout = isProduction
    ? { target: "pino/file", options: { destination: 1 }, level }
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname" },
        level,
      };

  return pino({
    name: opts.name ?? "daemon",
    level,
    transport: {
      targets: [stdout, { target: "pino/file", options: { destination: filePath, mkdir: true }, level }],
    },
  });
}
