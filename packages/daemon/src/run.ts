/**
 * Daemon process host.
 *
 * Startup sequence:
 *   1. Load config (a first run writes defaults with a generated API key)
 *   2. Open the state store, restore repositories and sessions
 *   3. Start watching every registered repository
 *   4. Serve the control API on the loopback address from config
 *
 * Graceful shutdown on SIGTERM/SIGINT:
 *   1. Stop accepting control connections
 *   2. Stop watchers, finalize open sessions as `stopped`, checkpoint
 *   3. Let in-flight submissions finish within the grace period
 *   4. Force exit if all of that overruns
 */

import * as http from "node:http";
import type { Logger } from "pino";
import {
  ChokidarBackend,
  Orchestrator,
  StateStore,
  getStateDir,
  initConfig,
  loadConfig,
  saveConfig,
  type DevPeaceConfig,
  type OrchestratorDeps,
  type WatchBackend,
} from "@devpeace/core";
import { ConfigError } from "@devpeace/shared";
import { createApp } from "./app.js";

/** Slack on top of the submission grace period before a forced exit */
const FORCE_EXIT_SLACK_MS = 10_000;

export interface DaemonOptions {
  logger: Logger;
  /** Defaults to the config file in the devpeace home */
  config?: DevPeaceConfig;
  /** Defaults to chokidar */
  backend?: WatchBackend;
  /** Defaults to <home>/state */
  stateDir?: string;
  createGateway?: OrchestratorDeps["createGateway"];
  /** Persists credential changes; defaults to writing the config file */
  saveConfig?: OrchestratorDeps["saveConfig"];
}

export interface RunningDaemon {
  config: DevPeaceConfig;
  orchestrator: Orchestrator;
  server: http.Server;
  /** Base URL of the control API, e.g. http://127.0.0.1:4719 */
  url: string;
  /** Close the control API, then shut the orchestrator down */
  shutdown(): Promise<void>;
}

/**
 * Load the config file, writing a default one on first run.
 * @throws ConfigError when the file exists but is unreadable or invalid
 */
export function loadOrInitConfig(logger: Logger): DevPeaceConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError && err.code === "CONFIG_NOT_FOUND") {
      const config = initConfig();
      logger.info("No config found; wrote defaults with a new control API key");
      return config;
    }
    throw err;
  }
}

/**
 * Start everything and return once the control API is listening.
 * @throws ConfigError without a control API key
 * @throws StorageError when the state directory is unusable
 */
export async function startDaemon(opts: DaemonOptions): Promise<RunningDaemon> {
  const { logger } = opts;
  const config = opts.config ?? loadOrInitConfig(logger);

  if (!config.control.api_key) {
    throw new ConfigError(
      "control.api_key is empty. Run 'devpeace init --force' to generate one.",
      "CONFIG_INVALID",
      { field: "control.api_key" },
    );
  }

  const store = new StateStore({ dir: opts.stateDir ?? getStateDir(), logger });
  const orchestrator = new Orchestrator({
    config,
    store,
    backend: opts.backend ?? new ChokidarBackend(),
    logger,
    createGateway: opts.createGateway,
    saveConfig: opts.saveConfig ?? saveConfig,
  });

  orchestrator.init();
  orchestrator.start();

  const app = createApp({ control: orchestrator, apiKey: config.control.api_key, logger });
  const server = http.createServer(app);

  try {
    await listen(server, config.control.port, config.control.host);
  } catch (err) {
    await orchestrator.shutdown();
    throw err;
  }

  const address = server.address();
  const port = address !== null && typeof address === "object" ? address.port : config.control.port;
  const url = `http://${config.control.host}:${port}`;

  return {
    config,
    orchestrator,
    server,
    url,
    shutdown: async () => {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeIdleConnections();
      });
      await orchestrator.shutdown();
    },
  };
}

/**
 * Run the daemon until SIGINT or SIGTERM, then shut down gracefully.
 * Resolves once shutdown has finished.
 */
export async function runDaemon(opts: DaemonOptions): Promise<void> {
  const { logger } = opts;
  const startMs = performance.now();
  const daemon = await startDaemon(opts);
  const status = daemon.orchestrator.status();

  logger.info(
    {
      elapsed_ms: Math.round(performance.now() - startMs),
      url: daemon.url,
      repositories: status.repositories,
      tracker: status.tracker,
    },
    `Daemon started. Control API: ${daemon.url}`,
  );

  const graceMs = daemon.config.submission.shutdown_grace_ms;

  await new Promise<void>((resolve) => {
    let shuttingDown = false;

    const onSignal = (signal: NodeJS.Signals): void => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info({ signal }, "Shutting down...");

      const forceExitTimer = setTimeout(() => {
        logger.error("Graceful shutdown timed out; forcing exit");
        process.exit(1);
      }, graceMs + FORCE_EXIT_SLACK_MS);
      forceExitTimer.unref();

      daemon.shutdown().then(
        () => {
          logger.info("Shutdown complete");
          resolve();
        },
        (err: unknown) => {
          logger.error({ err }, "Error during shutdown");
          process.exitCode = 1;
          resolve();
        },
      );
    };

    process.on("SIGTERM", onSignal);
    process.on("SIGINT", onSignal);
  });
}

function listen(server: http.Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error): void => reject(err);
    server.once("error", onError);
    server.listen(port, host, () => {
      server.off("error", onError);
      resolve();
    });
  });
}
