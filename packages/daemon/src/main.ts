/**
 * Daemon entry point: `npm start` or `devpeace run`.
 */

import "dotenv/config";
import { createLogger } from "./logger.js";
import { runDaemon } from "./run.js";

const logger = createLogger();

runDaemon({ logger }).then(
  () => process.exit(process.exitCode ?? 0),
  (err: unknown) => {
    logger.fatal({ err }, "Daemon failed to start");
    process.exit(1);
  },
);
