/**
 * `devpeace run` — run the daemon in the foreground until SIGINT/SIGTERM.
 */

import { Command } from "commander";
import { createLogger, runDaemon } from "@devpeace/daemon";

export function createRunCommand(): Command {
  return new Command("run")
    .description("Run the daemon in the foreground")
    .action(async () => {
      const logger = createLogger();
      try {
        await runDaemon({ logger });
      } catch (err) {
        logger.fatal({ err }, "Daemon failed to start");
        process.exitCode = 1;
      }
    });
}
