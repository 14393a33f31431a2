/**
 * `devpeace status` — daemon counters and tracker state, plus
 * `devpeace watch start|stop`.
 */

import { Command } from "commander";
import type { DaemonClient } from "../lib/api-client.js";
import { withClient } from "../lib/command-runner.js";
import { formatStatus, outputResult } from "../lib/formatters.js";

export async function runStatus(client: DaemonClient, opts: { json?: boolean }): Promise<void> {
  const status = await client.getStatus();
  outputResult(status, { json: opts.json, format: formatStatus });
}

export function createStatusCommand(): Command {
  return new Command("status")
    .description("Show what the daemon is tracking")
    .option("--json", "Output raw JSON")
    .action(async (opts: { json?: boolean }) => {
      await withClient((client) => runStatus(client, opts));
    });
}

export function createWatchCommand(): Command {
  const cmd = new Command("watch").description("Pause or resume watching all repositories");

  cmd
    .command("start")
    .description("Start watching (retries repositories whose watch failed)")
    .action(async () => {
      await withClient(async (client) => {
        process.stdout.write(formatStatus(await client.startWatching()) + "\n");
      });
    });

  cmd
    .command("stop")
    .description("Stop watching; open sessions are logged")
    .action(async () => {
      await withClient(async (client) => {
        process.stdout.write(formatStatus(await client.stopWatching()) + "\n");
      });
    });

  return cmd;
}
