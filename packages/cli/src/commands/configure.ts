/**
 * `devpeace configure` — set Jira credentials.
 *
 * Sends them to the running daemon, which checks them with Jira, stores
 * them and lifts any authentication block. With --offline the config file is written directly
 * and the daemon picks the credentials up on its next start.
 */

import { Command } from "commander";
import pc from "picocolors";
import { loadConfig, saveConfig } from "@devpeace/core";
import { jiraCredentialsBodySchema, type JiraCredentials } from "@devpeace/shared";
import type { DaemonClient } from "../lib/api-client.js";
import { withClient } from "../lib/command-runner.js";
import { formatError } from "../lib/formatters.js";

export interface ConfigureOptions {
  url: string;
  user: string;
  token?: string;
  offline?: boolean;
}

/** @throws ZodError when a value is missing or the URL is malformed */
export function resolveCredentials(opts: ConfigureOptions): JiraCredentials {
  return jiraCredentialsBodySchema.parse({
    url: opts.url,
    user: opts.user,
    token: opts.token ?? process.env.DEVPEACE_JIRA_TOKEN,
  });
}

export async function runConfigure(client: DaemonClient, credentials: JiraCredentials): Promise<void> {
  const { tracker, display_name } = await client.configureJira(credentials);
  const state = tracker === "configured" ? pc.green(tracker) : pc.yellow(tracker);
  process.stdout.write(`Jira credentials verified for ${display_name} at ${credentials.url} (tracker: ${state})\n`);
}

export function runConfigureOffline(credentials: JiraCredentials): void {
  const config = loadConfig();
  config.jira = credentials;
  saveConfig(config);
  process.stdout.write(`Jira credentials written to the config file; restart the daemon to apply them.\n`);
}

export function createConfigureCommand(): Command {
  return new Command("configure")
    .description("Set Jira credentials")
    .requiredOption("--url <url>", "Jira base URL, e.g. https://example.atlassian.net")
    .requiredOption("--user <user>", "Jira account email")
    .option("--token <token>", "Jira API token (or set DEVPEACE_JIRA_TOKEN)")
    .option("--offline", "Write the config file instead of calling the daemon")
    .action(async (opts: ConfigureOptions) => {
      let credentials: JiraCredentials;
      try {
        credentials = resolveCredentials(opts);
        if (opts.offline) {
          runConfigureOffline(credentials);
          return;
        }
      } catch (err) {
        process.stderr.write(formatError(err) + "\n");
        process.exitCode = 1;
        return;
      }

      await withClient((client) => runConfigure(client, credentials));
    });
}
