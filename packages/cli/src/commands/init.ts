/**
 * `devpeace init` — write ~/.devpeace/config.yaml with defaults and a
 * generated control API key, optionally with Jira credentials.
 *
 * Runs without the daemon. Re-running requires --force, which also
 * replaces the API key.
 */

import { Command } from "commander";
import { getConfigPath, initConfig, isJiraConfigured, saveConfig } from "@devpeace/core";
import { jiraCredentialsBodySchema } from "@devpeace/shared";
import { formatError } from "../lib/formatters.js";

export interface InitOptions {
  force: boolean;
  jiraUrl?: string;
  jiraUser?: string;
  jiraToken?: string;
}

/**
 * Core init logic, separated from Commander for testability.
 * @throws ConfigError CONFIG_EXISTS without --force
 * @throws ZodError when the Jira flags are given but incomplete or malformed
 */
export function runInit(opts: InitOptions): void {
  const jiraGiven = Boolean(opts.jiraUrl || opts.jiraUser || opts.jiraToken);
  const jira = jiraGiven
    ? jiraCredentialsBodySchema.parse({
        url: opts.jiraUrl,
        user: opts.jiraUser,
        token: opts.jiraToken ?? process.env.DEVPEACE_JIRA_TOKEN,
      })
    : null;

  const config = initConfig({ force: opts.force });
  if (jira) {
    config.jira = jira;
    saveConfig(config);
  }

  process.stdout.write(
    [
      "",
      "devpeace initialized.",
      "",
      `  Config:       ${getConfigPath()}`,
      `  Control API:  http://${config.control.host}:${config.control.port}`,
      `  Jira:         ${isJiraConfigured(config.jira) ? config.jira.url : "not configured (run `devpeace configure`)"}`,
      "",
      "Start the daemon with `devpeace run`, then `devpeace repos add <path>`.",
      "",
    ].join("\n"),
  );
}

export function createInitCommand(): Command {
  return new Command("init")
    .description("Create the devpeace config file")
    .option("--force", "Overwrite an existing config (generates a new API key)", false)
    .option("--jira-url <url>", "Jira base URL, e.g. https://example.atlassian.net")
    .option("--jira-user <user>", "Jira account email")
    .option("--jira-token <token>", "Jira API token (or set DEVPEACE_JIRA_TOKEN)")
    .action((opts: InitOptions) => {
      try {
        runInit(opts);
      } catch (err) {
        process.stderr.write(formatError(err) + "\n");
        process.exitCode = 1;
      }
    });
}
