/**
 * `devpeace issue` — act on a Jira issue through the daemon.
 */

import { Command } from "commander";
import pc from "picocolors";
import type { DaemonClient } from "../lib/api-client.js";
import { withClient } from "../lib/command-runner.js";

export async function runIssueTransition(client: DaemonClient, issueKey: string, status: string): Promise<void> {
  const result = await client.transitionIssue(issueKey, status);
  if (!result.changed) {
    process.stdout.write(`${pc.bold(result.issue_key)} is already ${result.to}\n`);
    return;
  }
  process.stdout.write(`${pc.bold(result.issue_key)}: ${result.from} -> ${pc.green(result.to)}\n`);
}

export function createIssueCommand(): Command {
  const cmd = new Command("issue").description("Work with Jira issues");

  cmd
    .command("transition")
    .description("Move an issue to another status")
    .argument("<issue-key>", "Issue key, e.g. PROJ-123")
    .argument("<status>", 'Target status name, e.g. "In Progress"')
    .action(async (issueKey: string, status: string) => {
      await withClient((client) => runIssueTransition(client, issueKey, status));
    });

  return cmd;
}
