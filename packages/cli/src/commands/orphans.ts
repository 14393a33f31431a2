/**
 * `devpeace orphans` — sessions on branches without an issue key.
 *
 * An orphan becomes a pending worklog once it is associated with a key;
 * discarding drops it for good.
 */

import { Command } from "commander";
import pc from "picocolors";
import type { DaemonClient } from "../lib/api-client.js";
import { withClient } from "../lib/command-runner.js";
import { formatDuration, formatOrphansTable, outputResult } from "../lib/formatters.js";

export async function runOrphansList(client: DaemonClient, opts: { json?: boolean }): Promise<void> {
  const orphans = await client.listOrphans();
  outputResult(orphans, { json: opts.json, format: formatOrphansTable });
}

export async function runOrphansAssociate(client: DaemonClient, id: string, issueKey: string): Promise<void> {
  const entry = await client.associateOrphan(id, issueKey);
  process.stdout.write(
    `Queued ${formatDuration(entry.duration_seconds)} on ${pc.bold(entry.issue_key)} ${pc.dim(`(worklog ${entry.id})`)}\n`,
  );
}

export async function runOrphansDiscard(client: DaemonClient, id: string): Promise<void> {
  const orphan = await client.discardOrphan(id);
  process.stdout.write(`Discarded ${formatDuration(orphan.duration_seconds)} on ${orphan.branch ?? "(detached)"}\n`);
}

export function createOrphansCommand(): Command {
  const cmd = new Command("orphans").description("Review time tracked on branches without an issue key");

  cmd
    .command("list", { isDefault: true })
    .description("List unresolved orphans")
    .option("--json", "Output raw JSON")
    .action(async (opts: { json?: boolean }) => {
      await withClient((client) => runOrphansList(client, opts));
    });

  cmd
    .command("associate")
    .description("Log an orphan against an issue")
    .argument("<id>", "Orphan id")
    .argument("<issue-key>", "Issue key, e.g. PROJ-123")
    .action(async (id: string, issueKey: string) => {
      await withClient((client) => runOrphansAssociate(client, id, issueKey));
    });

  cmd
    .command("discard")
    .description("Drop an orphan without logging it")
    .argument("<id>", "Orphan id")
    .action(async (id: string) => {
      await withClient((client) => runOrphansDiscard(client, id));
    });

  return cmd;
}
