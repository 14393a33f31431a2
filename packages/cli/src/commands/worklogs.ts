/**
 * `devpeace worklogs` — list entries and retry failed ones.
 */

import { Command, InvalidArgumentError } from "commander";
import { WORKLOG_STATUSES, worklogStatusSchema, type WorklogStatus } from "@devpeace/shared";
import type { DaemonClient } from "../lib/api-client.js";
import { withClient } from "../lib/command-runner.js";
import { formatWorklogsTable, outputResult } from "../lib/formatters.js";

export function parseStatusOption(value: string): WorklogStatus {
  const parsed = worklogStatusSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of: ${WORKLOG_STATUSES.join(", ")}`);
  }
  return parsed.data;
}

export async function runWorklogsList(
  client: DaemonClient,
  opts: { status?: WorklogStatus; json?: boolean },
): Promise<void> {
  const entries = await client.listWorklogs(opts.status);
  outputResult(entries, { json: opts.json, format: formatWorklogsTable });
}

export async function runWorklogsRetry(client: DaemonClient, id: string | undefined): Promise<void> {
  const retried = await client.retryWorklogs(id);
  if (retried.length === 0) {
    process.stdout.write("Nothing to retry.\n");
    return;
  }
  const noun = retried.length === 1 ? "entry" : "entries";
  process.stdout.write(`Requeued ${retried.length} ${noun}: ${retried.map((e) => e.issue_key).join(", ")}\n`);
}

export function createWorklogsCommand(): Command {
  const cmd = new Command("worklogs").description("Inspect worklog submissions");

  cmd
    .command("list", { isDefault: true })
    .description("List worklog entries")
    .option("-s, --status <status>", `Filter by status (${WORKLOG_STATUSES.join(", ")})`, parseStatusOption)
    .option("--json", "Output raw JSON")
    .action(async (opts: { status?: WorklogStatus; json?: boolean }) => {
      await withClient((client) => runWorklogsList(client, opts));
    });

  cmd
    .command("retry")
    .description("Requeue a failed entry, or every failed / needs-attention entry")
    .argument("[id]", "Worklog entry id")
    .action(async (id: string | undefined) => {
      await withClient((client) => runWorklogsRetry(client, id));
    });

  return cmd;
}
