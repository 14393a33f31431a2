/**
 * `devpeace repos` — register, unregister and list watched repositories.
 */

import * as path from "node:path";
import { Command } from "commander";
import pc from "picocolors";
import type { DaemonClient } from "../lib/api-client.js";
import { withClient } from "../lib/command-runner.js";
import { formatRepositoriesTable, outputResult } from "../lib/formatters.js";

export async function runReposAdd(client: DaemonClient, repoPath: string): Promise<void> {
  const repo = await client.addRepository(path.resolve(repoPath));
  process.stdout.write(`${pc.green("Watching")} ${repo.display_name} ${pc.dim(repo.path)}\n`);
}

export async function runReposRemove(client: DaemonClient, repoPath: string): Promise<void> {
  const repo = await client.removeRepository(path.resolve(repoPath));
  process.stdout.write(`Stopped watching ${repo.display_name} ${pc.dim(repo.path)}\n`);
}

export async function runReposList(client: DaemonClient, opts: { json?: boolean }): Promise<void> {
  const repositories = await client.listRepositories();
  outputResult(repositories, { json: opts.json, format: formatRepositoriesTable });
}

export function createReposCommand(): Command {
  const cmd = new Command("repos").description("Manage watched repositories");

  cmd
    .command("add")
    .description("Start watching a git repository")
    .argument("[path]", "Repository path", ".")
    .action(async (repoPath: string) => {
      await withClient((client) => runReposAdd(client, repoPath));
    });

  cmd
    .command("remove")
    .description("Stop watching a repository (its open session is logged)")
    .argument("[path]", "Repository path", ".")
    .action(async (repoPath: string) => {
      await withClient((client) => runReposRemove(client, repoPath));
    });

  cmd
    .command("list")
    .description("List watched repositories")
    .option("--json", "Output raw JSON")
    .action(async (opts: { json?: boolean }) => {
      await withClient((client) => runReposList(client, opts));
    });

  return cmd;
}
