#!/usr/bin/env -S npx tsx

/**
 * devpeace CLI entry point.
 *
 * A thin commander wrapper around the daemon's control API:
 *   init       — write ~/.devpeace/config.yaml
 *   run        — run the daemon in the foreground
 *   repos      — add / remove / list watched repositories
 *   status     — daemon counters and tracker state
 *   watch      — start / stop watching
 *   orphans    — list / associate / discard keyless sessions
 *   worklogs   — list / retry submissions
 *   issue      — move a Jira issue to another status
 *   configure  — set Jira credentials
 */

import { Command } from "commander";
import { pino } from "pino";
import { createConfigureCommand } from "./commands/configure.js";
import { createInitCommand } from "./commands/init.js";
import { createIssueCommand } from "./commands/issue.js";
import { createOrphansCommand } from "./commands/orphans.js";
import { createReposCommand } from "./commands/repos.js";
import { createRunCommand } from "./commands/run.js";
import { createStatusCommand, createWatchCommand } from "./commands/status.js";
import { createWorklogsCommand } from "./commands/worklogs.js";

/** Warnings and above on stderr so stdout stays clean for output */
const logger = pino({
  name: "devpeace-cli",
  level: process.env.LOG_LEVEL ?? "warn",
  transport: { target: "pino/file", options: { destination: 2 } },
});

const program = new Command();

program.name("devpeace").description("Track time in git repositories and log it to Jira").version("0.1.0");

program.addCommand(createInitCommand());
program.addCommand(createRunCommand());
program.addCommand(createReposCommand());
program.addCommand(createStatusCommand());
program.addCommand(createWatchCommand());
program.addCommand(createOrphansCommand());
program.addCommand(createWorklogsCommand());
program.addCommand(createIssueCommand());
program.addCommand(createConfigureCommand());

// ---------------------------------------------------------------------------
// Global error handling
// ---------------------------------------------------------------------------

process.on("unhandledRejection", (reason) => {
  logger.fatal({ err: reason }, "Unhandled rejection");
  process.exit(1);
});

process.on("uncaughtException", (err) => {
  logger.fatal({ err }, "Uncaught exception");
  process.exit(1);
});

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.fatal({ err }, "CLI execution failed");
  process.exit(1);
});
