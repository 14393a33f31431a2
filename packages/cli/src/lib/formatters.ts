/**
 * Output formatting for the devpeace CLI.
 *
 * Durations, timestamps, status labels and aligned tables. All color output
 * uses picocolors.
 */

import pc from "picocolors";
import { ZodError } from "zod";
import type { DaemonStatus, OrphanRecord, WatchedRepository, WorklogEntry, WorklogStatus } from "@devpeace/shared";
import { ApiConnectionError, ApiError } from "./api-client.js";

// ---------------------------------------------------------------------------
// ANSI Utilities
// ---------------------------------------------------------------------------

const ANSI_REGEX = /\x1b\[[0-9;]*[a-zA-Z]/g;

export function stripAnsi(str: string): string {
  return str.replace(ANSI_REGEX, "");
}

/** Visible width, ignoring ANSI codes */
function displayWidth(str: string): number {
  return stripAnsi(str).length;
}

// ---------------------------------------------------------------------------
// Durations and timestamps
// ---------------------------------------------------------------------------

/**
 * Format logged seconds the way worklogs read.
 *
 * Examples: "45s", "12m", "1h 30m", "2h"
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${Math.max(0, Math.round(seconds))}s`;

  const totalMinutes = Math.round(seconds / 60);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;

  if (hours === 0) return `${minutes}m`;
  if (minutes === 0) return `${hours}h`;
  return `${hours}h ${minutes}m`;
}

/** "2026-03-02 10:00" in local time */
export function formatTimestamp(iso: string | null): string {
  if (!iso) return "-";
  const date = new Date(iso);
  const pad = (n: number): string => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

// ---------------------------------------------------------------------------
// Status labels
// ---------------------------------------------------------------------------

export function formatWorklogStatus(status: WorklogStatus): string {
  switch (status) {
    case "submitted":
      return pc.green("submitted");
    case "pending":
      return pc.yellow("pending");
    case "needs_attention":
      return pc.magenta("needs attention");
    case "failed":
      return pc.red("failed");
  }
}

// ---------------------------------------------------------------------------
// Text Truncation
// ---------------------------------------------------------------------------

/** ANSI-aware; appends "..." when cut */
export function truncate(text: string, maxLen: number): string {
  if (displayWidth(text) <= maxLen) return text;
  if (maxLen <= 3) return "...".slice(0, maxLen);
  return stripAnsi(text).slice(0, maxLen - 3) + "...";
}

// ---------------------------------------------------------------------------
// Table Rendering
// ---------------------------------------------------------------------------

interface ColumnDef {
  header: string;
  /** Defaults to the header length */
  minWidth?: number;
  align?: "left" | "right";
}

/**
 * Render rows as an aligned table, columns sized to their widest cell and
 * separated by two spaces. With `maxWidth`, the widest column shrinks
 * first (never below 3).
 */
export function renderTable(opts: { columns: ColumnDef[]; rows: string[][]; maxWidth?: number }): string {
  const { columns, rows, maxWidth } = opts;
  const gap = "  ";

  if (rows.length === 0) {
    return columns.map((c) => c.header).join(gap);
  }

  const widths = columns.map((col, i) => {
    let widest = Math.max(col.minWidth ?? 0, displayWidth(col.header));
    for (const row of rows) widest = Math.max(widest, displayWidth(row[i] ?? ""));
    return widest;
  });

  if (maxWidth) {
    let total = widths.reduce((a, b) => a + b, 0) + gap.length * (columns.length - 1);
    while (total > maxWidth) {
      const widest = Math.max(...widths);
      const idx = widths.indexOf(widest);
      const shrinkBy = Math.min(total - maxWidth, widest - 3);
      if (shrinkBy <= 0) break;
      widths[idx] = widest - shrinkBy;
      total -= shrinkBy;
    }
  }

  const cell = (value: string, i: number): string => {
    const width = widths[i] ?? 0;
    const visible = displayWidth(value);
    if (visible > width) return truncate(value, width);
    const padding = " ".repeat(width - visible);
    return columns[i]?.align === "right" ? padding + value : value + padding;
  };

  const header = columns.map((col, i) => cell(pc.dim(col.header), i)).join(gap);
  const lines = rows.map((row) => columns.map((_, i) => cell(row[i] ?? "", i)).join(gap).trimEnd());
  return [header.trimEnd(), ...lines].join("\n");
}

// ---------------------------------------------------------------------------
// Entity tables
// ---------------------------------------------------------------------------

export function formatRepositoriesTable(repositories: WatchedRepository[]): string {
  if (repositories.length === 0) return formatEmpty("repositories");
  return renderTable({
    columns: [{ header: "NAME" }, { header: "STATE" }, { header: "PATH" }],
    rows: repositories.map((r) => [
      r.display_name,
      r.watch_error ? pc.red("error") : r.enabled ? pc.green("watching") : pc.dim("disabled"),
      r.watch_error ? `${r.path} ${pc.dim(`(${r.watch_error})`)}` : r.path,
    ]),
  });
}

export function formatOrphansTable(orphans: OrphanRecord[]): string {
  if (orphans.length === 0) return formatEmpty("orphans");
  return renderTable({
    columns: [
      { header: "ID" },
      { header: "BRANCH" },
      { header: "DURATION", align: "right" },
      { header: "STARTED" },
      { header: "REPOSITORY" },
    ],
    rows: orphans.map((o) => [
      o.id,
      o.branch ?? pc.dim("(detached)"),
      formatDuration(o.duration_seconds),
      formatTimestamp(o.started_at),
      o.repository_path,
    ]),
  });
}

export function formatWorklogsTable(entries: WorklogEntry[]): string {
  if (entries.length === 0) return formatEmpty("worklogs");
  return renderTable({
    columns: [
      { header: "ID" },
      { header: "ISSUE" },
      { header: "DURATION", align: "right" },
      { header: "STATUS" },
      { header: "STARTED" },
      { header: "LAST ERROR" },
    ],
    rows: entries.map((e) => [
      e.id,
      e.issue_key,
      formatDuration(e.duration_seconds),
      formatWorklogStatus(e.status),
      formatTimestamp(e.started_at),
      e.last_error ? truncate(e.last_error, 60) : "",
    ]),
  });
}

export function formatStatus(status: DaemonStatus): string {
  const tracker =
    status.tracker === "configured"
      ? pc.green("configured")
      : status.tracker === "auth_error"
        ? pc.red(`auth error: ${status.auth_error ?? "credentials rejected"}`)
        : pc.yellow("not configured (run `devpeace configure`)");

  return [
    `Watching:      ${status.running ? pc.green("yes") : pc.dim("stopped")} (${status.watching}/${status.repositories} repositories)`,
    `Open sessions: ${status.open_sessions}`,
    `Tracker:       ${tracker}`,
    `Worklogs:      ${status.pending} pending, ${status.submitted} submitted, ${status.needs_attention} need attention, ${status.failed} failed`,
    `Orphans:       ${status.orphans}`,
  ].join("\n");
}

// ---------------------------------------------------------------------------
// Empty State and Error Formatting
// ---------------------------------------------------------------------------

export function formatEmpty(entity: string): string {
  return pc.dim(`No ${entity} found.`);
}

export function formatError(error: unknown): string {
  if (error instanceof ApiError) {
    if (error.statusCode === 401) {
      return pc.red("Authentication failed. Check control.api_key in ~/.devpeace/config.yaml.");
    }
    if (error.statusCode === 404) {
      return pc.red(`Not found: ${error.message}`);
    }
    return pc.red(`Daemon error (${error.statusCode}): ${error.message}`);
  }

  if (error instanceof ApiConnectionError) {
    return pc.red(`Cannot reach the daemon: ${error.message}. Is \`devpeace run\` running?`);
  }

  if (error instanceof ZodError) {
    const issues = error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message));
    return pc.red(`Invalid input: ${issues.join("; ")}`);
  }

  if (error instanceof Error) {
    return pc.red(`Error: ${error.message}`);
  }

  return pc.red(`Error: ${String(error)}`);
}

// ---------------------------------------------------------------------------
// Output Result Helper
// ---------------------------------------------------------------------------

/** JSON with 2-space indent when `json` is set, otherwise `format(data)` */
export function outputResult<T>(data: T, opts: { json?: boolean; format: (data: T) => string }): void {
  if (opts.json) {
    process.stdout.write(JSON.stringify(data, null, 2) + "\n");
  } else {
    process.stdout.write(opts.format(data) + "\n");
  }
}
