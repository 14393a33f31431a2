/**
 * Tests for CLI output formatting.
 *
 * Pure unit tests. Colored output is compared after stripAnsi so the
 * results do not depend on whether the terminal supports color.
 */

import { describe, expect, it } from "vitest";
import { jiraCredentialsBodySchema } from "@devpeace/shared";
import { ApiConnectionError, ApiError } from "../api-client.js";
import {
  formatDuration,
  formatError,
  formatStatus,
  formatWorklogsTable,
  renderTable,
  stripAnsi,
  truncate,
} from "../formatters.js";
import { makeStatus } from "./fixtures.js";

describe("formatDuration", () => {
  it.each([
    [0, "0s"],
    [45, "45s"],
    [89, "1m"],
    [720, "12m"],
    [3590, "1h"],
    [5400, "1h 30m"],
    [7200, "2h"],
  ])("formats %i seconds as %s", (seconds, expected) => {
    expect(formatDuration(seconds)).toBe(expected);
  });
});

describe("truncate", () => {
  it("keeps short text and cuts long text with an ellipsis", () => {
    expect(truncate("short", 10)).toBe("short");
    expect(truncate("abcdefghij", 6)).toBe("abc...");
    expect(truncate("abcdef", 2)).toBe("..");
  });
});

describe("renderTable", () => {
  it("pads columns to their widest cell and right-aligns on request", () => {
    const out = renderTable({
      columns: [{ header: "A" }, { header: "NUM", align: "right" }],
      rows: [
        ["x", "1"],
        ["long", "22"],
      ],
    });

    expect(stripAnsi(out).split("\n")).toEqual(["A     NUM", "x       1", "long   22"]);
  });

  it("renders only the headers without rows", () => {
    expect(renderTable({ columns: [{ header: "A" }, { header: "NUM" }], rows: [] })).toBe("A  NUM");
  });

  it("shrinks the widest column to fit maxWidth", () => {
    const out = renderTable({ columns: [{ header: "NAME" }], rows: [["abcdefghij"]], maxWidth: 6 });
    expect(stripAnsi(out).split("\n")).toEqual(["NAME", "abc..."]);
  });
});

describe("entity formatters", () => {
  it("shows an empty state for no worklogs", () => {
    expect(stripAnsi(formatWorklogsTable([]))).toBe("No worklogs found.");
  });

  it("summarizes the daemon status", () => {
    expect(stripAnsi(formatStatus(makeStatus())).split("\n")).toEqual([
      "Watching:      yes (2/2 repositories)",
      "Open sessions: 1",
      "Tracker:       configured",
      "Worklogs:      3 pending, 12 submitted, 1 need attention, 0 failed",
      "Orphans:       2",
    ]);
  });

  it("surfaces the auth error", () => {
    const status = makeStatus({ tracker: "auth_error", auth_error: "HTTP 401" });
    expect(stripAnsi(formatStatus(status)).split("\n")[2]).toBe("Tracker:       auth error: HTTP 401");
  });
});

describe("formatError", () => {
  it("explains authentication failures", () => {
    expect(stripAnsi(formatError(new ApiError("Missing or invalid API key", 401)))).toBe(
      "Authentication failed. Check control.api_key in ~/.devpeace/config.yaml.",
    );
  });

  it("prefixes not-found and other daemon errors", () => {
    expect(stripAnsi(formatError(new ApiError("Orphan 01J not found", 404)))).toBe("Not found: Orphan 01J not found");
    expect(stripAnsi(formatError(new ApiError("disk full", 503)))).toBe("Daemon error (503): disk full");
  });

  it("hints at starting the daemon when it is unreachable", () => {
    const err = new ApiConnectionError("Failed to GET /api/status: fetch failed");
    expect(stripAnsi(formatError(err))).toBe(
      "Cannot reach the daemon: Failed to GET /api/status: fetch failed. Is `devpeace run` running?",
    );
  });

  it("lists validation issues by field", () => {
    const result = jiraCredentialsBodySchema.safeParse({ url: "nope", user: "dev", token: "test-secret" });
    if (result.success) throw new Error("expected a validation failure");
    expect(stripAnsi(formatError(result.error))).toBe("Invalid input: url: Invalid url");
  });

  it("falls back to the message of plain errors and to String otherwise", () => {
    expect(stripAnsi(formatError(new Error("boom")))).toBe("Error: boom");
    expect(stripAnsi(formatError("boom"))).toBe("Error: boom");
  });
});
