/**
 * Tests for the daemon-backed commands.
 *
 * Each command body runs against a DaemonClient whose fetch is stubbed;
 * stdout and stderr are captured through spies.
 */

import * as path from "node:path";
import { InvalidArgumentError } from "commander";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { stripAnsi } from "../../lib/formatters.js";
import { overrideClientFactory, withClient } from "../../lib/command-runner.js";
import {
  jsonResponse,
  makeClient,
  makeOrphan,
  makeRepository,
  makeWorklog,
  requestOf,
  stubFetch,
} from "../../lib/__tests__/fixtures.js";
import { runIssueTransition } from "../issue.js";
import { runOrphansAssociate, runOrphansDiscard } from "../orphans.js";
import { runReposAdd, runReposList } from "../repos.js";
import { runStatus } from "../status.js";
import { parseStatusOption, runWorklogsRetry } from "../worklogs.js";

let stdout: string[];
let stderr: string[];

beforeEach(() => {
  stdout = [];
  stderr = [];
  vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
    stdout.push(String(chunk));
    return true;
  });
  vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
    stderr.push(String(chunk));
    return true;
  });
});

afterEach(() => {
  vi.unstubAllGlobals();
  overrideClientFactory(undefined);
  process.exitCode = undefined;
});

function output(): string {
  return stripAnsi(stdout.join(""));
}

describe("repos", () => {
  it("sends an absolute path when adding", async () => {
    const fetchMock = stubFetch(jsonResponse({ repository: makeRepository() }, 201));

    await runReposAdd(makeClient(), "work/billing");

    expect(requestOf(fetchMock).body).toEqual({ path: path.resolve("work/billing") });
    expect(output()).toBe("Watching billing /work/billing\n");
  });

  it("prints JSON on request", async () => {
    const repo = makeRepository();
    stubFetch(jsonResponse({ repositories: [repo] }));

    await runReposList(makeClient(), { json: true });

    expect(JSON.parse(output())).toEqual([repo]);
  });
});

describe("status", () => {
  it("prints the status summary", async () => {
    stubFetch(
      jsonResponse({
        running: false,
        repositories: 1,
        watching: 0,
        open_sessions: 0,
        pending: 0,
        failed: 0,
        needs_attention: 0,
        submitted: 0,
        orphans: 0,
        auth_error: null,
        tracker: "not_configured",
      }),
    );

    await runStatus(makeClient(), {});

    expect(output().split("\n").slice(0, 3)).toEqual([
      "Watching:      stopped (0/1 repositories)",
      "Open sessions: 0",
      "Tracker:       not configured (run `devpeace configure`)",
    ]);
  });
});

describe("orphans", () => {
  it("reports where an associated orphan was queued", async () => {
    const entry = makeWorklog({ issue_key: "ABC-7" });
    stubFetch(jsonResponse({ entry }, 201));

    await runOrphansAssociate(makeClient(), makeOrphan().id, "abc-7");

    expect(output()).toBe(`Queued 5m on ABC-7 (worklog ${entry.id})\n`);
  });

  it("reports what was discarded", async () => {
    stubFetch(jsonResponse({ orphan: makeOrphan({ duration_seconds: 5400, branch: null }) }));

    await runOrphansDiscard(makeClient(), makeOrphan().id);

    expect(output()).toBe("Discarded 1h 30m on (detached)\n");
  });
});

describe("worklogs", () => {
  it("parses known statuses and rejects others", () => {
    expect(parseStatusOption("needs_attention")).toBe("needs_attention");
    expect(() => parseStatusOption("bogus")).toThrow(InvalidArgumentError);
  });

  it("says when there is nothing to retry", async () => {
    stubFetch(jsonResponse({ retried: [] }));
    await runWorklogsRetry(makeClient(), undefined);
    expect(output()).toBe("Nothing to retry.\n");
  });

  it("lists the issues of requeued entries", async () => {
    stubFetch(jsonResponse({ retried: [makeWorklog({ issue_key: "ABC-1" }), makeWorklog({ issue_key: "ABC-2" })] }));
    await runWorklogsRetry(makeClient(), undefined);
    expect(output()).toBe("Requeued 2 entries: ABC-1, ABC-2\n");
  });
});

describe("issue", () => {
  it("prints the old and new status after a transition", async () => {
    const fetchMock = stubFetch(jsonResponse({ issue_key: "ABC-42", from: "To Do", to: "In Progress", changed: true }));

    await runIssueTransition(makeClient(), "abc-42", "In Progress");

    expect(requestOf(fetchMock).body).toEqual({ status: "In Progress" });
    expect(output()).toBe("ABC-42: To Do -> In Progress\n");
  });

  it("says so when the issue already has the status", async () => {
    stubFetch(jsonResponse({ issue_key: "ABC-42", from: "In Progress", to: "In Progress", changed: false }));

    await runIssueTransition(makeClient(), "ABC-42", "in progress");

    expect(output()).toBe("ABC-42 is already In Progress\n");
  });
});

describe("withClient", () => {
  it("prints failures to stderr and sets the exit code", async () => {
    stubFetch(new TypeError("fetch failed"));
    overrideClientFactory(makeClient);

    await withClient((client) => runStatus(client, {}));

    expect(stripAnsi(stderr.join(""))).toBe(
      "Cannot reach the daemon: Failed to GET /api/status: fetch failed. Is `devpeace run` running?\n",
    );
    expect(process.exitCode).toBe(1);
    expect(stdout).toEqual([]);
  });

  it("reports a client that cannot be built", async () => {
    overrideClientFactory(() => {
      throw new Error("Config file not found");
    });

    await withClient(async () => {});

    expect(stripAnsi(stderr.join(""))).toBe("Error: Config file not found\n");
    expect(process.exitCode).toBe(1);
  });
});
