/**
 * Response builders and a fetch stub for CLI tests. Records satisfy the
 * shared schemas so the client accepts them.
 */

import { vi } from "vitest";
import {
  generateId,
  type DaemonStatus,
  type OrphanRecord,
  type WatchedRepository,
  type WorklogEntry,
} from "@devpeace/shared";
import { DaemonClient } from "../api-client.js";

export const BASE_URL = "http://127.0.0.1:4719";
export const TEST_API_KEY = "test-api-key";

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** Replace global fetch; each call takes the next queued response */
export function stubFetch(...responses: Array<Response | Error>) {
  const queue = [...responses];
  const fetchMock = vi.fn<typeof fetch>(async () => {
    const next = queue.shift();
    if (!next) throw new Error("unexpected fetch");
    if (next instanceof Error) throw next;
    return next;
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

/** URL, method, headers and parsed body of the n-th fetch call */
export function requestOf(fetchMock: ReturnType<typeof stubFetch>, n = 0) {
  const call = fetchMock.mock.calls[n];
  if (!call) throw new Error(`fetch was not called ${n + 1} times`);
  const [input, init] = call;
  const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
  return {
    url: String(input),
    method: init?.method,
    headers: new Headers(init?.headers),
    body,
  };
}

export function makeClient(): DaemonClient {
  return new DaemonClient({ baseUrl: BASE_URL, apiKey: TEST_API_KEY });
}

export function makeRepository(overrides: Partial<WatchedRepository> = {}): WatchedRepository {
  return {
    id: generateId(),
    path: "/work/billing",
    display_name: "billing",
    enabled: true,
    added_at: "2026-03-02T09:00:00.000Z",
    watch_error: null,
    ...overrides,
  };
}

export function makeOrphan(overrides: Partial<OrphanRecord> = {}): OrphanRecord {
  return {
    id: generateId(),
    session_id: generateId(),
    repository_id: generateId(),
    repository_path: "/work/billing",
    branch: "spike-caching",
    started_at: "2026-03-02T10:00:00.000Z",
    ended_at: "2026-03-02T10:05:00.000Z",
    duration_seconds: 300,
    comment: "Worked on billing",
    commits: [],
    state: "unresolved",
    created_at: "2026-03-02T10:05:00.000Z",
    ...overrides,
  };
}

export function makeWorklog(overrides: Partial<WorklogEntry> = {}): WorklogEntry {
  return {
    id: generateId(),
    session_id: generateId(),
    repository_id: generateId(),
    repository_path: "/work/billing",
    issue_key: "ABC-42",
    started_at: "2026-03-02T10:00:00.000Z",
    ended_at: "2026-03-02T10:05:00.000Z",
    duration_seconds: 300,
    comment: "Worked on billing",
    commit_comment: null,
    status: "pending",
    issue_verified: false,
    worklog_id: null,
    comment_id: null,
    attempts: 0,
    next_attempt_at: null,
    last_error: null,
    created_at: "2026-03-02T10:05:00.000Z",
    submitted_at: null,
    ...overrides,
  };
}

export function makeStatus(overrides: Partial<DaemonStatus> = {}): DaemonStatus {
  return {
    running: true,
    repositories: 2,
    watching: 2,
    open_sessions: 1,
    pending: 3,
    failed: 0,
    needs_attention: 1,
    submitted: 12,
    orphans: 2,
    auth_error: null,
    tracker: "configured",
    ...overrides,
  };
}
