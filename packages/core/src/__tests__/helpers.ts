/**
 * Shared fixtures for core tests: temp git repositories, a scriptable
 * watch backend, a scriptable tracker gateway and record factories.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { pino } from "pino";
import {
  GatewayError,
  generateId,
  type IssueMetadata,
  type Session,
  type WorklogEntry,
} from "@devpeace/shared";
import type { CommentAck, IssueTrackerGateway, TrackerIdentity, WorklogAck } from "../gateway/types.js";
import type { RawFsEventKind, WatchBackend, WatchHandle, WatchListener, WatchOptions } from "../watcher/types.js";

export const silentLogger = pino({ level: "silent" });

export const SHA_A = "a".repeat(40);
export const SHA_B = "b".repeat(40);
export const SHA_C = "c".repeat(40);

/** mkdtemp with symlinks resolved (macOS /var -> /private/var) */
export function makeTempDir(prefix = "devpeace-test-"): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

// ---------------------------------------------------------------------------
// Git repositories on disk
// ---------------------------------------------------------------------------

/** Minimal control directory: HEAD on `branch` pointing at `sha` */
export function makeGitRepo(root: string, branch = "main", sha = SHA_A): string {
  const gitDir = path.join(root, ".git");
  fs.mkdirSync(path.join(gitDir, "refs", "heads"), { recursive: true });
  fs.mkdirSync(path.join(gitDir, "logs"), { recursive: true });
  writeRef(gitDir, branch, sha);
  fs.writeFileSync(path.join(gitDir, "HEAD"), `ref: refs/heads/${branch}\n`);
  fs.writeFileSync(path.join(gitDir, "logs", "HEAD"), "");
  return root;
}

export function writeRef(gitDir: string, branch: string, sha: string): void {
  const refPath = path.join(gitDir, "refs", "heads", ...branch.split("/"));
  fs.mkdirSync(path.dirname(refPath), { recursive: true });
  fs.writeFileSync(refPath, `${sha}\n`);
}

/** Simulate `git commit`: move the branch ref and append a reflog line */
export function gitCommit(root: string, branch: string, oldSha: string, newSha: string, message: string): void {
  const gitDir = path.join(root, ".git");
  writeRef(gitDir, branch, newSha);
  fs.appendFileSync(
    path.join(gitDir, "logs", "HEAD"),
    `${oldSha} ${newSha} Dev <dev@example.com> 1767261600 +0000\tcommit: ${message}\n`,
  );
}

/** Simulate `git checkout -b`: point HEAD at a (new) branch */
export function gitCheckout(root: string, branch: string, sha: string): void {
  const gitDir = path.join(root, ".git");
  writeRef(gitDir, branch, sha);
  fs.writeFileSync(path.join(gitDir, "HEAD"), `ref: refs/heads/${branch}\n`);
}

// ---------------------------------------------------------------------------
// Fake watch backend
// ---------------------------------------------------------------------------

interface FakeWatch {
  root: string;
  options: WatchOptions;
  listener: WatchListener;
  closed: boolean;
}

export class FakeBackend implements WatchBackend {
  readonly watches: FakeWatch[] = [];

  watch(root: string, options: WatchOptions, listener: WatchListener): WatchHandle {
    const entry: FakeWatch = { root, options, listener, closed: false };
    this.watches.push(entry);
    return {
      close: async () => {
        entry.closed = true;
      },
    };
  }

  /** Deliver a raw event for a path relative to the watched root */
  emit(root: string, kind: RawFsEventKind, relPath: string): void {
    const watch = this.active(root);
    if (watch.options.ignored?.(path.join(root, relPath))) return;
    watch.listener.onEvent({ kind, path: path.join(root, relPath) });
  }

  fail(root: string, error: Error): void {
    this.active(root).listener.onError(error);
  }

  isWatching(root: string): boolean {
    return this.watches.some((w) => w.root === root && !w.closed);
  }

  private active(root: string): FakeWatch {
    const watch = [...this.watches].reverse().find((w) => w.root === root && !w.closed);
    if (!watch) throw new Error(`No active watch on ${root}`);
    return watch;
  }
}

// ---------------------------------------------------------------------------
// Fake tracker gateway
// ---------------------------------------------------------------------------

type GatewayMethod = "submit" | "postComment" | "resolveIssue" | "verifyCredentials" | "transitionIssue";

export class FakeGateway implements IssueTrackerGateway {
  /** Every call, e.g. "submit ABC-42" */
  readonly calls: string[] = [];
  /** Issue key -> current status; unknown keys resolve as "To Do" */
  readonly statuses = new Map<string, string>();
  /** When set, submit() never settles until aborted */
  hangSubmit = false;

  private readonly failures: Record<GatewayMethod, Error[]> = {
    submit: [],
    postComment: [],
    resolveIssue: [],
    verifyCredentials: [],
    transitionIssue: [],
  };
  private counter = 0;

  /** Make the next `times` calls of `method` reject with `error` */
  failNext(method: GatewayMethod, error: Error, times = 1): void {
    for (let i = 0; i < times; i++) this.failures[method].push(error);
  }

  callsOf(method: GatewayMethod): string[] {
    return this.calls.filter((c) => c.startsWith(`${method} `));
  }

  async submit(entry: WorklogEntry, signal?: AbortSignal): Promise<WorklogAck> {
    this.calls.push(`submit ${entry.issue_key}`);
    this.maybeFail("submit");
    if (this.hangSubmit) {
      await new Promise<never>((_, reject) => {
        signal?.addEventListener("abort", () => reject(new GatewayError("aborted", "transient")));
      });
    }
    return { worklog_id: `wl-${++this.counter}` };
  }

  async postComment(issueKey: string, _text: string): Promise<CommentAck> {
    this.calls.push(`postComment ${issueKey}`);
    this.maybeFail("postComment");
    return { comment_id: `c-${++this.counter}` };
  }

  async resolveIssue(issueKey: string): Promise<IssueMetadata> {
    this.calls.push(`resolveIssue ${issueKey}`);
    this.maybeFail("resolveIssue");
    return {
      key: issueKey,
      summary: "Test issue",
      status: this.statuses.get(issueKey) ?? "To Do",
      project: issueKey.split("-")[0] ?? "",
      issue_type: "Task",
      assignee: null,
    };
  }

  async verifyCredentials(): Promise<TrackerIdentity> {
    this.calls.push("verifyCredentials -");
    this.maybeFail("verifyCredentials");
    return { display_name: "Test User", account: "test-user" };
  }

  async transitionIssue(issueKey: string, statusName: string): Promise<void> {
    this.calls.push(`transitionIssue ${issueKey} ${statusName}`);
    this.maybeFail("transitionIssue");
    this.statuses.set(issueKey, statusName);
  }

  private maybeFail(method: GatewayMethod): void {
    const error = this.failures[method].shift();
    if (error) throw error;
  }
}

// ---------------------------------------------------------------------------
// Record factories
// ---------------------------------------------------------------------------

export function makeSession(overrides: Partial<Session> = {}): Session {
  return {
    id: generateId(),
    repository_id: generateId(),
    repository_path: "/work/app",
    branch: "feature/ABC-42-login",
    issue_key: "ABC-42",
    started_at: "2026-03-02T10:00:00.000Z",
    last_activity_at: "2026-03-02T10:05:00.000Z",
    ended_at: "2026-03-02T10:05:00.000Z",
    active_ms: 300_000,
    commits: [],
    end_reason: "idle_timeout",
    original_status: null,
    ...overrides,
  };
}

export function makeEntry(overrides: Partial<WorklogEntry> = {}): WorklogEntry {
  return {
    id: generateId(),
    session_id: generateId(),
    repository_id: generateId(),
    repository_path: "/work/app",
    issue_key: "ABC-42",
    started_at: "2026-03-02T10:00:00.000Z",
    ended_at: "2026-03-02T10:05:00.000Z",
    duration_seconds: 300,
    comment: "Worked on app",
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
