/**
 * Per-repository watcher: turns raw filesystem notifications into
 * repository events.
 *
 * Classification of a raw path:
 *   .git/HEAD, .git/logs/HEAD, .git/refs/heads/**, .git/packed-refs
 *       -> metadata: re-read the snapshot and emit git.checkout, git.commit
 *          or repo.entered depending on what moved (a checkout followed by
 *          a commit in one window emits both, checkout first)
 *   .git/index          -> repo.entered
 *   any other .git path -> ignored
 *   working tree path   -> repo.file_changed (unless it matches an ignore pattern)
 *
 * Raw events are collapsed in a fixed window of `debounceMs`: the window
 * opens on the first event and at its end the metadata events and at most
 * one repo.file_changed are emitted, metadata first.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { Logger } from "pino";
import { WatchError, type RepoEvent } from "@devpeace/shared";
import {
  readLastReflogEntry,
  readSnapshot,
  resolveGitDir,
  type GitSnapshot,
  type ReflogEntry,
} from "../git/repo-reader.js";
import type { RawFsEvent, WatchBackend, WatchHandle } from "./types.js";

/** Windows to keep re-reading a missing HEAD before giving up quietly */
const MAX_HEAD_RETRIES = 3;

/** Control directory subtrees never worth a notification */
const IGNORED_GIT_DIRS = ["objects", "lfs", "hooks", "modules", "worktrees"];

export interface RepositoryWatcherOptions {
  repositoryId: string;
  /** Absolute working tree root */
  root: string;
  backend: WatchBackend;
  debounceMs: number;
  ignorePatterns: readonly string[];
  logger: Logger;
  onEvent: (event: RepoEvent) => void;
  /** Called once when the watch breaks; no events follow */
  onError: (error: WatchError) => void;
  now?: () => Date;
}

type PathClass = "metadata" | "index" | "ignored" | "worktree";

export class RepositoryWatcher {
  private readonly opts: RepositoryWatcherOptions;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly ignoreMatchers: RegExp[];

  private gitDir: string | null = null;
  private snapshot: GitSnapshot | null = null;
  private handles: WatchHandle[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private failed = false;

  // Current debounce window
  private metadataTouched = false;
  private indexTouched = false;
  private rootVanished = false;
  private changedPaths = new Set<string>();
  private rawCount = 0;
  private headRetries = 0;

  constructor(opts: RepositoryWatcherOptions) {
    this.opts = opts;
    this.now = opts.now ?? (() => new Date());
    this.log = opts.logger.child({ component: "watcher", repository: opts.root });
    this.ignoreMatchers = opts.ignorePatterns.map(globToRegExp);
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Current branch as last read from HEAD */
  get currentBranch(): string | null {
    return this.snapshot?.branch ?? null;
  }

  /**
   * Start watching and emit repo.entered.
   * @throws WatchError when the root is not a git repository
   */
  start(): void {
    if (this.running) return;

    const gitDir = resolveGitDir(this.opts.root);
    if (!gitDir) {
      throw new WatchError(`${this.opts.root} is not a git repository`, "WATCH_NOT_A_REPOSITORY", {
        root: this.opts.root,
      });
    }
    this.gitDir = gitDir;
    this.snapshot = readSnapshot(gitDir);
    this.failed = false;
    this.running = true;

    const listener = {
      onEvent: (event: RawFsEvent) => this.handleRaw(event),
      onError: (error: Error) => this.fail(error.message, "WATCH_BACKEND_ERROR"),
    };
    const ignored = (p: string) => this.isIgnored(p);

    this.handles.push(this.opts.backend.watch(this.opts.root, { ignored }, listener));

    // Linked worktrees keep HEAD outside the working tree
    const inTree = path.join(this.opts.root, ".git");
    if (gitDir !== inTree) {
      this.handles.push(this.opts.backend.watch(gitDir, { ignored }, listener));
    }

    this.log.info({ branch: this.snapshot?.branch ?? null }, "Watching repository");
    this.emit({ type: "repo.entered", repository_id: this.opts.repositoryId, timestamp: this.stamp() });
  }

  /** Stop watching. Pending window contents are dropped. */
  async stop(): Promise<void> {
    this.running = false;
    this.clearTimer();
    this.resetWindow();
    const handles = this.handles;
    this.handles = [];
    await Promise.all(handles.map((h) => h.close()));
  }

  // -------------------------------------------------------------------------
  // Raw event intake
  // -------------------------------------------------------------------------

  private handleRaw(event: RawFsEvent): void {
    if (!this.running) return;

    const cls = this.classify(event);
    if (cls === "ignored") return;

    switch (cls) {
      case "metadata":
        this.metadataTouched = true;
        break;
      case "index":
        this.indexTouched = true;
        break;
      case "worktree":
        this.changedPaths.add(toPosix(path.relative(this.opts.root, event.path)));
        break;
    }
    this.rawCount++;
    this.armWindow();
  }

  private classify(event: RawFsEvent): PathClass | "ignored" {
    const { root } = this.opts;
    const gitDir = this.gitDir;
    const abs = path.resolve(event.path);

    if (event.kind === "unlinkDir" && (abs === root || (gitDir !== null && abs === gitDir))) {
      this.rootVanished = true;
      this.armWindow();
      return "ignored";
    }

    if (gitDir !== null && isInside(gitDir, abs)) {
      const rel = toPosix(path.relative(gitDir, abs));
      if (rel === "HEAD" || rel === "logs/HEAD" || rel === "packed-refs") return "metadata";
      if (rel.startsWith("refs/heads/") && !event.kind.endsWith("Dir")) return "metadata";
      if (rel === "index") return "index";
      return "ignored";
    }

    const rel = path.relative(root, abs);
    if (!rel || rel.startsWith("..") || path.isAbsolute(rel)) return "ignored";
    // A .git file (worktree pointer) or anything under it
    if (rel === ".git" || rel.startsWith(`.git${path.sep}`)) return "ignored";
    if (event.kind === "addDir" || event.kind === "unlinkDir") return "ignored";
    if (this.matchesIgnorePattern(rel)) return "ignored";
    return "worktree";
  }

  /** Passed to the backend so ignored subtrees are never descended into */
  private isIgnored(absolutePath: string): boolean {
    const abs = path.resolve(absolutePath);
    const gitDir = this.gitDir;
    if (gitDir !== null && isInside(gitDir, abs)) {
      const first = toPosix(path.relative(gitDir, abs)).split("/")[0];
      return first !== undefined && IGNORED_GIT_DIRS.includes(first);
    }
    const rel = path.relative(this.opts.root, abs);
    if (!rel || rel.startsWith("..")) return false;
    return this.matchesIgnorePattern(rel);
  }

  private matchesIgnorePattern(rel: string): boolean {
    const segments = toPosix(rel).split("/");
    return segments.some((segment) => this.ignoreMatchers.some((re) => re.test(segment)));
  }

  // -------------------------------------------------------------------------
  // Debounce window
  // -------------------------------------------------------------------------

  private armWindow(): void {
    if (this.timer) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flush();
    }, this.opts.debounceMs);
  }

  private flush(): void {
    if (!this.running) return;

    const { root } = this.opts;
    const gitDir = this.gitDir;
    if (this.rootVanished || !fs.existsSync(root) || gitDir === null || !fs.existsSync(gitDir)) {
      this.fail(`Repository ${root} disappeared`, "WATCH_REPOSITORY_GONE");
      return;
    }

    const metadata = this.metadataTouched ? this.readMetadataEvents(gitDir) : null;
    const retryMetadata = this.metadataTouched && metadata === undefined;
    const indexTouched = this.indexTouched;
    const paths = [...this.changedPaths].sort();
    const count = this.rawCount;
    this.resetWindow();

    if (metadata) {
      for (const event of metadata) this.emit(event);
    } else if (indexTouched) {
      this.emit({ type: "repo.entered", repository_id: this.opts.repositoryId, timestamp: this.stamp() });
    }

    if (paths.length > 0) {
      this.emit({
        type: "repo.file_changed",
        repository_id: this.opts.repositoryId,
        timestamp: this.stamp(),
        paths,
        count,
      });
    }

    // HEAD was unreadable; look again next window
    if (retryMetadata) {
      this.metadataTouched = true;
      this.armWindow();
    }
  }

  /**
   * Compare a fresh snapshot against the last one.
   * @returns the events to emit, or undefined when HEAD is momentarily unreadable
   */
  private readMetadataEvents(gitDir: string): RepoEvent[] | undefined {
    const next = readSnapshot(gitDir);
    if (!next) {
      this.headRetries++;
      if (this.headRetries < MAX_HEAD_RETRIES) return undefined;
      this.log.debug({ retries: this.headRetries }, "HEAD still unreadable; treating as activity");
      this.headRetries = 0;
      return [{ type: "repo.entered", repository_id: this.opts.repositoryId, timestamp: this.stamp() }];
    }
    this.headRetries = 0;

    const prev = this.snapshot;
    this.snapshot = next;
    const base = { repository_id: this.opts.repositoryId, timestamp: this.stamp() };
    const headMoved = next.head !== null && next.head !== (prev?.head ?? null);

    if ((prev?.branch ?? null) !== next.branch) {
      const events: RepoEvent[] = [{ ...base, type: "git.checkout", from: prev?.branch ?? null, to: next.branch }];
      // `checkout -b x && commit`: only a commit reflog entry counts, not the checkout's own move
      const reflog = next.head && headMoved ? commitReflogEntry(gitDir, next.head) : null;
      if (next.head && reflog) {
        events.push({
          ...base,
          type: "git.commit",
          commit: { sha: next.head, message: reflog.message || null, timestamp: reflog.timestamp },
        });
      }
      return events;
    }

    if (next.head && headMoved) {
      const reflog = commitReflogEntry(gitDir, next.head);
      return [
        {
          ...base,
          type: "git.commit",
          commit: {
            sha: next.head,
            message: reflog?.message || null,
            timestamp: reflog ? reflog.timestamp : base.timestamp,
          },
        },
      ];
    }

    return [{ ...base, type: "repo.entered" }];
  }

  private resetWindow(): void {
    this.metadataTouched = false;
    this.indexTouched = false;
    this.rootVanished = false;
    this.changedPaths = new Set();
    this.rawCount = 0;
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  // -------------------------------------------------------------------------
  // Output
  // -------------------------------------------------------------------------

  private emit(event: RepoEvent): void {
    this.opts.onEvent(event);
  }

  private fail(message: string, code: string): void {
    if (this.failed) return;
    this.failed = true;
    const error = new WatchError(message, code, { root: this.opts.root });
    this.log.warn({ code }, message);
    this.stop().catch((err: unknown) => {
      this.log.error({ err }, "Failed to close watch handles");
    });
    this.opts.onError(error);
  }

  private stamp(): string {
    return this.now().toISOString();
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Convert an ignore pattern into a whole-segment matcher. Supports `*` and
 * `?`; anything else matches literally ("node_modules", "*.log").
 */
export function globToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split("")
    .map((ch) => {
      if (ch === "*") return "[^/]*";
      if (ch === "?") return "[^/]";
      return ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    })
    .join("");
  return new RegExp(`^${escaped}$`);
}

/** The last reflog entry, when it is the commit that produced `sha` */
function commitReflogEntry(gitDir: string, sha: string): ReflogEntry | null {
  const reflog = readLastReflogEntry(gitDir);
  return reflog !== null && reflog.newSha === sha && reflog.action.startsWith("commit") ? reflog : null;
}

function isInside(parent: string, child: string): boolean {
  const rel = path.relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

function toPosix(p: string): string {
  return p.split(path.sep).join("/");
}
