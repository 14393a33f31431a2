/**
 * Repository session tracker.
 *
 * One tracker per watched repository. It is a small state machine fed by
 * repository events and a periodic tick:
 *
 *   idle   --entered/file_changed/commit-->  active   (opens a session)
 *   active --entered/file_changed/commit-->  active   (extends it)
 *   active --checkout-->                     active   (closes as branch_changed, opens on the new branch)
 *   active --idle timeout-->                 idle     (closes as idle_timeout)
 *   idle   --checkout-->                     idle     (remembers the branch)
 *
 * Idle time is never counted: a gap between two activity events only adds
 * to `active_ms` when it is within the idle threshold, and an idle close
 * ends the session at its last activity. An activity event that arrives
 * after the threshold already elapsed (before a tick noticed) closes the
 * old session as idle_timeout and opens a fresh one.
 *
 * The tracker never persists anything. Closed sessions are handed back to
 * the caller, which finalizes them.
 */

import { generateId, type CommitRef, type RepoEvent, type Session, type SessionEndReason } from "@devpeace/shared";

export type SessionState = "idle" | "active";

export interface SessionTrackerOptions {
  repositoryId: string;
  repositoryPath: string;
  idleTimeoutMs: number;
  /** Branch at watch start, if known */
  initialBranch?: string | null;
  /** Issue key for a branch; the extractor with configured project keys */
  extractIssueKey: (branch: string | null) => string | null;
}

/** What a single input did to the tracker */
export interface TrackerUpdate {
  /** Sessions closed by this input, oldest first */
  closed: Session[];
  /** Session opened by this input */
  opened: Session | null;
  /** Set when this input recorded the session's first commit */
  firstCommit: Session | null;
}

export class SessionTracker {
  readonly repositoryId: string;
  private readonly opts: SessionTrackerOptions;
  private branch: string | null;
  private session: Session | null = null;

  constructor(opts: SessionTrackerOptions) {
    this.opts = opts;
    this.repositoryId = opts.repositoryId;
    this.branch = opts.initialBranch ?? null;
  }

  get state(): SessionState {
    return this.session ? "active" : "idle";
  }

  get currentBranch(): string | null {
    return this.branch;
  }

  /** The open session, if any */
  get current(): Session | null {
    return this.session;
  }

  /** Learn the checked-out branch without treating it as a switch. Ignored while active. */
  observeBranch(branch: string | null): void {
    if (!this.session) this.branch = branch;
  }

  /**
   * Adopt a session restored from the checkpoint. Replaces nothing if a
   * session is already open.
   */
  resume(session: Session): boolean {
    if (this.session) return false;
    this.session = { ...session, commits: [...session.commits] };
    this.branch = session.branch;
    return true;
  }

  /** Apply a repository event. `now` defaults to the event's timestamp. */
  handle(event: RepoEvent, now: Date = new Date(event.timestamp)): TrackerUpdate {
    const update: TrackerUpdate = { closed: [], opened: null, firstCommit: null };

    if (event.type === "git.checkout") {
      this.branch = event.to;
      if (this.session) {
        update.closed.push(this.closeOnBranchChange(now));
        update.opened = this.open(now);
      }
      return update;
    }

    if (this.session && this.gapMs(now) > this.opts.idleTimeoutMs) {
      update.closed.push(this.closeIdle());
    }

    if (!this.session) {
      update.opened = this.open(now);
    } else {
      this.extend(now);
    }

    if (event.type === "git.commit" && this.addCommit(event.commit)) {
      update.firstCommit = this.session?.commits.length === 1 ? this.session : null;
    }
    return update;
  }

  /**
   * Close the session if the idle threshold has elapsed since its last
   * activity.
   */
  tick(now: Date): TrackerUpdate {
    const update: TrackerUpdate = { closed: [], opened: null, firstCommit: null };
    if (this.session && this.gapMs(now) > this.opts.idleTimeoutMs) {
      update.closed.push(this.closeIdle());
    }
    return update;
  }

  /**
   * Close the open session for an external reason (shutdown, removal, watch
   * failure). Counts the trailing gap only when it is within the threshold.
   */
  close(reason: SessionEndReason, now: Date): Session | null {
    if (!this.session) return null;
    if (this.gapMs(now) > this.opts.idleTimeoutMs) return this.closeIdle();
    return this.finish(reason, now);
  }

  // -------------------------------------------------------------------------
  // Internal transitions
  // -------------------------------------------------------------------------

  private open(now: Date): Session {
    const at = now.toISOString();
    const session: Session = {
      id: generateId(now),
      repository_id: this.opts.repositoryId,
      repository_path: this.opts.repositoryPath,
      branch: this.branch,
      issue_key: this.opts.extractIssueKey(this.branch),
      started_at: at,
      last_activity_at: at,
      ended_at: null,
      active_ms: 0,
      commits: [],
      end_reason: null,
      original_status: null,
    };
    this.session = session;
    return session;
  }

  private extend(now: Date): void {
    const session = this.session;
    if (!session) return;
    const gap = this.gapMs(now);
    // Out-of-order timestamps never move the session backwards
    if (gap <= 0) return;
    session.active_ms += gap;
    session.last_activity_at = now.toISOString();
  }

  /** @returns true when the commit was new to this session */
  private addCommit(commit: CommitRef): boolean {
    const session = this.session;
    if (!session || session.commits.some((c) => c.sha === commit.sha)) return false;
    session.commits.push(commit);
    return true;
  }

  /** Branch change always reports branch_changed, excluding idle time */
  private closeOnBranchChange(now: Date): Session {
    if (this.gapMs(now) > this.opts.idleTimeoutMs) {
      const session = this.closeIdle();
      session.end_reason = "branch_changed";
      return session;
    }
    return this.finish("branch_changed", now);
  }

  private closeIdle(): Session {
    const session = this.requireSession();
    session.ended_at = session.last_activity_at;
    session.end_reason = "idle_timeout";
    this.session = null;
    return session;
  }

  private finish(reason: SessionEndReason, now: Date): Session {
    this.extend(now);
    const session = this.requireSession();
    session.ended_at = session.last_activity_at;
    session.end_reason = reason;
    this.session = null;
    return session;
  }

  private gapMs(now: Date): number {
    if (!this.session) return 0;
    return now.getTime() - Date.parse(this.session.last_activity_at);
  }

  private requireSession(): Session {
    if (!this.session) throw new Error("No open session");
    return this.session;
  }
}
