/**
 * Worklog aggregator: turns closed sessions into durable records.
 *
 * A closed session becomes exactly one of:
 *   - a pending WorklogEntry, when it carries an issue key
 *   - an unresolved OrphanRecord, when it does not
 *   - nothing, when it is shorter than the minimum loggable duration
 *
 * Every record is written to the state store before the call returns; a
 * StorageError from the store propagates unchanged.
 */

import type { Logger } from "pino";
import {
  NotFoundError,
  ValidationError,
  generateId,
  normalizeIssueKey,
  type CommitRef,
  type OrphanRecord,
  type Session,
  type WatchedRepository,
  type WorklogEntry,
} from "@devpeace/shared";
import type { StateStore } from "./state-store.js";

export interface WorklogAggregatorOptions {
  store: StateStore;
  minLoggableSeconds: number;
  postCommitComments: boolean;
  logger: Logger;
  now?: () => Date;
}

export type FinalizeResult =
  | { kind: "worklog"; entry: WorklogEntry }
  | { kind: "orphan"; orphan: OrphanRecord }
  | { kind: "discarded"; reason: "too_short" | "still_open" };

export class WorklogAggregator {
  private readonly store: StateStore;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly minLoggableSeconds: number;
  private readonly postCommitComments: boolean;

  constructor(opts: WorklogAggregatorOptions) {
    this.store = opts.store;
    this.minLoggableSeconds = opts.minLoggableSeconds;
    this.postCommitComments = opts.postCommitComments;
    this.log = opts.logger.child({ component: "aggregator" });
    this.now = opts.now ?? (() => new Date());
  }

  finalize(session: Session, repository: Pick<WatchedRepository, "display_name">): FinalizeResult {
    if (!session.ended_at) {
      return { kind: "discarded", reason: "still_open" };
    }

    const duration = Math.round(session.active_ms / 1000);
    if (duration <= 0 || duration < this.minLoggableSeconds) {
      this.log.debug(
        { sessionId: session.id, duration, min: this.minLoggableSeconds },
        "Session too short to log; discarded",
      );
      return { kind: "discarded", reason: "too_short" };
    }

    const comment = buildComment(session.commits, repository.display_name);
    const createdAt = this.now().toISOString();

    if (session.issue_key) {
      const entry = this.newEntry({
        session_id: session.id,
        repository_id: session.repository_id,
        repository_path: session.repository_path,
        issue_key: session.issue_key,
        started_at: session.started_at,
        ended_at: session.ended_at,
        duration_seconds: duration,
        comment,
        commits: session.commits,
        created_at: createdAt,
      });
      this.store.saveWorklog(entry);
      this.log.info(
        { entryId: entry.id, issueKey: entry.issue_key, duration },
        "Worklog entry created",
      );
      return { kind: "worklog", entry };
    }

    const orphan: OrphanRecord = {
      id: generateId(),
      session_id: session.id,
      repository_id: session.repository_id,
      repository_path: session.repository_path,
      branch: session.branch,
      started_at: session.started_at,
      ended_at: session.ended_at,
      duration_seconds: duration,
      comment,
      commits: session.commits,
      state: "unresolved",
      created_at: createdAt,
    };
    this.store.saveOrphan(orphan);
    this.log.info(
      { orphanId: orphan.id, branch: orphan.branch, duration },
      "No issue key on branch; orphan recorded",
    );
    return { kind: "orphan", orphan };
  }

  /**
   * Assign an issue key to an orphan. The pending entry is written before
   * the orphan is removed, so a failure in between leaves both rather than
   * neither. Associating such a leftover orphan again only removes it and
   * returns the entry already written for its session.
   *
   * @throws ValidationError VALIDATION_ISSUE_KEY — key is malformed
   * @throws NotFoundError NOT_FOUND_ORPHAN — no such orphan
   */
  associateOrphan(orphanId: string, issueKey: string): WorklogEntry {
    const key = normalizeIssueKey(issueKey);
    if (!key) {
      throw new ValidationError(
        `"${issueKey}" is not a valid issue key (expected e.g. PROJ-123)`,
        "VALIDATION_ISSUE_KEY",
        { issueKey },
      );
    }

    const orphan = this.requireOrphan(orphanId);
    const existing = this.store.listWorklogs().find((e) => e.session_id === orphan.session_id);
    if (existing) {
      this.store.deleteOrphan(orphan.id);
      this.log.info({ orphanId, entryId: existing.id }, "Orphan already has a worklog entry; removed");
      return existing;
    }

    const entry = this.newEntry({
      session_id: orphan.session_id,
      repository_id: orphan.repository_id,
      repository_path: orphan.repository_path,
      issue_key: key,
      started_at: orphan.started_at,
      ended_at: orphan.ended_at,
      duration_seconds: orphan.duration_seconds,
      comment: orphan.comment,
      commits: orphan.commits,
      created_at: this.now().toISOString(),
    });

    this.store.saveWorklog(entry);
    this.store.deleteOrphan(orphan.id);
    this.log.info({ orphanId, entryId: entry.id, issueKey: key }, "Orphan associated");
    return entry;
  }

  /** Drop an orphan the user does not want logged */
  discardOrphan(orphanId: string): OrphanRecord {
    const orphan = this.requireOrphan(orphanId);
    this.store.deleteOrphan(orphan.id);
    this.log.info({ orphanId }, "Orphan discarded");
    return orphan;
  }

  /**
   * Reset failed / needs_attention entries to pending with a fresh attempt
   * budget. Without an id, every such entry is reset.
   *
   * @throws NotFoundError NOT_FOUND_WORKLOG — unknown id
   * @throws ValidationError VALIDATION_ALREADY_SUBMITTED — entry is immutable
   */
  retry(entryId?: string): WorklogEntry[] {
    let targets: WorklogEntry[];
    if (entryId) {
      const entry = this.store.getWorklog(entryId);
      if (!entry) {
        throw new NotFoundError(`Worklog entry ${entryId} not found`, "NOT_FOUND_WORKLOG", { entryId });
      }
      if (entry.status === "submitted") {
        throw new ValidationError(
          `Worklog entry ${entryId} was already submitted`,
          "VALIDATION_ALREADY_SUBMITTED",
          { entryId },
        );
      }
      targets = [entry];
    } else {
      targets = this.store
        .listWorklogs()
        .filter((e) => e.status === "failed" || e.status === "needs_attention");
    }

    const reset: WorklogEntry[] = [];
    for (const entry of targets) {
      const next: WorklogEntry = {
        ...entry,
        status: "pending",
        attempts: 0,
        next_attempt_at: null,
        last_error: null,
      };
      this.store.saveWorklog(next);
      reset.push(next);
    }
    if (reset.length > 0) {
      this.log.info({ count: reset.length }, "Worklog entries queued for retry");
    }
    return reset;
  }

  // -------------------------------------------------------------------------
  // Internal helpers
  // -------------------------------------------------------------------------

  private requireOrphan(orphanId: string): OrphanRecord {
    const orphan = this.store.getOrphan(orphanId);
    if (!orphan) {
      throw new NotFoundError(`Orphan ${orphanId} not found`, "NOT_FOUND_ORPHAN", { orphanId });
    }
    return orphan;
  }

  private newEntry(fields: {
    session_id: string;
    repository_id: string;
    repository_path: string;
    issue_key: string;
    started_at: string;
    ended_at: string;
    duration_seconds: number;
    comment: string;
    commits: CommitRef[];
    created_at: string;
  }): WorklogEntry {
    const { commits, ...rest } = fields;
    return {
      id: generateId(),
      ...rest,
      commit_comment: this.postCommitComments ? buildCommitComment(commits) : null,
      status: "pending",
      issue_verified: false,
      worklog_id: null,
      comment_id: null,
      attempts: 0,
      next_attempt_at: null,
      last_error: null,
      submitted_at: null,
    };
  }
}

// ---------------------------------------------------------------------------
// Comment text
// ---------------------------------------------------------------------------

function chronological(commits: readonly CommitRef[]): CommitRef[] {
  return [...commits].sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
}

/**
 * Worklog comment: commit messages oldest first, one per line, or a
 * generic line naming the repository when there were none.
 */
export function buildComment(commits: readonly CommitRef[], displayName: string): string {
  const messages = chronological(commits)
    .map((c) => c.message?.trim())
    .filter((m): m is string => Boolean(m));
  return messages.length > 0 ? messages.join("\n") : `Worked on ${displayName}`;
}

/** Issue comment listing `<short sha> <message>`, or null without commits */
export function buildCommitComment(commits: readonly CommitRef[]): string | null {
  if (commits.length === 0) return null;
  const lines = chronological(commits).map((c) =>
    `${c.sha.slice(0, 7)} ${c.message?.trim() ?? ""}`.trimEnd(),
  );
  return `Commits:\n${lines.join("\n")}`;
}
