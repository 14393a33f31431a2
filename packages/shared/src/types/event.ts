/**
 * Repository events produced by the filesystem watcher and consumed by the
 * session tracker.
 *
 * There are 4 event types across 2 categories:
 *   - repo.*  — activity inside a watched repository
 *   - git.*   — HEAD moved (branch switch or new commit)
 */

import type { CommitRef } from "../schemas/common.js";

export type RepoEventType =
  | "repo.entered"
  | "repo.file_changed"
  | "git.commit"
  | "git.checkout";

export const REPO_EVENT_TYPES = [
  "repo.entered",
  "repo.file_changed",
  "git.commit",
  "git.checkout",
] as const satisfies readonly RepoEventType[];

interface RepoEventBase {
  repository_id: string;
  /** ISO-8601 time the watcher emitted the event */
  timestamp: string;
}

/** Watch started, or git metadata was touched without moving HEAD */
export interface RepoEnteredEvent extends RepoEventBase {
  type: "repo.entered";
}

/** Working-tree changes collapsed from one debounce window */
export interface FileChangedEvent extends RepoEventBase {
  type: "repo.file_changed";
  /** Distinct paths, relative to the repository root */
  paths: string[];
  /** Raw filesystem notifications in the window */
  count: number;
}

/** HEAD moved on the same branch */
export interface CommitDetectedEvent extends RepoEventBase {
  type: "git.commit";
  commit: CommitRef;
}

/** The checked-out branch changed */
export interface BranchChangedEvent extends RepoEventBase {
  type: "git.checkout";
  from: string | null;
  to: string | null;
}

export type RepoEvent =
  | RepoEnteredEvent
  | FileChangedEvent
  | CommitDetectedEvent
  | BranchChangedEvent;
