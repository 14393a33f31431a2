/**
 * Daemon orchestrator.
 *
 * Owns the repository registry (watched repository -> watcher + session
 * tracker), the single tick timer and the control surface the daemon's API
 * exposes. All state mutation happens here or in callbacks it owns, on the
 * one Node event loop.
 *
 * Tick (every `tick_interval_ms`):
 *   1. re-finalize sessions whose records could not be written earlier
 *   2. close sessions past the idle threshold
 *   3. launch due submissions
 *   4. checkpoint open sessions every `persist_interval_ms`
 *
 * Startup restores the registry, finalizes checkpointed sessions that went
 * idle while the daemon was down, resumes the rest and prunes old
 * submitted entries.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { Logger } from "pino";
import {
  NotFoundError,
  StorageError,
  ValidationError,
  extractIssueKey,
  generateId,
  normalizeIssueKey,
  type DaemonStatus,
  type IssueTransitionResponse,
  type JiraCredentials,
  type OrphanRecord,
  type RepoEvent,
  type Session,
  type SessionEndReason,
  type TrackerConfigResponse,
  type TrackerState,
  type WatchError,
  type WatchedRepository,
  type WorklogEntry,
  type WorklogStatus,
} from "@devpeace/shared";
import { isJiraConfigured, type DevPeaceConfig, type JiraConfig } from "./config.js";
import { isGitRepository } from "./git/repo-reader.js";
import { JiraGateway } from "./gateway/jira-client.js";
import type { IssueTrackerGateway, TrackerIdentity } from "./gateway/types.js";
import { SessionTracker, type TrackerUpdate } from "./session-tracker.js";
import type { StateStore } from "./state-store.js";
import { StatusAutomation } from "./status-automation.js";
import { SubmissionQueue } from "./submission-queue.js";
import { RepositoryWatcher } from "./watcher/repo-watcher.js";
import type { WatchBackend } from "./watcher/types.js";
import { WorklogAggregator } from "./worklog-aggregator.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface OrchestratorDeps {
  config: DevPeaceConfig;
  store: StateStore;
  backend: WatchBackend;
  logger: Logger;
  /** Build a tracker client from credentials; defaults to JiraGateway */
  createGateway?: (jira: JiraConfig) => IssueTrackerGateway;
  /** Persist changed configuration (new Jira credentials) */
  saveConfig?: (config: DevPeaceConfig) => void;
  now?: () => Date;
}

interface RepositoryRuntime {
  repo: WatchedRepository;
  tracker: SessionTracker;
  watcher: RepositoryWatcher | null;
}

export class Orchestrator {
  private readonly config: DevPeaceConfig;
  private readonly store: StateStore;
  private readonly backend: WatchBackend;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly createGateway: (jira: JiraConfig) => IssueTrackerGateway;
  private readonly saveConfig: (config: DevPeaceConfig) => void;

  readonly aggregator: WorklogAggregator;
  readonly queue: SubmissionQueue;
  readonly automation: StatusAutomation;

  private gateway: IssueTrackerGateway | null;
  private readonly runtimes = new Map<string, RepositoryRuntime>();
  /** Closed sessions whose records could not be written yet */
  private unfinalized: Array<{ session: Session; displayName: string }> = [];
  private readonly automationTasks = new Set<Promise<void>>();

  private timer: ReturnType<typeof setInterval> | null = null;
  private lastCheckpoint = 0;
  private initialized = false;
  private watching = false;
  private shuttingDown = false;

  constructor(deps: OrchestratorDeps) {
    this.config = deps.config;
    this.store = deps.store;
    this.backend = deps.backend;
    this.log = deps.logger.child({ component: "orchestrator" });
    this.now = deps.now ?? (() => new Date());
    this.createGateway = deps.createGateway ?? ((jira) => new JiraGateway(jira));
    this.saveConfig = deps.saveConfig ?? (() => {});

    const { tracking, submission } = this.config;

    this.aggregator = new WorklogAggregator({
      store: this.store,
      minLoggableSeconds: tracking.min_loggable_seconds,
      postCommitComments: submission.post_commit_comments,
      logger: deps.logger,
      now: this.now,
    });

    this.gateway = isJiraConfigured(this.config.jira) ? this.createGateway(this.config.jira) : null;

    this.queue = new SubmissionQueue({
      store: this.store,
      gateway: this.gateway,
      logger: deps.logger,
      maxConcurrent: submission.max_concurrent,
      maxAttempts: submission.max_attempts,
      baseDelayMs: submission.base_delay_ms,
      maxDelayMs: submission.max_delay_ms,
      shutdownGraceMs: submission.shutdown_grace_ms,
      now: this.now,
    });

    this.automation = new StatusAutomation({
      config: this.config.status_automation,
      // Nothing goes to the tracker while credentials are rejected
      gateway: () => (this.queue.authError ? null : this.gateway),
      runRequest: <T>(request: () => Promise<T>) => this.queue.withSlot(request),
      logger: deps.logger,
    });
  }

  private get idleTimeoutMs(): number {
    return this.config.tracking.idle_timeout_minutes * 60_000;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Load durable state and start the tick timer. Does not start watching.
   * @throws StorageError when the state directory is unusable
   */
  init(): void {
    if (this.initialized) return;
    this.store.open();

    for (const repo of this.store.loadRepositories()) {
      this.runtimes.set(repo.id, { repo, tracker: this.newTracker(repo), watcher: null });
    }

    this.restoreSessions();

    const cutoff = new Date(this.now().getTime() - this.config.submission.retention_days * DAY_MS);
    const pruned = this.store.pruneSubmitted(cutoff);
    if (pruned > 0) this.log.info({ pruned }, "Pruned old submitted worklog entries");

    this.lastCheckpoint = this.now().getTime();
    this.timer = setInterval(() => this.tick(), this.config.submission.tick_interval_ms);
    this.timer.unref?.();
    this.initialized = true;

    const counts = this.store.counts();
    this.log.info(
      { repositories: this.runtimes.size, pending: counts.pending, orphans: counts.orphans },
      "State restored",
    );
    this.queue.tick();
  }

  /** Start watching every registered repository, retrying failed ones */
  start(): DaemonStatus {
    this.queue.start();
    this.watching = true;
    let changed = false;

    for (const runtime of this.runtimes.values()) {
      if (!runtime.repo.enabled || runtime.repo.watch_error) {
        runtime.repo = { ...runtime.repo, enabled: true, watch_error: null };
        changed = true;
      }
      this.startWatch(runtime);
    }

    if (changed) this.persistRepositoriesQuietly();
    this.log.info({ repositories: this.runtimes.size }, "Watching started");
    return this.status();
  }

  /** Stop every watcher and close open sessions as `stopped` */
  async stop(): Promise<DaemonStatus> {
    this.watching = false;
    const now = this.now();
    const stops: Promise<void>[] = [];

    for (const runtime of this.runtimes.values()) {
      if (runtime.watcher) {
        stops.push(runtime.watcher.stop());
        runtime.watcher = null;
      }
      const closed = runtime.tracker.close("stopped", now);
      if (closed) this.handleClosed(runtime, closed);
    }

    await Promise.all(stops);
    this.checkpointQuietly();
    this.log.info("Watching stopped");
    return this.status();
  }

  /**
   * Graceful shutdown: stop watching, finalize sessions, checkpoint, then
   * give in-flight submissions the grace period.
   */
  async shutdown(): Promise<void> {
    if (this.shuttingDown) return;
    this.shuttingDown = true;

    await this.stop();
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.queue.stop();
    await Promise.allSettled([...this.automationTasks]);
    this.log.info("Orchestrator shut down");
  }

  /** One timer pass; exposed for tests */
  tick(now: Date = this.now()): void {
    this.retryUnfinalized();

    for (const runtime of this.runtimes.values()) {
      this.applyUpdate(runtime, runtime.tracker.tick(now));
    }

    this.queue.tick(now);

    if (now.getTime() - this.lastCheckpoint >= this.config.submission.persist_interval_ms) {
      this.checkpointQuietly();
    }
  }

  // -------------------------------------------------------------------------
  // Control surface
  // -------------------------------------------------------------------------

  /**
   * Register a repository. Idempotent by resolved path.
   * @throws ValidationError VALIDATION_NOT_A_REPOSITORY
   * @throws StorageError when the registry cannot be written
   */
  add(repoPath: string): WatchedRepository {
    const resolved = canonicalPath(repoPath);
    const existing = this.findByPath(resolved);
    if (existing) return existing.repo;

    if (!isDirectory(resolved) || !isGitRepository(resolved)) {
      throw new ValidationError(`${resolved} is not a git repository`, "VALIDATION_NOT_A_REPOSITORY", {
        path: resolved,
      });
    }

    const repo: WatchedRepository = {
      id: generateId(this.now()),
      path: resolved,
      display_name: path.basename(resolved),
      enabled: true,
      added_at: this.now().toISOString(),
      watch_error: null,
    };

    this.store.saveRepositories([...this.repositories(), repo]);
    const runtime: RepositoryRuntime = { repo, tracker: this.newTracker(repo), watcher: null };
    this.runtimes.set(repo.id, runtime);
    this.log.info({ path: resolved }, "Repository added");

    if (this.watching) this.startWatch(runtime);
    return repo;
  }

  /**
   * Unregister a repository, closing its session as repository_removed.
   * @throws NotFoundError NOT_FOUND_REPOSITORY
   */
  async remove(repoPath: string): Promise<WatchedRepository> {
    const runtime = this.findByPath(canonicalPath(repoPath));
    if (!runtime) {
      throw new NotFoundError(`Repository ${repoPath} is not watched`, "NOT_FOUND_REPOSITORY", {
        path: repoPath,
      });
    }

    const closed = runtime.tracker.close("repository_removed", this.now());
    if (closed) this.handleClosed(runtime, closed);

    if (runtime.watcher) {
      await runtime.watcher.stop();
      runtime.watcher = null;
    }

    this.store.saveRepositories(this.repositories().filter((r) => r.id !== runtime.repo.id));
    this.runtimes.delete(runtime.repo.id);
    this.checkpointQuietly();
    this.log.info({ path: runtime.repo.path }, "Repository removed");
    return runtime.repo;
  }

  list(): WatchedRepository[] {
    return this.repositories();
  }

  status(): DaemonStatus {
    const counts = this.store.counts();
    let openSessions = 0;
    let watching = 0;
    for (const runtime of this.runtimes.values()) {
      if (runtime.tracker.current) openSessions++;
      if (runtime.watcher?.isRunning) watching++;
    }

    return {
      running: this.watching,
      repositories: this.runtimes.size,
      watching,
      open_sessions: openSessions,
      pending: counts.pending,
      failed: counts.failed,
      needs_attention: counts.needs_attention,
      submitted: counts.submitted,
      orphans: counts.orphans,
      auth_error: this.queue.authError,
      tracker: this.trackerState(),
    };
  }

  orphans(): OrphanRecord[] {
    return this.store.listOrphans().filter((o) => o.state === "unresolved");
  }

  associateOrphan(orphanId: string, issueKey: string): WorklogEntry {
    const entry = this.aggregator.associateOrphan(orphanId, issueKey);
    this.queue.tick();
    return entry;
  }

  discardOrphan(orphanId: string): OrphanRecord {
    return this.aggregator.discardOrphan(orphanId);
  }

  worklogs(filter: { status?: WorklogStatus } = {}): WorklogEntry[] {
    return this.store.listWorklogs(filter.status);
  }

  retry(entryId?: string): WorklogEntry[] {
    const reset = this.aggregator.retry(entryId);
    this.queue.tick();
    return reset;
  }

  /**
   * Check new Jira credentials against the tracker, then store them, swap
   * the tracker client and lift any auth block. A failed check changes
   * nothing.
   * @throws GatewayError when the tracker rejects the credentials or cannot be reached
   * @throws ConfigError when the config file cannot be written
   */
  async configure(credentials: JiraCredentials): Promise<TrackerConfigResponse> {
    const jira: JiraConfig = { ...credentials };
    const gateway = this.createGateway(jira);

    let identity: TrackerIdentity;
    try {
      identity = await this.queue.withSlot(() => gateway.verifyCredentials());
    } catch (err) {
      this.log.warn({ err, url: jira.url, user: jira.user }, "New tracker credentials failed verification");
      throw err;
    }

    this.saveConfig({ ...this.config, jira });
    this.config.jira = jira;
    this.gateway = gateway;
    this.queue.setGateway(gateway);
    this.log.info({ url: jira.url, user: jira.user, account: identity.account }, "Tracker credentials updated");
    this.queue.tick();
    return { tracker: this.trackerState(), display_name: identity.display_name };
  }

  /**
   * Move an issue to the named status by hand. Nothing is sent when the
   * issue already has it.
   * @throws ValidationError VALIDATION_ISSUE_KEY, VALIDATION_TRACKER_NOT_CONFIGURED
   * @throws GatewayError not_found for unknown issues, rejected when no transition leads there
   */
  async transitionIssue(issueKey: string, status: string): Promise<IssueTransitionResponse> {
    const key = normalizeIssueKey(issueKey);
    if (!key) {
      throw new ValidationError(
        `"${issueKey}" is not a valid issue key (expected e.g. PROJ-123)`,
        "VALIDATION_ISSUE_KEY",
        { issueKey },
      );
    }
    const gateway = this.gateway;
    if (!gateway) {
      throw new ValidationError("Jira is not configured", "VALIDATION_TRACKER_NOT_CONFIGURED");
    }

    const issue = await this.queue.withSlot(() => gateway.resolveIssue(key));
    if (issue.status.toLowerCase() === status.toLowerCase()) {
      return { issue_key: key, from: issue.status, to: issue.status, changed: false };
    }

    await this.queue.withSlot(() => gateway.transitionIssue(key, status));
    this.log.info({ issueKey: key, from: issue.status, to: status }, "Issue status changed by hand");
    return { issue_key: key, from: issue.status, to: status, changed: true };
  }

  // -------------------------------------------------------------------------
  // Watch + event handling
  // -------------------------------------------------------------------------

  private newTracker(repo: WatchedRepository): SessionTracker {
    const projectKeys = this.config.tracking.project_keys;
    return new SessionTracker({
      repositoryId: repo.id,
      repositoryPath: repo.path,
      idleTimeoutMs: this.idleTimeoutMs,
      extractIssueKey: (branch) => extractIssueKey(branch, { projectKeys }),
    });
  }

  private startWatch(runtime: RepositoryRuntime): void {
    if (runtime.watcher?.isRunning) return;

    const watcher = new RepositoryWatcher({
      repositoryId: runtime.repo.id,
      root: runtime.repo.path,
      backend: this.backend,
      debounceMs: this.config.tracking.debounce_ms,
      ignorePatterns: this.config.tracking.ignore_patterns,
      logger: this.log,
      now: this.now,
      onEvent: (event) => this.handleEvent(runtime, event),
      onError: (error) => this.handleWatchError(runtime, error),
    });
    runtime.watcher = watcher;

    try {
      watcher.start();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.disableRepository(runtime, message);
    }
  }

  private handleEvent(runtime: RepositoryRuntime, event: RepoEvent): void {
    const { tracker, watcher } = runtime;

    if (event.type !== "git.checkout") {
      const branch = watcher?.currentBranch ?? null;
      const session = tracker.current;
      if (session && session.branch !== branch && event.type === "repo.entered") {
        // Branch moved while nobody was watching (restart with a resumed session)
        this.applyUpdate(runtime, tracker.handle({
          type: "git.checkout",
          repository_id: event.repository_id,
          timestamp: event.timestamp,
          from: session.branch,
          to: branch,
        }));
      } else {
        tracker.observeBranch(branch);
      }
    }

    this.applyUpdate(runtime, tracker.handle(event));
  }

  private handleWatchError(runtime: RepositoryRuntime, error: WatchError): void {
    const closed = runtime.tracker.close("watch_failed", this.now());
    if (closed) this.handleClosed(runtime, closed);
    this.disableRepository(runtime, error.message);
  }

  private disableRepository(runtime: RepositoryRuntime, reason: string): void {
    runtime.watcher = null;
    runtime.repo = { ...runtime.repo, enabled: false, watch_error: reason };
    this.log.warn({ path: runtime.repo.path, reason }, "Watch disabled for repository");
    this.persistRepositoriesQuietly();
  }

  private applyUpdate(runtime: RepositoryRuntime, update: TrackerUpdate): void {
    for (const session of update.closed) {
      this.handleClosed(runtime, session);
    }
    if (update.opened) {
      this.log.info(
        { repository: runtime.repo.path, branch: update.opened.branch, issueKey: update.opened.issue_key },
        "Session opened",
      );
      this.track(this.automation.onSessionOpened(update.opened));
    }
    if (update.firstCommit) {
      this.track(this.automation.onFirstCommit(update.firstCommit));
    }
    if (update.closed.length > 0 || update.opened) {
      this.checkpointQuietly();
    }
  }

  private handleClosed(runtime: RepositoryRuntime, session: Session): void {
    this.log.info(
      { repository: runtime.repo.path, sessionId: session.id, reason: session.end_reason, activeMs: session.active_ms },
      "Session closed",
    );
    this.finalize(session, runtime.repo.display_name);
    this.track(this.automation.onSessionClosed(session));
  }

  private finalize(session: Session, displayName: string): void {
    try {
      this.aggregator.finalize(session, { display_name: displayName });
      this.queue.tick();
    } catch (err) {
      if (!(err instanceof StorageError)) throw err;
      this.log.error({ err, sessionId: session.id }, "Could not record closed session; will retry");
      this.unfinalized.push({ session, displayName });
    }
  }

  private retryUnfinalized(): void {
    if (this.unfinalized.length === 0) return;
    const waiting = this.unfinalized;
    this.unfinalized = [];
    for (const { session, displayName } of waiting) {
      this.finalize(session, displayName);
    }
    this.checkpointQuietly();
  }

  private track(task: Promise<void>): void {
    this.automationTasks.add(task);
    task.finally(() => this.automationTasks.delete(task)).catch((err: unknown) => {
      this.log.error({ err }, "Status automation task failed");
    });
  }

  // -------------------------------------------------------------------------
  // Restore + persistence
  // -------------------------------------------------------------------------

  private restoreSessions(): void {
    const now = this.now();
    for (const session of this.store.loadOpenSessions()) {
      const runtime = this.runtimes.get(session.repository_id);
      const displayName = runtime?.repo.display_name ?? path.basename(session.repository_path);

      if (session.ended_at) {
        // Closed before the last shutdown but never recorded
        this.finalize(session, displayName);
        continue;
      }

      if (!runtime) {
        this.finalize(closeAt(session, "repository_removed"), displayName);
        continue;
      }

      const idleFor = now.getTime() - Date.parse(session.last_activity_at);
      if (idleFor > this.idleTimeoutMs || !runtime.tracker.resume(session)) {
        this.finalize(closeAt(session, "idle_timeout"), displayName);
      }
    }
    this.checkpointQuietly();
  }

  private checkpointQuietly(): void {
    const sessions: Session[] = [...this.unfinalized.map((u) => u.session)];
    for (const runtime of this.runtimes.values()) {
      if (runtime.tracker.current) sessions.push(runtime.tracker.current);
    }
    try {
      this.store.saveOpenSessions(sessions);
      this.lastCheckpoint = this.now().getTime();
    } catch (err) {
      this.log.error({ err }, "Failed to checkpoint open sessions");
    }
  }

  private persistRepositoriesQuietly(): void {
    try {
      this.store.saveRepositories(this.repositories());
    } catch (err) {
      this.log.error({ err }, "Failed to save repository registry");
    }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private repositories(): WatchedRepository[] {
    return [...this.runtimes.values()].map((r) => r.repo).sort((a, b) => a.id.localeCompare(b.id));
  }

  private findByPath(resolved: string): RepositoryRuntime | undefined {
    for (const runtime of this.runtimes.values()) {
      if (runtime.repo.path === resolved) return runtime;
    }
    return undefined;
  }

  private trackerState(): TrackerState {
    if (this.queue.authError) return "auth_error";
    return this.queue.hasGateway ? "configured" : "not_configured";
  }
}

/** Close a checkpointed session at its last activity */
function closeAt(session: Session, reason: SessionEndReason): Session {
  return { ...session, ended_at: session.last_activity_at, end_reason: reason };
}

/** Absolute path with symlinks resolved when the path exists */
function canonicalPath(p: string): string {
  const resolved = path.resolve(p);
  try {
    return fs.realpathSync(resolved);
  } catch {
    return resolved;
  }
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}
