/**
 * Submission queue: pushes pending worklog entries to the issue tracker.
 *
 * There are no per-entry timers. Retry state lives on each entry
 * (`attempts`, `next_attempt_at`) and the orchestrator's timer calls
 * `tick(now)`, which launches whatever is due, up to `maxConcurrent`
 * requests at a time.
 *
 * Per entry, three tracker operations run in order and each one's marker
 * is persisted as soon as it succeeds, so a retry only repeats what is
 * missing. A marker whose write failed is held in memory until a later
 * write lands, so the tracker never sees the same operation twice:
 *   1. resolveIssue  -> issue_verified
 *   2. submit        -> worklog_id
 *   3. postComment   -> comment_id   (only when the entry has a commit comment)
 *
 * Failure policy by GatewayError kind:
 *   unauthorized          -> global auth block; entry untouched; nothing sent until cleared
 *   not_found / rejected  -> needs_attention
 *   transient / rate_limited -> attempts + 1, then backoff or `failed` at maxAttempts
 *
 * Entries for the same issue go out in the order their sessions closed:
 * only the earliest-closed pending entry of an issue is eligible.
 *
 * `maxConcurrent` bounds every outbound tracker request: other callers
 * (status automation, manual transitions) borrow a slot with `withSlot`.
 */

import type { Logger } from "pino";
import { GatewayError, type WorklogEntry } from "@devpeace/shared";
import type { IssueTrackerGateway } from "./gateway/types.js";
import type { StateStore } from "./state-store.js";

export interface SubmissionQueueOptions {
  store: StateStore;
  /** Null while the tracker is not configured */
  gateway: IssueTrackerGateway | null;
  logger: Logger;
  maxConcurrent: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** How long stop() lets in-flight work finish before aborting it */
  shutdownGraceMs: number;
  now?: () => Date;
}

/** Capped exponential backoff for the given (already incremented) attempt count */
export function backoffDelay(attempts: number, baseDelayMs: number, maxDelayMs: number): number {
  const exp = baseDelayMs * 2 ** Math.max(0, attempts - 1);
  return Math.min(exp, maxDelayMs);
}

export class SubmissionQueue {
  private readonly store: StateStore;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly opts: SubmissionQueueOptions;
  private gateway: IssueTrackerGateway | null;

  /** Entry id -> abort controller for its in-flight run */
  private readonly inFlight = new Map<string, AbortController>();
  /** Entry id -> markers acknowledged by the tracker but not yet stored */
  private readonly acked = new Map<string, AckedMarkers>();
  /** Entry id -> earliest relaunch (ms), kept even when the failure record could not be written */
  private readonly notBefore = new Map<string, number>();
  /** Slots held by withSlot callers */
  private borrowed = 0;
  private slotWaiters: Array<() => void> = [];
  private stopped = false;
  private blockedReason: string | null = null;
  private idleResolvers: Array<() => void> = [];

  constructor(opts: SubmissionQueueOptions) {
    this.opts = opts;
    this.store = opts.store;
    this.gateway = opts.gateway;
    this.log = opts.logger.child({ component: "submission" });
    this.now = opts.now ?? (() => new Date());
  }

  /** Message of the unauthorized error blocking submissions, if any */
  get authError(): string | null {
    return this.blockedReason;
  }

  get activeCount(): number {
    return this.inFlight.size;
  }

  private get usedSlots(): number {
    return this.inFlight.size + this.borrowed;
  }

  get hasGateway(): boolean {
    return this.gateway !== null;
  }

  /**
   * Swap the tracker client (new credentials) and lift the auth block.
   */
  setGateway(gateway: IssueTrackerGateway | null): void {
    this.gateway = gateway;
    if (this.blockedReason) {
      this.log.info("Tracker reconfigured; lifting auth block");
    }
    this.blockedReason = null;
  }

  /** Allow launches again after stop() */
  start(): void {
    this.stopped = false;
  }

  /**
   * Launch every due, eligible entry up to the concurrency limit.
   * @returns number of entries launched
   */
  tick(now: Date = this.now()): number {
    const gateway = this.gateway;
    if (this.stopped || this.blockedReason || !gateway) return 0;

    let launched = 0;
    for (const entry of this.eligible(now)) {
      if (this.usedSlots >= this.opts.maxConcurrent) break;
      this.launch(gateway, entry);
      launched++;
    }
    return launched;
  }

  /**
   * Stop launching and wait for in-flight work. Anything still running
   * after the grace period is aborted and stays pending for the next start.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.inFlight.size === 0) return;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const grace = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), this.opts.shutdownGraceMs);
    });

    const outcome = await Promise.race([this.whenIdle().then(() => "idle" as const), grace]);
    clearTimeout(timer);

    if (outcome === "timeout") {
      this.log.warn({ inFlight: this.inFlight.size }, "Shutdown grace elapsed; aborting submissions");
      for (const controller of this.inFlight.values()) controller.abort();
      await this.whenIdle();
    }
  }

  /**
   * Run a tracker request outside the queue under the same concurrency
   * limit. Waits for a free slot; waiting callers go before new entries.
   */
  async withSlot<T>(task: () => Promise<T>): Promise<T> {
    await this.acquireSlot();
    try {
      return await task();
    } finally {
      this.borrowed--;
      this.slotFreed();
    }
  }

  private acquireSlot(): Promise<void> {
    if (this.usedSlots < this.opts.maxConcurrent) {
      this.borrowed++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.slotWaiters.push(() => {
        this.borrowed++;
        resolve();
      });
    });
  }

  private slotFreed(): void {
    const waiter = this.slotWaiters.shift();
    if (waiter) {
      waiter();
      return;
    }
    // The next entry of the same issue may now be due
    if (!this.stopped) this.tick();
  }

  /** Resolves once nothing is in flight */
  whenIdle(): Promise<void> {
    if (this.inFlight.size === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleResolvers.push(resolve);
    });
  }

  // -------------------------------------------------------------------------
  // Selection
  // -------------------------------------------------------------------------

  /** Due entries that head their issue's queue, oldest close first */
  private eligible(now: Date): WorklogEntry[] {
    const heads = new Map<string, WorklogEntry>();
    for (const entry of this.store.listWorklogs("pending")) {
      const head = heads.get(entry.issue_key);
      if (!head || closedBefore(entry, head)) heads.set(entry.issue_key, entry);
    }

    return [...heads.values()]
      .filter((e) => !this.inFlight.has(e.id))
      .filter((e) => !e.next_attempt_at || Date.parse(e.next_attempt_at) <= now.getTime())
      .filter((e) => (this.notBefore.get(e.id) ?? 0) <= now.getTime())
      .sort((a, b) => (closedBefore(a, b) ? -1 : 1));
  }

  // -------------------------------------------------------------------------
  // Execution
  // -------------------------------------------------------------------------

  private launch(gateway: IssueTrackerGateway, entry: WorklogEntry): void {
    const controller = new AbortController();
    this.inFlight.set(entry.id, controller);

    this.process(gateway, entry, controller.signal)
      .catch((err: unknown) => {
        this.handleFailure(entry.id, err, controller.signal.aborted);
      })
      .finally(() => {
        this.inFlight.delete(entry.id);
        if (this.inFlight.size === 0) {
          const resolvers = this.idleResolvers;
          this.idleResolvers = [];
          for (const resolve of resolvers) resolve();
        }
        this.slotFreed();
      });
  }

  private async process(gateway: IssueTrackerGateway, entry: WorklogEntry, signal: AbortSignal): Promise<void> {
    const log = this.log.child({ entryId: entry.id, issueKey: entry.issue_key });
    let current = this.withAcked(entry);

    if (!current.issue_verified) {
      await gateway.resolveIssue(current.issue_key, signal);
      current = this.acknowledge(current, { issue_verified: true });
    }

    if (!current.worklog_id) {
      const ack = await gateway.submit(current, signal);
      current = this.acknowledge(current, { worklog_id: ack.worklog_id });
      log.info({ worklogId: ack.worklog_id, seconds: current.duration_seconds }, "Worklog submitted");
    }

    if (current.commit_comment && !current.comment_id) {
      const ack = await gateway.postComment(current.issue_key, current.commit_comment, signal);
      current = this.acknowledge(current, { comment_id: ack.comment_id });
    }

    this.store.saveWorklog({
      ...current,
      status: "submitted",
      next_attempt_at: null,
      last_error: null,
      submitted_at: this.now().toISOString(),
    });
    this.acked.delete(entry.id);
    this.notBefore.delete(entry.id);
  }

  private handleFailure(entryId: string, err: unknown, aborted: boolean): void {
    const stored = this.store.getWorklog(entryId);
    if (!stored) return;
    const entry = this.withAcked(stored);

    const message = err instanceof Error ? err.message : String(err);
    const log = this.log.child({ entryId, issueKey: entry.issue_key });

    if (aborted) {
      log.info("Submission aborted; entry stays pending");
      return;
    }

    if (err instanceof GatewayError && err.kind === "unauthorized") {
      this.blockedReason = message;
      log.error({ status: err.status }, "Tracker rejected credentials; submissions blocked until reconfigured");
      this.persistQuietly({ ...entry, last_error: message });
      return;
    }

    if (err instanceof GatewayError && (err.kind === "not_found" || err.kind === "rejected")) {
      log.warn({ kind: err.kind, status: err.status }, "Submission needs attention");
      this.persistQuietly(
        { ...entry, status: "needs_attention", last_error: message, next_attempt_at: null },
        this.now().getTime() + this.opts.baseDelayMs,
      );
      return;
    }

    // transient, rate_limited, or a local failure such as a store write
    const attempts = entry.attempts + 1;
    if (attempts >= this.opts.maxAttempts) {
      log.error({ attempts, err: message }, "Submission failed permanently");
      this.persistQuietly(
        { ...entry, status: "failed", attempts, last_error: message, next_attempt_at: null },
        this.now().getTime() + this.opts.baseDelayMs,
      );
      return;
    }

    const hint = err instanceof GatewayError ? err.retryAfterMs : undefined;
    const delay = hint ?? backoffDelay(attempts, this.opts.baseDelayMs, this.opts.maxDelayMs);
    const nextAtMs = this.now().getTime() + delay;
    const nextAt = new Date(nextAtMs).toISOString();
    log.warn({ attempts, delayMs: delay, err: message }, "Submission failed; will retry");
    this.persistQuietly({ ...entry, attempts, last_error: message, next_attempt_at: nextAt }, nextAtMs);
  }

  /** Record a tracker acknowledgement in memory, then on disk */
  private acknowledge(entry: WorklogEntry, markers: AckedMarkers): WorklogEntry {
    this.acked.set(entry.id, { ...this.acked.get(entry.id), ...markers });
    const next = { ...entry, ...markers };
    this.store.saveWorklog(next);
    return next;
  }

  private withAcked(entry: WorklogEntry): WorklogEntry {
    const markers = this.acked.get(entry.id);
    return markers ? { ...entry, ...markers } : entry;
  }

  /**
   * Recording a failure must not throw out of the promise chain. When the
   * write fails, `holdUntil` keeps the entry from relaunching at once.
   */
  private persistQuietly(entry: WorklogEntry, holdUntil?: number): void {
    try {
      this.store.saveWorklog(entry);
      this.acked.delete(entry.id);
    } catch (err) {
      this.log.error({ err, entryId: entry.id }, "Failed to record submission outcome");
      if (holdUntil !== undefined) this.notBefore.set(entry.id, holdUntil);
    }
  }
}

type AckedMarkers = Partial<Pick<WorklogEntry, "issue_verified" | "worklog_id" | "comment_id">>;

function closedBefore(a: WorklogEntry, b: WorklogEntry): boolean {
  const diff = Date.parse(a.ended_at) - Date.parse(b.ended_at);
  return diff !== 0 ? diff < 0 : a.id < b.id;
}
