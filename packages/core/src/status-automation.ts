/**
 * Optional issue status automation.
 *
 * When enabled, moves the session's issue through the tracker workflow:
 *   - session opened:  apply the first `on_work_start` rule whose `from`
 *                      contains the current status (e.g. To Do -> In Progress)
 *   - first commit:    same with `on_first_commit`
 *   - session closed:  with `auto_revert`, move back to the status captured
 *                      when the session opened
 *
 * Never affects tracking: every failure is logged and swallowed here, so
 * the returned promises always resolve.
 */

import type { Logger } from "pino";
import type { Session } from "@devpeace/shared";
import type { DevPeaceConfig, StatusRule } from "./config.js";
import type { IssueTrackerGateway } from "./gateway/types.js";

export type StatusAutomationConfig = DevPeaceConfig["status_automation"];

export interface StatusAutomationOptions {
  config: StatusAutomationConfig;
  /** Current tracker client; null while not configured or blocked */
  gateway: () => IssueTrackerGateway | null;
  /** Runs each tracker request; the orchestrator passes the queue's slot */
  runRequest?: <T>(request: () => Promise<T>) => Promise<T>;
  logger: Logger;
}

/** First rule whose `from` list contains `status` (case-insensitive) */
export function matchRule(rules: readonly StatusRule[], status: string): StatusRule | undefined {
  const current = status.toLowerCase();
  return rules.find((rule) => rule.from.some((from) => from.toLowerCase() === current));
}

export class StatusAutomation {
  private readonly config: StatusAutomationConfig;
  private readonly gateway: () => IssueTrackerGateway | null;
  private readonly runRequest: <T>(request: () => Promise<T>) => Promise<T>;
  private readonly log: Logger;

  constructor(opts: StatusAutomationOptions) {
    this.config = opts.config;
    this.gateway = opts.gateway;
    this.runRequest = opts.runRequest ?? (<T>(request: () => Promise<T>) => request());
    this.log = opts.logger.child({ component: "status-automation" });
  }

  /** Records `original_status` on the session and applies on_work_start */
  async onSessionOpened(session: Session): Promise<void> {
    const issueKey = session.issue_key;
    const gateway = this.gateway();
    if (!this.config.enabled || !issueKey || !gateway) return;

    try {
      const issue = await this.runRequest(() => gateway.resolveIssue(issueKey));
      session.original_status = issue.status;
      await this.apply(gateway, issueKey, issue.status, this.config.on_work_start, "work start");
    } catch (err) {
      this.log.warn({ err, issueKey }, "Status automation on session start failed");
    }
  }

  async onFirstCommit(session: Session): Promise<void> {
    const issueKey = session.issue_key;
    const gateway = this.gateway();
    if (!this.config.enabled || !issueKey || !gateway || this.config.on_first_commit.length === 0) return;

    try {
      const issue = await this.runRequest(() => gateway.resolveIssue(issueKey));
      await this.apply(gateway, issueKey, issue.status, this.config.on_first_commit, "first commit");
    } catch (err) {
      this.log.warn({ err, issueKey }, "Status automation on first commit failed");
    }
  }

  async onSessionClosed(session: Session): Promise<void> {
    const issueKey = session.issue_key;
    const original = session.original_status;
    const gateway = this.gateway();
    if (!this.config.enabled || !this.config.auto_revert || !issueKey || !original || !gateway) return;

    try {
      const issue = await this.runRequest(() => gateway.resolveIssue(issueKey));
      if (issue.status.toLowerCase() === original.toLowerCase()) return;
      await this.runRequest(() => gateway.transitionIssue(issueKey, original));
      this.log.info({ issueKey, from: issue.status, to: original }, "Issue status reverted");
    } catch (err) {
      this.log.warn({ err, issueKey }, "Status automation revert failed");
    }
  }

  private async apply(
    gateway: IssueTrackerGateway,
    issueKey: string,
    status: string,
    rules: readonly StatusRule[],
    trigger: string,
  ): Promise<void> {
    const rule = matchRule(rules, status);
    if (!rule || rule.to.toLowerCase() === status.toLowerCase()) return;
    await this.runRequest(() => gateway.transitionIssue(issueKey, rule.to));
    this.log.info({ issueKey, from: status, to: rule.to, trigger }, "Issue status updated");
  }
}
