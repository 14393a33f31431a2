/**
 * Issue tracker gateway contract.
 *
 * The submission queue and status automation depend only on this interface;
 * JiraGateway is the production implementation and tests provide fakes.
 * Every method rejects with a GatewayError whose `kind` drives retry policy.
 */

import type { IssueMetadata, WorklogEntry } from "@devpeace/shared";

export interface WorklogAck {
  worklog_id: string;
}

export interface CommentAck {
  comment_id: string;
}

/** Who the configured credentials belong to */
export interface TrackerIdentity {
  display_name: string;
  account: string;
}

export interface IssueTrackerGateway {
  /** Add the entry's time to its issue */
  submit(entry: WorklogEntry, signal?: AbortSignal): Promise<WorklogAck>;
  postComment(issueKey: string, text: string, signal?: AbortSignal): Promise<CommentAck>;
  /** Look up an issue; rejects with kind "not_found" for unknown keys */
  resolveIssue(issueKey: string, signal?: AbortSignal): Promise<IssueMetadata>;
  verifyCredentials(signal?: AbortSignal): Promise<TrackerIdentity>;
  /** Move an issue to the named status via an available transition */
  transitionIssue(issueKey: string, statusName: string, signal?: AbortSignal): Promise<void>;
}
