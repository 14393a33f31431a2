/**
 * In-process stand-ins for the daemon tests: a watch backend that never
 * fires and a tracker gateway that accepts everything unless told to
 * refuse credentials.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { pino } from "pino";
import type { IssueTrackerGateway, WatchBackend, WatchHandle } from "@devpeace/core";
import { GatewayError, type IssueMetadata } from "@devpeace/shared";

export const silentLogger = pino({ level: "silent" });

export class QuietBackend implements WatchBackend {
  readonly roots: string[] = [];

  watch(root: string): WatchHandle {
    this.roots.push(root);
    return { close: async () => {} };
  }
}

export class AcceptingGateway implements IssueTrackerGateway {
  readonly calls: string[] = [];
  rejectCredentials = false;
  private counter = 0;

  async submit(entry: { issue_key: string }) {
    this.calls.push(`submit ${entry.issue_key}`);
    return { worklog_id: `wl-${++this.counter}` };
  }

  async postComment(issueKey: string) {
    this.calls.push(`postComment ${issueKey}`);
    return { comment_id: `c-${++this.counter}` };
  }

  async resolveIssue(issueKey: string): Promise<IssueMetadata> {
    this.calls.push(`resolveIssue ${issueKey}`);
    return { key: issueKey, summary: "", status: "To Do", project: "ABC", issue_type: "Task", assignee: null };
  }

  async verifyCredentials() {
    if (this.rejectCredentials) {
      throw new GatewayError("Jira rejected the credentials (HTTP 401)", "unauthorized", { status: 401 });
    }
    return { display_name: "Test User", account: "test-user" };
  }

  async transitionIssue(issueKey: string, statusName: string) {
    this.calls.push(`transitionIssue ${issueKey} ${statusName}`);
  }
}

export function makeTempDir(): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "devpeace-daemon-")));
}

/** A directory with the smallest control directory the reader accepts */
export function makeGitRepo(root: string, branch = "main"): string {
  fs.mkdirSync(path.join(root, ".git", "refs", "heads"), { recursive: true });
  fs.writeFileSync(path.join(root, ".git", "HEAD"), `ref: refs/heads/${branch}\n`);
  return root;
}
