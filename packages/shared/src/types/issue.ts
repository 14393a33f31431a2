/** Tracker issue details used for verification and status automation */
export interface IssueMetadata {
  key: string;
  summary: string;
  status: string;
  project: string;
  issue_type: string;
  assignee: string | null;
}
