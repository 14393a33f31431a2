/**
 * Request body schemas for the control API.
 *
 * Shared so the CLI and the daemon agree on the wire shape.
 */

import { z } from "zod";
import { worklogStatusSchema } from "./worklog.js";

/** POST/DELETE /api/repositories */
export const repositoryPathBodySchema = z.object({
  path: z.string().min(1, "path is required"),
});

/** POST /api/orphans/:id/associate */
export const associateOrphanBodySchema = z.object({
  /** Normalized (trimmed, uppercased) before validation by the aggregator */
  issue_key: z.string().min(1, "issue_key is required"),
});

/** GET /api/worklogs?status= */
export const worklogQuerySchema = z.object({
  status: worklogStatusSchema.optional(),
});

/** POST /api/worklogs/retry */
export const retryBodySchema = z.object({
  id: z.string().min(1).optional(),
});

/** POST /api/issues/:key/transition */
export const issueTransitionBodySchema = z.object({
  status: z.string().trim().min(1, "status is required"),
});

/** PUT /api/config/jira */
export const jiraCredentialsBodySchema = z.object({
  url: z.string().url(),
  user: z.string().min(1),
  token: z.string().min(1),
});

export type RepositoryPathBody = z.infer<typeof repositoryPathBodySchema>;
export type AssociateOrphanBody = z.infer<typeof associateOrphanBodySchema>;
export type WorklogQuery = z.infer<typeof worklogQuerySchema>;
export type RetryBody = z.infer<typeof retryBodySchema>;
export type IssueTransitionBody = z.infer<typeof issueTransitionBodySchema>;
export type JiraCredentials = z.infer<typeof jiraCredentialsBodySchema>;
