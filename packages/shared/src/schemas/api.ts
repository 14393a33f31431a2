/**
 * Response bodies of the control API.
 *
 * The daemon's routes build these; the CLI parses what it receives with
 * the same schemas.
 */

import { z } from "zod";
import { orphanRecordSchema } from "./orphan.js";
import { watchedRepositorySchema } from "./repository.js";
import { worklogEntrySchema } from "./worklog.js";

/** Tracker connectivity as far as the daemon knows */
export const trackerStateSchema = z.enum(["configured", "not_configured", "auth_error"]);

export const daemonStatusSchema = z.object({
  /** Watchers started */
  running: z.boolean(),
  /** Registered repositories */
  repositories: z.number().int(),
  /** Repositories with a live watch */
  watching: z.number().int(),
  open_sessions: z.number().int(),
  pending: z.number().int(),
  failed: z.number().int(),
  needs_attention: z.number().int(),
  submitted: z.number().int(),
  /** Unresolved orphans */
  orphans: z.number().int(),
  /** Last unauthorized error message while submissions are blocked */
  auth_error: z.string().nullable(),
  tracker: trackerStateSchema,
});

export const healthResponseSchema = z.object({
  status: z.literal("ok"),
  running: z.boolean(),
  uptime_seconds: z.number(),
  version: z.string(),
});

export const repositoryListResponseSchema = z.object({ repositories: z.array(watchedRepositorySchema) });
export const repositoryResponseSchema = z.object({ repository: watchedRepositorySchema });
export const orphanListResponseSchema = z.object({ orphans: z.array(orphanRecordSchema) });
export const orphanResponseSchema = z.object({ orphan: orphanRecordSchema });
export const worklogListResponseSchema = z.object({ worklogs: z.array(worklogEntrySchema) });
export const worklogResponseSchema = z.object({ entry: worklogEntrySchema });
export const retryResponseSchema = z.object({ retried: z.array(worklogEntrySchema) });
export const trackerConfigResponseSchema = z.object({
  tracker: trackerStateSchema,
  /** Tracker account the credentials belong to */
  display_name: z.string(),
});

export const issueTransitionResponseSchema = z.object({
  issue_key: z.string(),
  from: z.string(),
  to: z.string(),
  /** False when the issue already had the requested status */
  changed: z.boolean(),
});

/** Body of every non-2xx response */
export const errorResponseSchema = z.object({
  error: z.string(),
  code: z.string().optional(),
  details: z.unknown().optional(),
});

export type TrackerState = z.infer<typeof trackerStateSchema>;
export type DaemonStatus = z.infer<typeof daemonStatusSchema>;
export type HealthResponse = z.infer<typeof healthResponseSchema>;
export type RepositoryListResponse = z.infer<typeof repositoryListResponseSchema>;
export type RepositoryResponse = z.infer<typeof repositoryResponseSchema>;
export type OrphanListResponse = z.infer<typeof orphanListResponseSchema>;
export type OrphanResponse = z.infer<typeof orphanResponseSchema>;
export type WorklogListResponse = z.infer<typeof worklogListResponseSchema>;
export type WorklogResponse = z.infer<typeof worklogResponseSchema>;
export type RetryResponse = z.infer<typeof retryResponseSchema>;
export type TrackerConfigResponse = z.infer<typeof trackerConfigResponseSchema>;
export type IssueTransitionResponse = z.infer<typeof issueTransitionResponseSchema>;
export type ErrorResponse = z.infer<typeof errorResponseSchema>;
