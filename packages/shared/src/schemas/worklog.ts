/**
 * Zod schema for a worklog entry awaiting (or past) submission to the tracker.
 *
 * One JSON file per entry under state/worklogs/. `issue_verified`,
 * `worklog_id` and `comment_id` record which tracker operations already
 * succeeded, so a retry repeats only the missing ones.
 */

import { z } from "zod";
import { issueKeySchema, timestampSchema, ulidSchema } from "./common.js";

export const WORKLOG_STATUSES = [
  "pending",
  "submitted",
  "failed",
  "needs_attention",
] as const;

export const worklogStatusSchema = z.enum(WORKLOG_STATUSES);

export const worklogEntrySchema = z.object({
  id: ulidSchema,
  session_id: ulidSchema,
  repository_id: ulidSchema,
  repository_path: z.string().min(1),
  issue_key: issueKeySchema,
  started_at: timestampSchema,
  ended_at: timestampSchema,
  duration_seconds: z.number().int().positive(),
  comment: z.string(),
  /** Extra tracker comment listing the session's commits */
  commit_comment: z.string().nullable(),
  status: worklogStatusSchema,
  issue_verified: z.boolean(),
  worklog_id: z.string().nullable(),
  comment_id: z.string().nullable(),
  attempts: z.number().int().nonnegative(),
  next_attempt_at: timestampSchema.nullable(),
  last_error: z.string().nullable(),
  created_at: timestampSchema,
  submitted_at: timestampSchema.nullable(),
});

export type WorklogStatus = z.infer<typeof worklogStatusSchema>;
export type WorklogEntry = z.infer<typeof worklogEntrySchema>;
