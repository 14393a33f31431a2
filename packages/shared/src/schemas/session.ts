/**
 * Zod schema for a tracked work session.
 *
 * Open sessions are checkpointed to state/open-sessions.json so they survive
 * a restart; closed sessions are turned into worklog entries or orphans.
 */

import { z } from "zod";
import { commitRefSchema, timestampSchema, ulidSchema } from "./common.js";

export const SESSION_END_REASONS = [
  "idle_timeout",
  "branch_changed",
  "stopped",
  "repository_removed",
  "watch_failed",
] as const;

export const sessionEndReasonSchema = z.enum(SESSION_END_REASONS);

export const sessionSchema = z.object({
  id: ulidSchema,
  repository_id: ulidSchema,
  repository_path: z.string().min(1),
  /** Null while HEAD is detached or unreadable */
  branch: z.string().nullable(),
  issue_key: z.string().nullable(),
  started_at: timestampSchema,
  last_activity_at: timestampSchema,
  ended_at: timestampSchema.nullable(),
  /** Time between activity events that stayed under the idle threshold */
  active_ms: z.number().int().nonnegative(),
  commits: z.array(commitRefSchema),
  end_reason: sessionEndReasonSchema.nullable(),
  /** Issue status before status automation moved it */
  original_status: z.string().nullable(),
});

export const openSessionListSchema = z.array(sessionSchema);

export type SessionEndReason = z.infer<typeof sessionEndReasonSchema>;
export type Session = z.infer<typeof sessionSchema>;
