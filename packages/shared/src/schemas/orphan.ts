/**
 * Zod schema for an orphan: a loggable session whose branch carried no
 * issue key. Waits under state/orphans/ until the user associates or
 * discards it.
 */

import { z } from "zod";
import { commitRefSchema, timestampSchema, ulidSchema } from "./common.js";

export const orphanStateSchema = z.enum(["unresolved", "resolved"]);

export const orphanRecordSchema = z.object({
  id: ulidSchema,
  session_id: ulidSchema,
  repository_id: ulidSchema,
  repository_path: z.string().min(1),
  branch: z.string().nullable(),
  started_at: timestampSchema,
  ended_at: timestampSchema,
  duration_seconds: z.number().int().positive(),
  comment: z.string(),
  commits: z.array(commitRefSchema),
  state: orphanStateSchema,
  created_at: timestampSchema,
});

export type OrphanState = z.infer<typeof orphanStateSchema>;
export type OrphanRecord = z.infer<typeof orphanRecordSchema>;
