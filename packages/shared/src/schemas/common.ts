/**
 * Field schemas shared by every persisted record.
 */

import { z } from "zod";

/** ULID format: 26 uppercase Crockford Base32 characters */
export const ulidSchema = z
  .string()
  .regex(/^[0-9A-HJKMNP-TV-Z]{26}$/, "id must be a valid ULID");

/** ISO-8601 UTC timestamp, as produced by Date#toISOString */
export const timestampSchema = z.string().datetime();

/** Uppercased Jira issue key, e.g. PROJ-123 */
export const issueKeySchema = z
  .string()
  .regex(/^[A-Z][A-Z0-9_]+-\d+$/, "issue key must look like PROJ-123");

/** A commit observed during a session */
export const commitRefSchema = z.object({
  sha: z.string().min(1),
  /** Reflog subject; null when the commit was seen without one */
  message: z.string().nullable(),
  timestamp: timestampSchema,
});

export type CommitRef = z.infer<typeof commitRefSchema>;
