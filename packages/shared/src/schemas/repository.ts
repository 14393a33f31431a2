/**
 * Zod schema for a watched repository registry entry.
 *
 * Persisted as an array in state/repositories.json.
 */

import { z } from "zod";
import { timestampSchema, ulidSchema } from "./common.js";

export const watchedRepositorySchema = z.object({
  id: ulidSchema,
  /** Resolved absolute path; unique across the registry */
  path: z.string().min(1),
  /** Directory basename unless the user chose otherwise */
  display_name: z.string().min(1),
  /** False after a watch failure or an explicit stop */
  enabled: z.boolean(),
  added_at: timestampSchema,
  /** Why the watch was disabled, if it failed */
  watch_error: z.string().nullable(),
});

export const repositoryListSchema = z.array(watchedRepositorySchema);

export type WatchedRepository = z.infer<typeof watchedRepositorySchema>;
