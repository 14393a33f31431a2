/**
 * Record identifiers.
 *
 * Every persisted record (repository, session, worklog entry, orphan) gets a
 * ULID. ULIDs sort lexicographically by creation time, so record files in the
 * state directory list in chronological order without an index.
 */

import { ulid } from "ulidx";

/**
 * Generate a new record id. Pass `at` to pin the embedded timestamp
 * (used when restoring records whose creation time is known).
 */
export function generateId(at?: Date): string {
  return at ? ulid(at.getTime()) : ulid();
}
