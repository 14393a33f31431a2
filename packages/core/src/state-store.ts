/**
 * Durable state store for the daemon.
 *
 * Everything the daemon must not lose across a restart lives here as JSON:
 *
 *   state/
 *     repositories.json   — watched repository registry
 *     open-sessions.json  — checkpoint of sessions still open
 *     worklogs/<id>.json  — one file per worklog entry
 *     orphans/<id>.json   — one file per orphan awaiting an issue key
 *     dead-letter/        — record files that could not be read back
 *
 * Key design decisions:
 *   - Atomic writes: write to a .tmp file then rename, so a crash never
 *     leaves a half-written record.
 *   - ULID filenames: records list in creation order without an index.
 *   - Write-through cache: worklogs and orphans are loaded once and the
 *     in-memory copy is only updated after the file write succeeded. A
 *     failed write throws StorageError and leaves the cache untouched.
 *   - Files that fail to parse or validate are moved to dead-letter/ rather
 *     than blocking startup.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as crypto from "node:crypto";
import type { Logger } from "pino";
import type { z } from "zod";
import {
  StorageError,
  openSessionListSchema,
  orphanRecordSchema,
  repositoryListSchema,
  worklogEntrySchema,
  type OrphanRecord,
  type Session,
  type WatchedRepository,
  type WorklogEntry,
  type WorklogStatus,
} from "@devpeace/shared";

export interface StateStoreOptions {
  /** The state/ directory */
  dir: string;
  logger: Logger;
}

/** Record counts by category, for status reporting */
export interface StoreCounts {
  pending: number;
  failed: number;
  needs_attention: number;
  submitted: number;
  orphans: number;
}

export class StateStore {
  readonly dir: string;
  private readonly log: Logger;
  private readonly worklogs = new Map<string, WorklogEntry>();
  private readonly orphans = new Map<string, OrphanRecord>();
  private loaded = false;

  constructor(opts: StateStoreOptions) {
    this.dir = opts.dir;
    this.log = opts.logger.child({ component: "state-store" });
  }

  private get worklogDir(): string {
    return path.join(this.dir, "worklogs");
  }

  private get orphanDir(): string {
    return path.join(this.dir, "orphans");
  }

  private get deadLetterDir(): string {
    return path.join(this.dir, "dead-letter");
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Create the directory layout and load worklogs and orphans into memory.
   * Safe to call more than once; later calls are no-ops.
   */
  open(): void {
    if (this.loaded) return;

    try {
      fs.mkdirSync(this.worklogDir, { recursive: true });
      fs.mkdirSync(this.orphanDir, { recursive: true });
    } catch (err) {
      throw new StorageError(`Cannot create state directory ${this.dir}`, "STORAGE_INIT_FAILED", {
        dir: this.dir,
        error: errorMessage(err),
      });
    }

    for (const entry of this.readRecordDir(this.worklogDir, worklogEntrySchema)) {
      this.worklogs.set(entry.id, entry);
    }
    for (const orphan of this.readRecordDir(this.orphanDir, orphanRecordSchema)) {
      this.orphans.set(orphan.id, orphan);
    }

    this.loaded = true;
    this.log.debug(
      { worklogs: this.worklogs.size, orphans: this.orphans.size },
      "State loaded",
    );
  }

  // -------------------------------------------------------------------------
  // Repository registry
  // -------------------------------------------------------------------------

  loadRepositories(): WatchedRepository[] {
    return this.readListFile("repositories.json", repositoryListSchema);
  }

  saveRepositories(repositories: readonly WatchedRepository[]): void {
    this.writeJsonAtomic(path.join(this.dir, "repositories.json"), repositories);
  }

  // -------------------------------------------------------------------------
  // Open session checkpoint
  // -------------------------------------------------------------------------

  loadOpenSessions(): Session[] {
    return this.readListFile("open-sessions.json", openSessionListSchema);
  }

  saveOpenSessions(sessions: readonly Session[]): void {
    this.writeJsonAtomic(path.join(this.dir, "open-sessions.json"), sessions);
  }

  // -------------------------------------------------------------------------
  // Worklog entries
  // -------------------------------------------------------------------------

  saveWorklog(entry: WorklogEntry): void {
    this.writeJsonAtomic(path.join(this.worklogDir, `${entry.id}.json`), entry);
    this.worklogs.set(entry.id, entry);
  }

  getWorklog(id: string): WorklogEntry | undefined {
    return this.worklogs.get(id);
  }

  /** Entries in creation (ULID) order, optionally filtered by status */
  listWorklogs(status?: WorklogStatus): WorklogEntry[] {
    const all = [...this.worklogs.values()].sort((a, b) => a.id.localeCompare(b.id));
    return status ? all.filter((e) => e.status === status) : all;
  }

  deleteWorklog(id: string): void {
    this.removeFile(path.join(this.worklogDir, `${id}.json`));
    this.worklogs.delete(id);
  }

  /**
   * Delete submitted entries whose submission is older than `cutoff`.
   * @returns number of entries removed
   */
  pruneSubmitted(cutoff: Date): number {
    let removed = 0;
    for (const entry of this.listWorklogs("submitted")) {
      const at = entry.submitted_at ?? entry.created_at;
      if (Date.parse(at) < cutoff.getTime()) {
        this.deleteWorklog(entry.id);
        removed++;
      }
    }
    return removed;
  }

  // -------------------------------------------------------------------------
  // Orphans
  // -------------------------------------------------------------------------

  saveOrphan(orphan: OrphanRecord): void {
    this.writeJsonAtomic(path.join(this.orphanDir, `${orphan.id}.json`), orphan);
    this.orphans.set(orphan.id, orphan);
  }

  getOrphan(id: string): OrphanRecord | undefined {
    return this.orphans.get(id);
  }

  listOrphans(): OrphanRecord[] {
    return [...this.orphans.values()].sort((a, b) => a.id.localeCompare(b.id));
  }

  deleteOrphan(id: string): void {
    this.removeFile(path.join(this.orphanDir, `${id}.json`));
    this.orphans.delete(id);
  }

  // -------------------------------------------------------------------------
  // Status
  // -------------------------------------------------------------------------

  counts(): StoreCounts {
    const counts: StoreCounts = {
      pending: 0,
      failed: 0,
      needs_attention: 0,
      submitted: 0,
      orphans: 0,
    };
    for (const entry of this.worklogs.values()) {
      counts[entry.status]++;
    }
    for (const orphan of this.orphans.values()) {
      if (orphan.state === "unresolved") counts.orphans++;
    }
    return counts;
  }

  // -------------------------------------------------------------------------
  // Internal helpers
  // -------------------------------------------------------------------------

  /**
   * Atomic write: temp file in the same directory, then rename.
   * @throws StorageError when any step fails; the target is left as it was
   */
  private writeJsonAtomic(filePath: string, data: unknown): void {
    const dir = path.dirname(filePath);
    const tmpPath = path.join(
      dir,
      `.${path.basename(filePath)}.tmp.${crypto.randomBytes(4).toString("hex")}`,
    );

    try {
      fs.mkdirSync(dir, { recursive: true });
      fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2), "utf-8");
      fs.renameSync(tmpPath, filePath);
    } catch (err) {
      try {
        fs.unlinkSync(tmpPath);
      } catch {
        // Temp file may never have been created
      }
      throw new StorageError(`Failed to write ${filePath}`, "STORAGE_WRITE_FAILED", {
        path: filePath,
        error: errorMessage(err),
      });
    }
  }

  private removeFile(filePath: string): void {
    try {
      fs.unlinkSync(filePath);
    } catch (err) {
      if (isNotFound(err)) return;
      throw new StorageError(`Failed to delete ${filePath}`, "STORAGE_DELETE_FAILED", {
        path: filePath,
        error: errorMessage(err),
      });
    }
  }

  /** Read a top-level JSON array file; a missing file is an empty list */
  private readListFile<T>(name: string, schema: z.ZodType<T[], z.ZodTypeDef, unknown>): T[] {
    const filePath = path.join(this.dir, name);
    let raw: string;
    try {
      raw = fs.readFileSync(filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new StorageError(`Failed to read ${filePath}`, "STORAGE_READ_FAILED", {
        path: filePath,
        error: errorMessage(err),
      });
    }

    const result = parseJson(raw, schema);
    if (result === undefined) {
      this.moveToDeadLetter(filePath);
      return [];
    }
    return result;
  }

  /** Read every <id>.json record in a directory, dead-lettering bad ones */
  private readRecordDir<T>(dir: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
    const records: T[] = [];
    const files = fs
      .readdirSync(dir)
      .filter((f) => f.endsWith(".json") && !f.startsWith("."))
      .sort();

    for (const file of files) {
      const filePath = path.join(dir, file);
      let raw: string;
      try {
        raw = fs.readFileSync(filePath, "utf-8");
      } catch (err) {
        // Vanished between readdir and read
        if (isNotFound(err)) continue;
        throw new StorageError(`Failed to read ${filePath}`, "STORAGE_READ_FAILED", {
          path: filePath,
          error: errorMessage(err),
        });
      }

      const record = parseJson(raw, schema);
      if (record === undefined) {
        this.moveToDeadLetter(filePath);
        continue;
      }
      records.push(record);
    }
    return records;
  }

  private moveToDeadLetter(filePath: string): void {
    const dest = path.join(this.deadLetterDir, `${Date.now()}-${path.basename(filePath)}`);
    try {
      fs.mkdirSync(this.deadLetterDir, { recursive: true });
      fs.renameSync(filePath, dest);
      this.log.warn({ filePath, dest }, "Unreadable state file moved to dead-letter");
    } catch (err) {
      this.log.error({ err, filePath }, "Failed to move unreadable state file to dead-letter");
    }
  }
}

function parseJson<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const result = schema.safeParse(json);
  return result.success ? result.data : undefined;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
