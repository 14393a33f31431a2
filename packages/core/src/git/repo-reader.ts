/**
 * Git metadata reader.
 *
 * Reads branch, HEAD and reflog straight from the repository's control
 * directory instead of spawning `git`. The watcher calls this after every
 * metadata change, so it must be cheap and must tolerate files that are
 * mid-rewrite: every read returns null rather than throwing when a file is
 * missing or unreadable.
 */

import * as fs from "node:fs";
import * as path from "node:path";

/** What HEAD points at right now */
export interface GitSnapshot {
  /** Short branch name; null when HEAD is detached */
  branch: string | null;
  /** Commit sha HEAD resolves to; null for an unborn branch */
  head: string | null;
}

/** One line of logs/HEAD */
export interface ReflogEntry {
  oldSha: string;
  newSha: string;
  /** ISO-8601 time of the ref update */
  timestamp: string;
  /** Operation before the colon: "commit", "commit (amend)", "checkout", ... */
  action: string;
  /** Text after the colon, e.g. the commit subject */
  message: string;
}

/**
 * Locate the control directory for a working tree. Handles both a `.git`
 * directory and a `.git` file containing `gitdir: <path>` (worktrees,
 * submodules).
 *
 * @returns absolute path, or null if `root` is not a git repository
 */
export function resolveGitDir(root: string): string | null {
  const dotGit = path.join(root, ".git");
  let stat: fs.Stats;
  try {
    stat = fs.statSync(dotGit);
  } catch {
    return null;
  }

  if (stat.isDirectory()) return dotGit;
  if (!stat.isFile()) return null;

  const content = readText(dotGit);
  const match = content ? /^gitdir:\s*(.+)$/m.exec(content) : null;
  const target = match?.[1]?.trim();
  if (!target) return null;

  const gitDir = path.resolve(root, target);
  return isDirectory(gitDir) ? gitDir : null;
}

export function isGitRepository(root: string): boolean {
  return resolveGitDir(root) !== null;
}

/**
 * Read HEAD and resolve it to a branch and sha.
 *
 * @returns null when HEAD is missing or unparseable (e.g. mid-checkout)
 */
export function readSnapshot(gitDir: string): GitSnapshot | null {
  const headContent = readText(path.join(gitDir, "HEAD"))?.trim();
  if (!headContent) return null;

  const refMatch = /^ref:\s*(.+)$/.exec(headContent);
  if (!refMatch?.[1]) {
    return /^[0-9a-f]{40,64}$/i.test(headContent)
      ? { branch: null, head: headContent.toLowerCase() }
      : null;
  }

  const ref = refMatch[1].trim();
  const branch = ref.startsWith("refs/heads/") ? ref.slice("refs/heads/".length) : ref;
  return { branch, head: resolveRef(gitDir, ref) };
}

/**
 * Resolve a full ref name to a sha via the loose ref file, falling back to
 * packed-refs.
 */
export function resolveRef(gitDir: string, ref: string): string | null {
  const commonDir = resolveCommonDir(gitDir);

  for (const dir of unique([gitDir, commonDir])) {
    const loose = readText(path.join(dir, ref))?.trim();
    if (loose && /^[0-9a-f]{40,64}$/i.test(loose)) return loose.toLowerCase();
  }

  const packed = readText(path.join(commonDir, "packed-refs"));
  if (!packed) return null;

  for (const line of packed.split("\n")) {
    if (line.startsWith("#") || line.startsWith("^")) continue;
    const [sha, name] = line.trim().split(/\s+/);
    if (name === ref && sha) return sha.toLowerCase();
  }
  return null;
}

/**
 * Parse the most recent entry of logs/HEAD.
 * Line format: `<old> <new> <name> <<email>> <unix ts> <tz>\t<action>: <message>`
 */
export function readLastReflogEntry(gitDir: string): ReflogEntry | null {
  const content = readText(path.join(gitDir, "logs", "HEAD"));
  if (!content) return null;

  const lines = content.split("\n").filter((l) => l.trim().length > 0);
  const last = lines[lines.length - 1];
  return last ? parseReflogLine(last) : null;
}

export function parseReflogLine(line: string): ReflogEntry | null {
  const tab = line.indexOf("\t");
  const header = tab === -1 ? line : line.slice(0, tab);
  const body = tab === -1 ? "" : line.slice(tab + 1);

  const match = /^([0-9a-f]+) ([0-9a-f]+) .*> (\d+) [+-]\d{4}$/i.exec(header);
  if (!match?.[1] || !match[2] || !match[3]) return null;

  const colon = body.indexOf(":");
  const action = colon === -1 ? body.trim() : body.slice(0, colon).trim();
  const message = colon === -1 ? "" : body.slice(colon + 1).trim();

  return {
    oldSha: match[1].toLowerCase(),
    newSha: match[2].toLowerCase(),
    timestamp: new Date(Number(match[3]) * 1000).toISOString(),
    action,
    message,
  };
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Linked worktrees keep refs in the main repository's directory */
function resolveCommonDir(gitDir: string): string {
  const commonDir = readText(path.join(gitDir, "commondir"))?.trim();
  return commonDir ? path.resolve(gitDir, commonDir) : gitDir;
}

function readText(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch {
    return null;
  }
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
