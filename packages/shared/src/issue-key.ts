/**
 * Branch issue extraction.
 *
 * Infers the Jira issue key a developer is working on from the checked-out
 * branch name. Grammars are tried in order, first accepted match wins:
 *
 *   1. <type>/<PROJECT>-<number>[-slug]   feature/PROJ-123-login  -> PROJ-123
 *   2. <PROJECT>-<number>[-slug]          PROJ-123                -> PROJ-123
 *   3. [<type>/]<PROJECT><number>[-slug]  hotfix/PROJ123          -> PROJ-123
 *
 * Grammar 3 has no separator between project and number, so it only runs
 * when a list of project keys is configured to say where the prefix ends.
 * With a configured list, grammar 1/2 keys from other projects are rejected
 * and the next grammar is tried.
 *
 * Matching is case-insensitive; keys are returned uppercased. Every function
 * here is total: unmatched input yields null, never an exception.
 */

/** Jira's default project key grammar: a letter followed by letters, digits or underscores */
const PROJECT = "[A-Z][A-Z0-9_]+";

/** A full issue key, e.g. PROJ-123 */
const ISSUE_KEY_REGEX = new RegExp(`^${PROJECT}-\\d+$`);

/** Separator allowed between the issue number and a trailing slug */
const SLUG = "(?:[-_.](?<desc>.*))?";

const TYPED_KEY = new RegExp(`^(?<type>.+)/(?<key>${PROJECT}-\\d+)${SLUG}$`, "i");
const BARE_KEY = new RegExp(`^(?<key>${PROJECT}-\\d+)${SLUG}$`, "i");

/** Branch types the original tooling recognized, used for categorization and suggestions */
export const COMMON_BRANCH_TYPES = new Set([
  "feature", "feat", "bugfix", "fix", "hotfix", "release", "chore",
  "docs", "style", "refactor", "test", "perf", "build", "ci",
]);

export type BranchCategory =
  | "feature"
  | "bugfix"
  | "release"
  | "maintenance"
  | "test"
  | "other";

/** Everything extracted from a branch name */
export interface BranchInfo {
  branch: string;
  /** Lowercased prefix before the last "/" holding the key, if any */
  branch_type: string | null;
  /** Uppercased issue key, or null when no grammar matched */
  issue_key: string | null;
  /** Slug after the key with separators turned into spaces */
  description: string | null;
}

export interface ExtractOptions {
  /**
   * Known project keys (e.g. ["PROJ", "OPS"]). Enables grammar 3 and
   * restricts grammars 1 and 2 to these projects.
   */
  projectKeys?: readonly string[];
}

/** Is `value` already a well-formed, uppercased issue key? */
export function isValidIssueKey(value: string): boolean {
  return ISSUE_KEY_REGEX.test(value);
}

/**
 * Normalize user input ("  proj-12 ") into an issue key, or null if it
 * cannot be one. Used for manual orphan association.
 */
export function normalizeIssueKey(value: string): string | null {
  const candidate = value.trim().toUpperCase();
  return isValidIssueKey(candidate) ? candidate : null;
}

/** Project part of an issue key ("PROJ-123" -> "PROJ") */
export function projectOf(issueKey: string): string {
  const dash = issueKey.lastIndexOf("-");
  return dash === -1 ? issueKey : issueKey.slice(0, dash);
}

/**
 * Parse a branch name into its type, issue key and description.
 */
export function parseBranch(branch: string, opts: ExtractOptions = {}): BranchInfo {
  const info: BranchInfo = {
    branch,
    branch_type: null,
    issue_key: null,
    description: null,
  };

  const name = typeof branch === "string" ? branch.trim() : "";
  if (!name) return info;

  const projects = normalizeProjects(opts.projectKeys);

  for (const pattern of [TYPED_KEY, BARE_KEY]) {
    const match = pattern.exec(name);
    const key = match?.groups?.key?.toUpperCase();
    if (!match || !key) continue;
    if (projects.length > 0 && !projects.includes(projectOf(key))) continue;
    return fill(info, key, match.groups?.type, match.groups?.desc);
  }

  // Grammar 3: longest configured prefix first so "PROJX" beats "PROJ"
  for (const project of [...projects].sort((a, b) => b.length - a.length)) {
    const pattern = new RegExp(
      `^(?:(?<type>.+)/)?${escapeRegex(project)}(?<num>\\d+)${SLUG}$`,
      "i",
    );
    const match = pattern.exec(name);
    const num = match?.groups?.num;
    if (!match || !num) continue;
    return fill(info, `${project}-${num}`, match.groups?.type, match.groups?.desc);
  }

  return info;
}

/**
 * Extract just the issue key from a branch name.
 *
 * @example
 *   extractIssueKey("feature/ABC-42-login")                    // "ABC-42"
 *   extractIssueKey("hotfix/PROJ123", { projectKeys: ["PROJ"] }) // "PROJ-123"
 *   extractIssueKey("no-issue-here")                           // null
 */
export function extractIssueKey(
  branch: string | null | undefined,
  opts: ExtractOptions = {},
): string | null {
  if (!branch) return null;
  return parseBranch(branch, opts).issue_key;
}

/** Coarse category of a branch, derived from its type prefix */
export function branchCategory(branch: string): BranchCategory {
  const type = parseBranch(branch).branch_type ?? branch.split("/")[0]?.toLowerCase();
  if (!type || !branch.includes("/")) return "other";

  switch (type) {
    case "feature":
    case "feat":
      return "feature";
    case "bugfix":
    case "fix":
    case "hotfix":
      return "bugfix";
    case "release":
      return "release";
    case "chore":
    case "docs":
    case "style":
    case "refactor":
      return "maintenance";
    case "test":
      return "test";
    default:
      return "other";
  }
}

/**
 * Suggest a branch name for an issue, e.g. ("PROJ-7", "fix", "Login button!")
 * -> "fix/PROJ-7-login-button". Unknown types fall back to "feature".
 */
export function suggestBranchName(
  issueKey: string,
  branchType = "feature",
  description = "",
): string {
  if (!issueKey) return "";

  const type = COMMON_BRANCH_TYPES.has(branchType.toLowerCase())
    ? branchType.toLowerCase()
    : "feature";

  const slug = description
    .replace(/[^a-zA-Z0-9\s]/g, "")
    .trim()
    .replace(/\s+/g, "-")
    .toLowerCase();

  return slug ? `${type}/${issueKey}-${slug}` : `${type}/${issueKey}`;
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function fill(
  info: BranchInfo,
  key: string,
  type: string | undefined,
  desc: string | undefined,
): BranchInfo {
  info.issue_key = key;
  info.branch_type = type ? type.toLowerCase() : null;
  info.description = desc ? desc.replace(/[-_]+/g, " ").trim() || null : null;
  return info;
}

function normalizeProjects(projectKeys: readonly string[] | undefined): string[] {
  if (!projectKeys) return [];
  return projectKeys
    .map((p) => p.trim().toUpperCase())
    .filter((p) => new RegExp(`^${PROJECT}$`).test(p));
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
