/**
 * Tests for branch issue key extraction.
 *
 * Covers the three branch grammars, project key filtering, longest-prefix
 * matching, totality on junk input, and the helper functions around keys
 * and branch names.
 */

import { describe, expect, test } from "vitest";
import {
  branchCategory,
  extractIssueKey,
  isValidIssueKey,
  normalizeIssueKey,
  parseBranch,
  projectOf,
  suggestBranchName,
} from "../issue-key.js";

describe("extractIssueKey", () => {
  test("typed branch with slug", () => {
    expect(extractIssueKey("feature/ABC-42-login")).toBe("ABC-42");
  });

  test("bare key", () => {
    expect(extractIssueKey("PROJ-123")).toBe("PROJ-123");
  });

  test("lowercase branch yields an uppercased key", () => {
    expect(extractIssueKey("feature/abc-42")).toBe("ABC-42");
  });

  test("nested type prefix", () => {
    expect(extractIssueKey("users/alice/OPS-9-rotate")).toBe("OPS-9");
  });

  test("branch without a key yields null", () => {
    expect(extractIssueKey("no-issue-here")).toBeNull();
    expect(extractIssueKey("main")).toBeNull();
    expect(extractIssueKey("release/1.2.3")).toBeNull();
  });

  test("digits glued to a slug are not a key", () => {
    expect(extractIssueKey("PROJ-123abc")).toBeNull();
  });

  test("empty and missing input yield null", () => {
    expect(extractIssueKey("")).toBeNull();
    expect(extractIssueKey("   ")).toBeNull();
    expect(extractIssueKey(null)).toBeNull();
    expect(extractIssueKey(undefined)).toBeNull();
  });

  test("unseparated key needs configured project keys", () => {
    expect(extractIssueKey("hotfix/PROJ123")).toBeNull();
    expect(extractIssueKey("hotfix/PROJ123", { projectKeys: ["PROJ"] })).toBe("PROJ-123");
    expect(extractIssueKey("PROJ123-quick-fix", { projectKeys: ["proj"] })).toBe("PROJ-123");
  });

  test("longest configured prefix wins", () => {
    expect(extractIssueKey("AB123", { projectKeys: ["AB", "AB1"] })).toBe("AB1-23");
  });

  test("keys from unlisted projects are rejected", () => {
    expect(extractIssueKey("feature/OTHER-5", { projectKeys: ["PROJ"] })).toBeNull();
    expect(extractIssueKey("feature/PROJ-5", { projectKeys: ["PROJ"] })).toBe("PROJ-5");
  });
});

describe("parseBranch", () => {
  test("splits type, key and description", () => {
    expect(parseBranch("feature/proj-7-add-login")).toEqual({
      branch: "feature/proj-7-add-login",
      branch_type: "feature",
      issue_key: "PROJ-7",
      description: "add login",
    });
  });

  test("underscore slugs become spaces", () => {
    expect(parseBranch("PROJ-1_fix_the_bug").description).toBe("fix the bug");
  });

  test("unmatched branch keeps only the name", () => {
    expect(parseBranch("develop")).toEqual({
      branch: "develop",
      branch_type: null,
      issue_key: null,
      description: null,
    });
  });
});

describe("issue key helpers", () => {
  test("isValidIssueKey requires the uppercased form", () => {
    expect(isValidIssueKey("PROJ-1")).toBe(true);
    expect(isValidIssueKey("proj-1")).toBe(false);
    expect(isValidIssueKey("P-1")).toBe(false);
    expect(isValidIssueKey("PROJ-")).toBe(false);
  });

  test("normalizeIssueKey trims and uppercases", () => {
    expect(normalizeIssueKey("  proj-12 ")).toBe("PROJ-12");
    expect(normalizeIssueKey("12-PROJ")).toBeNull();
  });

  test("projectOf", () => {
    expect(projectOf("DATA_ENG-44")).toBe("DATA_ENG");
  });
});

describe("branchCategory", () => {
  test("maps type prefixes to categories", () => {
    expect(branchCategory("feat/PROJ-1")).toBe("feature");
    expect(branchCategory("bugfix/PROJ-1")).toBe("bugfix");
    expect(branchCategory("release/2.0")).toBe("release");
    expect(branchCategory("chore/update-deps")).toBe("maintenance");
    expect(branchCategory("test/flaky")).toBe("test");
  });

  test("branches without a type are other", () => {
    expect(branchCategory("main")).toBe("other");
    expect(branchCategory("spike/idea")).toBe("other");
  });
});

describe("suggestBranchName", () => {
  test("slugifies the description", () => {
    expect(suggestBranchName("PROJ-7", "fix", "Login button!")).toBe("fix/PROJ-7-login-button");
  });

  test("unknown types fall back to feature", () => {
    expect(suggestBranchName("PROJ-7", "weird")).toBe("feature/PROJ-7");
  });

  test("empty key yields empty string", () => {
    expect(suggestBranchName("")).toBe("");
  });
});
