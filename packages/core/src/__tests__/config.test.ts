/**
 * Tests for configuration loading and persistence.
 *
 * All tests redirect the home directory to a temp dir via
 * overrideConfigPaths so the real ~/.devpeace/ is never touched.
 *
 * Test coverage:
 *   - Missing, corrupted and invalid files map to distinct ConfigError codes
 *   - Partial files are completed with defaults
 *   - initConfig writes an owner-only file with a generated API key
 *   - DEVPEACE_JIRA_TOKEN overrides the stored token
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { ConfigError } from "@devpeace/shared";
import {
  defaultConfig,
  getConfigPath,
  getStateDir,
  initConfig,
  isJiraConfigured,
  loadConfig,
  overrideConfigPaths,
  saveConfig,
} from "../config.js";
import { makeTempDir } from "./helpers.js";

let home: string;

beforeEach(() => {
  home = makeTempDir();
  overrideConfigPaths(home);
  delete process.env.DEVPEACE_JIRA_TOKEN;
});

afterEach(() => {
  overrideConfigPaths(undefined);
  delete process.env.DEVPEACE_JIRA_TOKEN;
  fs.rmSync(home, { recursive: true, force: true });
});

function writeConfig(content: string): void {
  fs.writeFileSync(path.join(home, "config.yaml"), content);
}

function loadError(): ConfigError {
  try {
    loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error("loadConfig did not throw");
}

describe("loadConfig", () => {
  it("reports a missing file", () => {
    expect(loadError().code).toBe("CONFIG_NOT_FOUND");
  });

  it("reports unparseable YAML", () => {
    writeConfig("jira: [unclosed\n");
    expect(loadError().code).toBe("CONFIG_CORRUPTED");
  });

  it("reports values that fail validation", () => {
    writeConfig("tracking:\n  debounce_ms: -5\n");
    expect(loadError().code).toBe("CONFIG_INVALID");
  });

  it("fills defaults around a partial file", () => {
    writeConfig("jira:\n  url: https://example.atlassian.net\n");
    const config = loadConfig();
    expect(config.jira).toEqual({ url: "https://example.atlassian.net", user: "", token: "" });
    expect(config.control.port).toBe(4719);
    expect(config.tracking.idle_timeout_minutes).toBe(15);
    expect(config.submission.max_attempts).toBe(6);
    expect(config.status_automation.enabled).toBe(false);
  });

  it("treats an empty file as all defaults", () => {
    writeConfig("");
    expect(loadConfig()).toEqual(defaultConfig());
  });

  it("normalizes a single-status rule to a list", () => {
    writeConfig(
      "status_automation:\n  enabled: true\n  on_work_start:\n    - from: To Do\n      to: In Progress\n",
    );
    expect(loadConfig().status_automation.on_work_start).toEqual([
      { from: ["To Do"], to: "In Progress" },
    ]);
  });

  it("lets DEVPEACE_JIRA_TOKEN override the stored token", () => {
    writeConfig("jira:\n  token: from-file\n");
    process.env.DEVPEACE_JIRA_TOKEN = "test-secret";
    expect(loadConfig().jira.token).toBe("test-secret");
  });
});

describe("initConfig / saveConfig", () => {
  it("writes defaults with a generated API key", () => {
    const config = initConfig();
    expect(config.control.api_key).toMatch(/^[0-9a-f]{48}$/);
    expect(loadConfig()).toEqual(config);
    expect(fs.existsSync(getStateDir())).toBe(true);
  });

  it("writes the file owner-only", () => {
    initConfig();
    expect(fs.statSync(getConfigPath()).mode & 0o777).toBe(0o600);
  });

  it("refuses to overwrite without force", () => {
    initConfig();
    expect(() => initConfig()).toThrow(ConfigError);
    expect(() => initConfig({ force: true })).not.toThrow();
  });

  it("round-trips saved changes", () => {
    const config = defaultConfig();
    config.jira = { url: "https://example.atlassian.net", user: "dev@example.com", token: "test-secret" };
    saveConfig(config);
    const loaded = loadConfig();
    expect(loaded.jira.user).toBe("dev@example.com");
    expect(isJiraConfigured(loaded.jira)).toBe(true);
  });

  it("leaves no temp files behind", () => {
    initConfig();
    expect(fs.readdirSync(home).filter((f) => f.includes(".tmp."))).toEqual([]);
  });
});
