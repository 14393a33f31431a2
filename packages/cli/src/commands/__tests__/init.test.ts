/**
 * Tests for `devpeace init` and the offline path of `devpeace configure`.
 *
 * The devpeace home is redirected to a temp directory with
 * overrideConfigPaths().
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ZodError } from "zod";
import { configExists, getConfigPath, loadConfig, overrideConfigPaths } from "@devpeace/core";
import { resolveCredentials, runConfigure, runConfigureOffline } from "../configure.js";
import { runInit } from "../init.js";
import { jsonResponse, makeClient, requestOf, stubFetch } from "../../lib/__tests__/fixtures.js";

let home: string;

beforeEach(() => {
  home = fs.mkdtempSync(path.join(os.tmpdir(), "devpeace-cli-"));
  overrideConfigPaths(home);
  vi.stubEnv("DEVPEACE_JIRA_TOKEN", "");
  vi.spyOn(process.stdout, "write").mockImplementation(() => true);
});

afterEach(() => {
  overrideConfigPaths(undefined);
  vi.unstubAllEnvs();
  vi.unstubAllGlobals();
  fs.rmSync(home, { recursive: true, force: true });
});

describe("runInit", () => {
  it("writes defaults with a generated API key", () => {
    runInit({ force: false });

    const config = loadConfig();
    expect(config.control.api_key).toMatch(/^[0-9a-f]{48}$/);
    expect(config.control.port).toBe(4719);
    expect(config.jira).toEqual({ url: "", user: "", token: "" });
    expect(fs.existsSync(path.join(home, "state"))).toBe(true);
  });

  it("stores Jira credentials given as flags", () => {
    runInit({
      force: false,
      jiraUrl: "https://jira.example.test",
      jiraUser: "dev@example.com",
      jiraToken: "test-secret",
    });

    expect(loadConfig().jira).toEqual({
      url: "https://jira.example.test",
      user: "dev@example.com",
      token: "test-secret",
    });
  });

  it("refuses to overwrite without --force and replaces the key with it", () => {
    runInit({ force: false });
    const firstKey = loadConfig().control.api_key;

    let error: unknown;
    try {
      runInit({ force: false });
    } catch (err) {
      error = err;
    }
    expect(error).toMatchObject({ code: "CONFIG_EXISTS" });

    runInit({ force: true });
    expect(loadConfig().control.api_key).not.toBe(firstKey);
  });

  it("writes nothing when the Jira flags are incomplete", () => {
    expect(() => runInit({ force: false, jiraUrl: "https://jira.example.test" })).toThrow(ZodError);
    expect(configExists()).toBe(false);
  });
});

describe("configure", () => {
  it("takes the token from the environment when no flag is given", () => {
    vi.stubEnv("DEVPEACE_JIRA_TOKEN", "test-secret-env");
    expect(resolveCredentials({ url: "https://jira.example.test", user: "dev@example.com" })).toEqual({
      url: "https://jira.example.test",
      user: "dev@example.com",
      token: "test-secret-env",
    });
  });

  it("rejects a malformed URL", () => {
    expect(() => resolveCredentials({ url: "jira", user: "dev", token: "test-secret" })).toThrow(ZodError);
  });

  it("writes the config file offline, keeping the rest of it", () => {
    runInit({ force: false });
    const apiKey = loadConfig().control.api_key;
    const credentials = { url: "https://jira.example.test", user: "dev@example.com", token: "test-secret" };

    runConfigureOffline(credentials);

    const config = loadConfig();
    expect(config.jira).toEqual(credentials);
    expect(config.control.api_key).toBe(apiKey);
    expect(fs.statSync(getConfigPath()).mode & 0o777).toBe(0o600);
  });

  it("sends the credentials to the daemon", async () => {
    const fetchMock = stubFetch(jsonResponse({ tracker: "configured", display_name: "Test User" }));
    const credentials = { url: "https://jira.example.test", user: "dev@example.com", token: "test-secret" };

    await runConfigure(makeClient(), credentials);

    expect(requestOf(fetchMock).body).toEqual(credentials);
  });
});
