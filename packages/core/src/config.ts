/**
 * Configuration file management for devpeace.
 *
 * Manages the ~/.devpeace/ directory structure and config.yaml file.
 * Config operations are synchronous: the daemon reads the file once at
 * startup and only writes it on `init` or when Jira credentials change.
 *
 * Directory layout:
 *   ~/.devpeace/          (or $DEVPEACE_HOME)
 *     config.yaml         — Jira credentials, control API, tracking settings
 *     state/              — durable daemon state (see state-store.ts)
 *     logs/daemon.log     — JSON daemon log
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as crypto from "node:crypto";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "@devpeace/shared";

// ---------------------------------------------------------------------------
// Zod schema for config validation
// ---------------------------------------------------------------------------

const statusRuleSchema = z.object({
  /** Current statuses the rule applies to */
  from: z.union([z.string(), z.array(z.string())]).transform((v) => (Array.isArray(v) ? v : [v])),
  /** Target status name */
  to: z.string().min(1),
});

/**
 * Full config structure. Every section has defaults so a partial file
 * (e.g. only `jira:`) is valid.
 */
export const DevPeaceConfigSchema = z.object({
  jira: z
    .object({
      /** Base URL, e.g. https://example.atlassian.net. Empty = not configured */
      url: z.string().default(""),
      user: z.string().default(""),
      /** API token; DEVPEACE_JIRA_TOKEN takes precedence */
      token: z.string().default(""),
    })
    .default({}),
  control: z
    .object({
      host: z.string().min(1).default("127.0.0.1"),
      port: z.number().int().min(0).max(65535).default(4719),
      /** Bearer token the CLI presents to the control API */
      api_key: z.string().default(""),
    })
    .default({}),
  tracking: z
    .object({
      idle_timeout_minutes: z.number().positive().default(15),
      debounce_ms: z.number().int().positive().default(1500),
      /** Sessions shorter than this are discarded */
      min_loggable_seconds: z.number().int().nonnegative().default(60),
      /** Known Jira project keys; enables unseparated branch keys */
      project_keys: z.array(z.string()).default([]),
      ignore_patterns: z
        .array(z.string())
        .default(["node_modules", ".venv", "__pycache__", "dist", "*.log", "*.tmp", ".DS_Store"]),
    })
    .default({}),
  submission: z
    .object({
      max_concurrent: z.number().int().min(1).max(4).default(2),
      max_attempts: z.number().int().positive().default(6),
      base_delay_ms: z.number().int().positive().default(10_000),
      max_delay_ms: z.number().int().positive().default(900_000),
      tick_interval_ms: z.number().int().positive().default(5_000),
      persist_interval_ms: z.number().int().positive().default(30_000),
      shutdown_grace_ms: z.number().int().nonnegative().default(10_000),
      /** Post a second comment listing the session's commits */
      post_commit_comments: z.boolean().default(true),
      /** Submitted entries older than this are pruned at startup */
      retention_days: z.number().int().positive().default(30),
    })
    .default({}),
  status_automation: z
    .object({
      enabled: z.boolean().default(false),
      auto_revert: z.boolean().default(false),
      on_work_start: z.array(statusRuleSchema).default([]),
      on_first_commit: z.array(statusRuleSchema).default([]),
    })
    .default({}),
});

/**
 * Strongly-typed config structure. Matches the YAML layout 1:1.
 */
export type DevPeaceConfig = z.infer<typeof DevPeaceConfigSchema>;
export type StatusRule = z.infer<typeof statusRuleSchema>;
export type JiraConfig = DevPeaceConfig["jira"];

// ---------------------------------------------------------------------------
// Paths — all devpeace state lives under one home directory
// ---------------------------------------------------------------------------

/**
 * Path override used by tests to redirect file operations to a temp
 * directory. In production it is undefined and DEVPEACE_HOME or
 * ~/.devpeace/ is used.
 */
let _homeOverride: string | undefined;

/** Root directory for config, state and logs */
export function getHomeDir(): string {
  return _homeOverride ?? process.env.DEVPEACE_HOME ?? path.join(os.homedir(), ".devpeace");
}

export function getConfigPath(): string {
  return path.join(getHomeDir(), "config.yaml");
}

export function getStateDir(): string {
  return path.join(getHomeDir(), "state");
}

export function getLogDir(): string {
  return path.join(getHomeDir(), "logs");
}

/**
 * Override the home directory — for tests only.
 * Pass `undefined` to reset back to the real path.
 */
export function overrideConfigPaths(baseDir: string | undefined): void {
  _homeOverride = baseDir;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** The built-in defaults, with an empty control API key */
export function defaultConfig(): DevPeaceConfig {
  return DevPeaceConfigSchema.parse({});
}

export function configExists(): boolean {
  return fs.existsSync(getConfigPath());
}

/**
 * Load and validate the config file, then apply environment overrides.
 *
 * @throws ConfigError CONFIG_NOT_FOUND — file does not exist
 * @throws ConfigError CONFIG_CORRUPTED — file exists but is not valid YAML
 * @throws ConfigError CONFIG_INVALID — YAML parses but fails schema validation
 */
export function loadConfig(): DevPeaceConfig {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    throw new ConfigError(
      `Config file not found at ${configPath}. Run 'devpeace init' first.`,
      "CONFIG_NOT_FOUND",
      { path: configPath },
    );
  }

  const raw = fs.readFileSync(configPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(
      `Config file at ${configPath} is not valid YAML.`,
      "CONFIG_CORRUPTED",
      { path: configPath, parseError: String(err) },
    );
  }

  // An empty file parses to null; treat it as "all defaults"
  const result = DevPeaceConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Config file at ${configPath} has invalid structure: ${result.error.message}`,
      "CONFIG_INVALID",
      { path: configPath, zodErrors: result.error.issues },
    );
  }

  const config = result.data;
  const envToken = process.env.DEVPEACE_JIRA_TOKEN;
  if (envToken) {
    config.jira.token = envToken;
  }
  return config;
}

/**
 * Persist config to disk with an atomic write (tmp file + rename).
 * File permissions are 0o600 since the file holds the Jira token.
 */
export function saveConfig(config: DevPeaceConfig): void {
  const configPath = getConfigPath();
  const configDir = path.dirname(configPath);

  fs.mkdirSync(configDir, { recursive: true });

  const yamlContent =
    "# devpeace configuration\n" +
    "# Generated by 'devpeace init'. Edit with care.\n\n" +
    stringifyYaml(config, { lineWidth: 120 });

  // Same-directory rename keeps the swap atomic
  const tmpPath = path.join(
    configDir,
    `.config.yaml.tmp.${crypto.randomBytes(4).toString("hex")}`,
  );

  try {
    fs.writeFileSync(tmpPath, yamlContent, { mode: 0o600 });
    fs.renameSync(tmpPath, configPath);
  } catch (err) {
    try {
      fs.unlinkSync(tmpPath);
    } catch {
      // Temp file may never have been created
    }
    throw new ConfigError(
      `Failed to write config file at ${configPath}`,
      "CONFIG_WRITE_FAILED",
      { path: configPath, error: err instanceof Error ? err.message : String(err) },
    );
  }
}

/**
 * Write a default config with a freshly generated control API key.
 * Refuses to overwrite an existing file unless `force` is set.
 */
export function initConfig(opts: { force?: boolean } = {}): DevPeaceConfig {
  if (configExists() && !opts.force) {
    throw new ConfigError(
      `Config file already exists at ${getConfigPath()}. Use --force to overwrite.`,
      "CONFIG_EXISTS",
      { path: getConfigPath() },
    );
  }

  const config = defaultConfig();
  config.control.api_key = generateApiKey();
  saveConfig(config);
  ensureDirectories();
  return config;
}

/** Whether enough Jira settings are present to attempt submissions */
export function isJiraConfigured(jira: JiraConfig): boolean {
  return jira.url.length > 0 && jira.user.length > 0 && jira.token.length > 0;
}

/** Create the home, state and log directories */
export function ensureDirectories(): void {
  fs.mkdirSync(getHomeDir(), { recursive: true });
  fs.mkdirSync(getStateDir(), { recursive: true });
  fs.mkdirSync(getLogDir(), { recursive: true });
}

function generateApiKey(): string {
  return crypto.randomBytes(24).toString("hex");
}
