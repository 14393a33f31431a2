/**
 * HTTP client for the daemon's control API.
 *
 * Wraps every control endpoint with typed request/response handling:
 *   - Bearer token authentication from config (`control.api_key`)
 *   - Timeouts via AbortSignal.timeout
 *   - Structured errors (ApiError for HTTP errors, ApiConnectionError when
 *     the daemon cannot be reached)
 *   - Response bodies validated with the shared response schemas, envelopes
 *     unwrapped
 */

import type { z } from "zod";
import {
  daemonStatusSchema,
  errorResponseSchema,
  healthResponseSchema,
  issueTransitionResponseSchema,
  orphanListResponseSchema,
  orphanResponseSchema,
  repositoryListResponseSchema,
  repositoryResponseSchema,
  retryResponseSchema,
  trackerConfigResponseSchema,
  worklogListResponseSchema,
  worklogResponseSchema,
  type DaemonStatus,
  type HealthResponse,
  type IssueTransitionResponse,
  type JiraCredentials,
  type OrphanRecord,
  type TrackerConfigResponse,
  type WatchedRepository,
  type WorklogEntry,
  type WorklogStatus,
} from "@devpeace/shared";
import { loadConfig, type DevPeaceConfig } from "@devpeace/core";

// ---------------------------------------------------------------------------
// Error Classes
// ---------------------------------------------------------------------------

/**
 * HTTP 4xx/5xx from the daemon. `code` is the daemon's error code when the
 * body carried one (e.g. NOT_FOUND_ORPHAN).
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly code?: string;
  readonly body?: unknown;

  constructor(message: string, statusCode: number, code?: string, body?: unknown) {
    super(message);
    this.name = "ApiError";
    this.statusCode = statusCode;
    this.code = code;
    this.body = body;
  }
}

/** The daemon is not running, not listening where config says, or timed out */
export class ApiConnectionError extends Error {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, options);
    this.name = "ApiConnectionError";
  }
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface DaemonClientOptions {
  /** e.g. http://127.0.0.1:4719 */
  baseUrl: string;
  apiKey: string;
  /** Per-request timeout in ms (default 10s) */
  timeout?: number;
}

type Method = "GET" | "POST" | "PUT" | "DELETE";

export class DaemonClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeout: number;

  constructor(opts: DaemonClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.apiKey = opts.apiKey;
    this.timeout = opts.timeout ?? 10_000;
  }

  /** Client for the daemon described by ~/.devpeace/config.yaml */
  static fromConfig(config: DevPeaceConfig = loadConfig()): DaemonClient {
    const host = config.control.host.includes(":") ? `[${config.control.host}]` : config.control.host;
    return new DaemonClient({
      baseUrl: `http://${host}:${config.control.port}`,
      apiKey: config.control.api_key,
    });
  }

  // -------------------------------------------------------------------------
  // Core HTTP helper
  // -------------------------------------------------------------------------

  /**
   * On non-2xx responses the daemon's `{ error, code }` body becomes the
   * ApiError message and code; anything else falls back to the status line.
   */
  private async request<T>(
    method: Method,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options?: { query?: Record<string, string | undefined>; body?: unknown },
  ): Promise<T> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(options?.query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = { Authorization: `Bearer ${this.apiKey}` };
    const init: RequestInit = { method, headers, signal: AbortSignal.timeout(this.timeout) };
    if (options?.body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(options.body);
    }

    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err));
      throw new ApiConnectionError(`Failed to ${method} ${path}: ${cause.message}`, { cause });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      body = undefined;
    }

    if (!response.ok) {
      const parsed = errorResponseSchema.safeParse(body);
      if (parsed.success) {
        throw new ApiError(parsed.data.error, response.status, parsed.data.code, body);
      }
      throw new ApiError(`HTTP ${response.status}: ${response.statusText}`, response.status, undefined, body);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ApiError(`Unexpected response from ${method} ${path}`, response.status, undefined, body);
    }
    return parsed.data;
  }

  // -------------------------------------------------------------------------
  // System
  // -------------------------------------------------------------------------

  async getHealth(): Promise<HealthResponse> {
    return this.request("GET", "/api/health", healthResponseSchema);
  }

  async getStatus(): Promise<DaemonStatus> {
    return this.request("GET", "/api/status", daemonStatusSchema);
  }

  async startWatching(): Promise<DaemonStatus> {
    return this.request("POST", "/api/watch/start", daemonStatusSchema);
  }

  async stopWatching(): Promise<DaemonStatus> {
    return this.request("POST", "/api/watch/stop", daemonStatusSchema);
  }

  // -------------------------------------------------------------------------
  // Repositories
  // -------------------------------------------------------------------------

  async listRepositories(): Promise<WatchedRepository[]> {
    const res = await this.request("GET", "/api/repositories", repositoryListResponseSchema);
    return res.repositories;
  }

  async addRepository(path: string): Promise<WatchedRepository> {
    const res = await this.request("POST", "/api/repositories", repositoryResponseSchema, { body: { path } });
    return res.repository;
  }

  async removeRepository(path: string): Promise<WatchedRepository> {
    const res = await this.request("DELETE", "/api/repositories", repositoryResponseSchema, { body: { path } });
    return res.repository;
  }

  // -------------------------------------------------------------------------
  // Orphans
  // -------------------------------------------------------------------------

  async listOrphans(): Promise<OrphanRecord[]> {
    const res = await this.request("GET", "/api/orphans", orphanListResponseSchema);
    return res.orphans;
  }

  async associateOrphan(id: string, issueKey: string): Promise<WorklogEntry> {
    const res = await this.request(
      "POST",
      `/api/orphans/${encodeURIComponent(id)}/associate`,
      worklogResponseSchema,
      { body: { issue_key: issueKey } },
    );
    return res.entry;
  }

  async discardOrphan(id: string): Promise<OrphanRecord> {
    const res = await this.request("DELETE", `/api/orphans/${encodeURIComponent(id)}`, orphanResponseSchema);
    return res.orphan;
  }

  // -------------------------------------------------------------------------
  // Worklogs
  // -------------------------------------------------------------------------

  async listWorklogs(status?: WorklogStatus): Promise<WorklogEntry[]> {
    const res = await this.request("GET", "/api/worklogs", worklogListResponseSchema, { query: { status } });
    return res.worklogs;
  }

  /** Reset one entry, or every failed / needs_attention entry without an id */
  async retryWorklogs(id?: string): Promise<WorklogEntry[]> {
    const res = await this.request("POST", "/api/worklogs/retry", retryResponseSchema, {
      body: id ? { id } : {},
    });
    return res.retried;
  }

  // -------------------------------------------------------------------------
  // Tracker credentials
  // -------------------------------------------------------------------------

  /** The daemon verifies the credentials with Jira before storing them */
  async configureJira(credentials: JiraCredentials): Promise<TrackerConfigResponse> {
    return this.request("PUT", "/api/config/jira", trackerConfigResponseSchema, { body: credentials });
  }

  // -------------------------------------------------------------------------
  // Issues
  // -------------------------------------------------------------------------

  async transitionIssue(issueKey: string, status: string): Promise<IssueTransitionResponse> {
    return this.request(
      "POST",
      `/api/issues/${encodeURIComponent(issueKey)}/transition`,
      issueTransitionResponseSchema,
      { body: { status } },
    );
  }
}
