/**
 * Jira REST v2 client.
 *
 * Endpoints used:
 *   POST /rest/api/2/issue/{key}/worklog      — add time spent
 *   POST /rest/api/2/issue/{key}/comment      — add a comment
 *   GET  /rest/api/2/issue/{key}              — verify a key, read status
 *   GET  /rest/api/2/myself                   — verify credentials
 *   GET/POST /rest/api/2/issue/{key}/transitions
 *
 * Features:
 *   - Basic auth from the configured user + API token
 *   - Per-request timeout, combined with the caller's abort signal
 *   - Responses validated with zod before use
 *   - Every failure classified into a GatewayError kind:
 *       401/403 unauthorized, 404 not_found, 429 rate_limited,
 *       408/5xx/network/timeout transient, other 4xx rejected
 */

import { z } from "zod";
import { GatewayError, type IssueMetadata, type WorklogEntry } from "@devpeace/shared";
import type { CommentAck, IssueTrackerGateway, TrackerIdentity, WorklogAck } from "./types.js";

/** Default timeout for tracker requests (ms) */
const DEFAULT_TIMEOUT = 15_000;

export interface JiraGatewayOptions {
  /** e.g. https://example.atlassian.net */
  url: string;
  user: string;
  token: string;
  timeout?: number;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

const jiraId = z.union([z.string(), z.number()]).transform(String);

const createdSchema = z.object({ id: jiraId });

const issueSchema = z.object({
  key: z.string(),
  fields: z.object({
    summary: z.string().default(""),
    status: z.object({ name: z.string() }),
    project: z.object({ key: z.string() }),
    issuetype: z.object({ name: z.string() }).nullish(),
    assignee: z.object({ displayName: z.string() }).nullish(),
  }),
});

const myselfSchema = z.object({
  displayName: z.string().default(""),
  accountId: z.string().optional(),
  name: z.string().optional(),
  emailAddress: z.string().optional(),
});

const transitionsSchema = z.object({
  transitions: z.array(
    z.object({
      id: jiraId,
      name: z.string(),
      to: z.object({ name: z.string() }).optional(),
    }),
  ),
});

const errorBodySchema = z.object({
  errorMessages: z.array(z.string()).optional(),
  errors: z.record(z.string()).optional(),
});

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class JiraGateway implements IssueTrackerGateway {
  private readonly baseUrl: string;
  private readonly authHeader: string;
  private readonly timeout: number;
  private readonly now: () => Date;

  constructor(opts: JiraGatewayOptions) {
    this.baseUrl = opts.url.replace(/\/+$/, "");
    this.authHeader = `Basic ${Buffer.from(`${opts.user}:${opts.token}`).toString("base64")}`;
    this.timeout = opts.timeout ?? DEFAULT_TIMEOUT;
    this.now = opts.now ?? (() => new Date());
  }

  async submit(entry: WorklogEntry, signal?: AbortSignal): Promise<WorklogAck> {
    const body = await this.request(
      "POST",
      `/rest/api/2/issue/${encodeURIComponent(entry.issue_key)}/worklog`,
      createdSchema,
      {
        body: {
          timeSpentSeconds: entry.duration_seconds,
          started: toJiraTimestamp(entry.started_at),
          comment: entry.comment,
        },
        signal,
      },
    );
    return { worklog_id: body.id };
  }

  async postComment(issueKey: string, text: string, signal?: AbortSignal): Promise<CommentAck> {
    const body = await this.request(
      "POST",
      `/rest/api/2/issue/${encodeURIComponent(issueKey)}/comment`,
      createdSchema,
      { body: { body: text }, signal },
    );
    return { comment_id: body.id };
  }

  async resolveIssue(issueKey: string, signal?: AbortSignal): Promise<IssueMetadata> {
    const issue = await this.request(
      "GET",
      `/rest/api/2/issue/${encodeURIComponent(issueKey)}`,
      issueSchema,
      { query: { fields: "summary,status,project,issuetype,assignee" }, signal },
    );
    return {
      key: issue.key,
      summary: issue.fields.summary,
      status: issue.fields.status.name,
      project: issue.fields.project.key,
      issue_type: issue.fields.issuetype?.name ?? "",
      assignee: issue.fields.assignee?.displayName ?? null,
    };
  }

  async verifyCredentials(signal?: AbortSignal): Promise<TrackerIdentity> {
    const me = await this.request("GET", "/rest/api/2/myself", myselfSchema, { signal });
    return {
      display_name: me.displayName,
      account: me.accountId ?? me.name ?? me.emailAddress ?? "",
    };
  }

  async transitionIssue(issueKey: string, statusName: string, signal?: AbortSignal): Promise<void> {
    const path = `/rest/api/2/issue/${encodeURIComponent(issueKey)}/transitions`;
    const { transitions } = await this.request("GET", path, transitionsSchema, { signal });

    const wanted = statusName.toLowerCase();
    const transition =
      transitions.find((t) => t.to?.name.toLowerCase() === wanted) ??
      transitions.find((t) => t.name.toLowerCase() === wanted);

    if (!transition) {
      throw new GatewayError(
        `No transition to "${statusName}" available for ${issueKey}`,
        "rejected",
        { context: { issueKey, statusName, available: transitions.map((t) => t.name) } },
      );
    }

    await this.request("POST", path, z.unknown(), {
      body: { transition: { id: transition.id } },
      signal,
    });
  }

  // -------------------------------------------------------------------------
  // Private: HTTP request helper
  // -------------------------------------------------------------------------

  /**
   * Execute an HTTP request against Jira and validate the response body.
   * Empty bodies (204) are validated as `undefined`.
   *
   * @throws GatewayError classified by status or network failure
   */
  private async request<T>(
    method: "GET" | "POST",
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: {
      query?: Record<string, string>;
      body?: unknown;
      signal?: AbortSignal;
    } = {},
  ): Promise<T> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = {
      Authorization: this.authHeader,
      Accept: "application/json",
    };

    const timeoutSignal = AbortSignal.timeout(this.timeout);
    const init: RequestInit = {
      method,
      headers,
      signal: options.signal ? AbortSignal.any([options.signal, timeoutSignal]) : timeoutSignal,
    };

    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(options.body);
    }

    let response: Response;
    try {
      response = await fetch(url.toString(), init);
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err));
      const aborted = options.signal?.aborted === true;
      throw new GatewayError(
        aborted
          ? `${method} ${path} aborted`
          : `Failed to ${method} ${path}: ${cause.message}`,
        "transient",
        { context: { method, path, aborted } },
      );
    }

    if (!response.ok) {
      throw await this.toGatewayError(method, path, response);
    }

    let json: unknown;
    if (response.status !== 204) {
      const text = await response.text();
      try {
        json = text ? JSON.parse(text) : undefined;
      } catch {
        throw new GatewayError(
          `Failed to parse response from ${method} ${path} as JSON`,
          "transient",
          { status: response.status },
        );
      }
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      throw new GatewayError(
        `Unexpected response shape from ${method} ${path}`,
        "transient",
        { status: response.status, context: { issues: result.error.issues } },
      );
    }
    return result.data;
  }

  private async toGatewayError(method: string, path: string, response: Response): Promise<GatewayError> {
    const status = response.status;
    const detail = await readErrorDetail(response);
    const message = detail
      ? `${method} ${path} failed (HTTP ${status}): ${detail}`
      : `${method} ${path} failed (HTTP ${status})`;
    const context = { method, path };

    if (status === 401 || status === 403) {
      return new GatewayError(message, "unauthorized", { status, context });
    }
    if (status === 404) {
      return new GatewayError(message, "not_found", { status, context });
    }
    if (status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"), this.now());
      return new GatewayError(message, "rate_limited", { status, retryAfterMs, context });
    }
    if (status === 408 || status >= 500) {
      return new GatewayError(message, "transient", { status, context });
    }
    return new GatewayError(message, "rejected", { status, context });
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Jira wants `2026-03-02T10:00:00.000+0000`, not a trailing Z */
export function toJiraTimestamp(iso: string): string {
  return new Date(iso).toISOString().replace(/Z$/, "+0000");
}

/**
 * Retry-After is either delta-seconds or an HTTP date.
 * @returns milliseconds to wait, or undefined if absent/unparseable
 */
export function parseRetryAfter(value: string | null, now: Date): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now.getTime());
}

async function readErrorDetail(response: Response): Promise<string> {
  const text = await response.text().catch(() => "");
  if (!text) return "";
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      const parts = [
        ...(parsed.data.errorMessages ?? []),
        ...Object.entries(parsed.data.errors ?? {}).map(([field, msg]) => `${field}: ${msg}`),
      ];
      if (parts.length > 0) return parts.join("; ");
    }
  } catch {
    // Not JSON; fall through to the raw text
  }
  return text.slice(0, 200);
}
