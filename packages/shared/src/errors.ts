/**
 * Structured error hierarchy for devpeace.
 *
 * All devpeace errors extend DevPeaceError, which adds:
 *   - `code`: Machine-readable error code (e.g., "CONFIG_NOT_FOUND")
 *   - `context`: Arbitrary metadata for debugging (logged, not shown to user)
 *   - JSON serialization via toJSON()
 *
 * Error categories:
 *   - ConfigError:     Config file issues (missing, corrupted, invalid values)
 *   - ValidationError: Invalid input (bad issue key, bad request body)
 *   - NotFoundError:   Unknown repository, orphan or worklog id
 *   - StorageError:    Durable state writes/reads that failed (persistence failure)
 *   - WatchError:      A single repository's filesystem watch broke
 *   - GatewayError:    Issue tracker (Jira) call failed, classified by `kind`
 */

/**
 * Base error class for all devpeace errors.
 * Serializable to JSON for logging and control API error responses.
 */
export class DevPeaceError extends Error {
  /** Machine-readable error code (e.g., "STORAGE_WRITE_FAILED") */
  readonly code: string;
  /** Structured debugging context — never exposed to end users */
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "DevPeaceError";
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Configuration errors. Code prefix: CONFIG_*
 *
 * @example
 *   throw new ConfigError("Config file not found", "CONFIG_NOT_FOUND", { path: "~/.devpeace/config.yaml" })
 */
export class ConfigError extends DevPeaceError {
  constructor(
    message: string,
    code: string = "CONFIG_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ConfigError";
  }
}

/**
 * Validation errors — malformed issue keys, request bodies, paths that are
 * not git repositories. Code prefix: VALIDATION_*
 */
export class ValidationError extends DevPeaceError {
  constructor(
    message: string,
    code: string = "VALIDATION_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ValidationError";
  }
}

/**
 * Lookup of an entity that does not exist. Code prefix: NOT_FOUND_*
 */
export class NotFoundError extends DevPeaceError {
  constructor(
    message: string,
    code: string = "NOT_FOUND",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "NotFoundError";
  }
}

/**
 * Durable store failures. Code prefix: STORAGE_*
 *
 * A write that throws this has NOT been applied; callers must not advance
 * in-memory state past it.
 */
export class StorageError extends DevPeaceError {
  constructor(
    message: string,
    code: string = "STORAGE_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "StorageError";
  }
}

/**
 * Watch failure scoped to one repository. Code prefix: WATCH_*
 */
export class WatchError extends DevPeaceError {
  constructor(
    message: string,
    code: string = "WATCH_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "WatchError";
  }
}

/**
 * How a tracker call failed. Drives the retry policy:
 *   - unauthorized: block all submissions until reconfigured
 *   - not_found:    issue key does not exist; needs a human
 *   - rejected:     any other 4xx; needs a human
 *   - rate_limited: retry after the server's hint (or backoff)
 *   - transient:    network error, timeout, 5xx; retry with backoff
 */
export type GatewayErrorKind =
  | "unauthorized"
  | "not_found"
  | "rejected"
  | "rate_limited"
  | "transient";

/**
 * Issue tracker errors. Code prefix: GATEWAY_*
 *
 * @example
 *   throw new GatewayError("Issue PROJ-1 not found", "not_found", { status: 404 })
 */
export class GatewayError extends DevPeaceError {
  readonly kind: GatewayErrorKind;
  /** HTTP status, when the failure came from a response */
  readonly status?: number;
  /** Server-provided retry hint (Retry-After), in milliseconds */
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    kind: GatewayErrorKind,
    opts: { status?: number; retryAfterMs?: number; context?: Record<string, unknown> } = {},
  ) {
    super(message, `GATEWAY_${kind.toUpperCase()}`, {
      ...opts.context,
      ...(opts.status !== undefined ? { status: opts.status } : {}),
    });
    this.name = "GatewayError";
    this.kind = kind;
    this.status = opts.status;
    this.retryAfterMs = opts.retryAfterMs;
  }

  /** Whether the failed call may be retried automatically */
  get retryable(): boolean {
    return this.kind === "transient" || this.kind === "rate_limited";
  }
}
