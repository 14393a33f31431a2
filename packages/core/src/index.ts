/**
 * @devpeace/core — daemon domain logic.
 *
 * Contains:
 *   - Configuration loading and persistence
 *   - Durable state store
 *   - Git metadata reader and repository watcher
 *   - Session tracker, worklog aggregator
 *   - Issue tracker gateway (Jira) and submission queue
 *   - Status automation
 *   - The orchestrator that wires them together
 */

export * from "./config.js";
export * from "./state-store.js";

export * from "./git/repo-reader.js";
export * from "./watcher/types.js";
export { ChokidarBackend } from "./watcher/chokidar-backend.js";
export { RepositoryWatcher, globToRegExp, type RepositoryWatcherOptions } from "./watcher/repo-watcher.js";

export * from "./session-tracker.js";
export * from "./worklog-aggregator.js";

export * from "./gateway/types.js";
export { JiraGateway, parseRetryAfter, toJiraTimestamp, type JiraGatewayOptions } from "./gateway/jira-client.js";
export * from "./submission-queue.js";
export * from "./status-automation.js";

export { Orchestrator, type OrchestratorDeps } from "./orchestrator.js";
