/**
 * @devpeace/shared — the contract layer for the devpeace monorepo.
 *
 * Every other package imports from here. Contains:
 *   - Persisted record schemas (zod) and their inferred types
 *   - Repository event and daemon status types
 *   - Branch issue key extraction
 *   - ULID generation
 *   - Structured error hierarchy
 */

// Repository events, daemon status, issue metadata
export * from "./types/index.js";

// Zod schemas for persisted records and control API bodies
export * from "./schemas/index.js";

// Issue key extraction from branch names
export * from "./issue-key.js";

// ULID generation
export * from "./ulid.js";

// Structured error classes
export * from "./errors.js";
