/**
 * Barrel export for all shared type definitions.
 */

export * from "./event.js";
export * from "./issue.js";
