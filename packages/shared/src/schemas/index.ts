/**
 * Barrel export for all Zod schemas.
 */

export * from "./common.js";
export * from "./repository.js";
export * from "./session.js";
export * from "./worklog.js";
export * from "./orphan.js";
export * from "./control.js";
export * from "./api.js";
