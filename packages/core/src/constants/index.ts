/**
 * Constants module for @dbplane/core.
 */

export * from "./timeouts";
export * from "./limits";
