/**
 * @tunnelkeeper/shared
 *
 * Record schemas, domain types, errors, logging and platform helpers used by
 * the host library and the CLI.
 */

export * from "./platform.js";
export * from "./schema.js";
export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
