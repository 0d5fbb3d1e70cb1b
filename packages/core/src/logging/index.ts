/**
 * Logging
 */

export * from "./log-path";
export * from "./logger";
export * from "./logger.types";
