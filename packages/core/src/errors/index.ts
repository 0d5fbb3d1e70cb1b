/**
 * Errors
 */

export * from "./errors";
