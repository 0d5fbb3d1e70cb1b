/**
 * Configuration
 */

export * from "./harness-config";
