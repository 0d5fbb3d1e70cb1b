/**
 * Validation
 */

export * from "./response-validator";
export * from "./schema-engine";
export * from "./schema-loader";
export * from "./value-kind";
