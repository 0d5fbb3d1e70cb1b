/**
 * Recording
 */

export * from "./assertion-collector";
export * from "./interaction-recorder";
export * from "./recording.types";
export * from "./reporter";
export * from "./test-case-recorder";
