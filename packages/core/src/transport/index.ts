/**
 * Transport
 */

export * from "./http-transport";
export * from "./retry-policy";
export * from "./transport.types";
export * from "./url";
