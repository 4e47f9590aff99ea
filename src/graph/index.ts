/**
 * Graph Module
 * Flows, their builder and structural validation
 */

export * from "./types";
export * from "./variable";
export * from "./validator";
export * from "./flow";
export * from "./builder";
