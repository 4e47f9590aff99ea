/**
 * Schema Module
 * Exports descriptor types, helpers, validation and JSON schemas
 */

export * from "./types";
export * from "./definition";
export * from "./descriptors";
export * from "./json-schema";
export * from "./validator";
