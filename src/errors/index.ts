/**
 * Errors Module
 */

export * from "./errors";
