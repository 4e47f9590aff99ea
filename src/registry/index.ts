/**
 * Registry Module
 */

export * from "./registry";
