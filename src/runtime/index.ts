/**
 * Runtime Module
 * Conversations, execution driver and persistence
 */

export * from "./context-providers";
export * from "./conversation";
export * from "./executor";
export * from "./interrupts";
export * from "./persistence";
export * from "./serializer";
export * from "./state";
export * from "./status";
export * from "./variables";
