/**
 * ResumeFlow - Suspendable Flow Execution Engine
 *
 * Typed step graphs that pause for user messages, tool results or
 * confirmations, persist their exact position, and resume later.
 */

// Errors
export * from "../errors";

// Schema
export * from "../schema";

// Graph
export * from "../graph";

// Steps
export * from "../steps";

// PocketFlow adapters
export * from "../pocketflow";

// Runtime
export * from "../runtime";

// Registry
export * from "../registry";

// Compiler
export * from "../compiler";

// Testing Utilities
export * from "../testing";
