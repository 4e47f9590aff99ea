/**
 * Steps Module
 * Step contract and the built-in step catalogue
 */

export * from "./types";
export * from "./step";
export * from "./values";

// Core steps
export * from "./core/start";
export * from "./core/messages";
export * from "./core/variables";
export * from "./core/function";
export * from "./core/tool";

// Control steps
export * from "./control/branching";
export * from "./control/flow";
export * from "./control/map";
export * from "./control/retry";
export * from "./control/catch-exception";
