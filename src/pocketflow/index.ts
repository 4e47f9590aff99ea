/**
 * ResumeFlow PocketFlow Integration Layer
 *
 * Step invocations and map iterations run on PocketFlow primitives:
 * 1. Node - one step invocation with retry logic
 * 2. BatchNode - sequential map iterations
 * 3. ParallelBatchNode - concurrent map iterations
 *
 * Plus the Shared Store holding conversation-wide execution state.
 */

export * from "./nodes";
export * from "./shared";
