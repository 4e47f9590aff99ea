/**
 * ResumeFlow Shared Store
 *
 * PocketFlow passes a "shared" object through prep → exec → post. Here it is
 * the conversation-wide part of the execution state: messages, supplied tool
 * results and decisions, cached context values and logs. One store serves
 * the root flow and every nested flow of a conversation.
 */

import type { Message, Suspension, ToolDecision } from "../steps/types";

/**
 * Debug callbacks for tracking execution
 */
export interface DebugCallbacks {
  onStepStart?: (path: string, inputs: Record<string, unknown>) => void;
  onStepComplete?: (
    path: string,
    branch: string,
    outputs: Record<string, unknown>,
  ) => void;
  onStepSuspend?: (path: string, suspension: Suspension) => void;
  onStepError?: (path: string, error: unknown) => void;
  onLog?: (line: string) => void;
}

/**
 * Memory limits to prevent unbounded growth
 */
export interface MemoryLimits {
  maxLogs?: number;
}

/**
 * The shared store - PocketFlow's communication pattern
 * Passed to every node's prep/exec/post methods
 */
export interface SharedStore {
  conversationId: string;
  /** Conversation message history */
  messages: Message[];
  /** Results supplied for tool requests, by request id */
  toolResults: Record<string, unknown>;
  /** Confirmation decisions, by request id */
  toolDecisions: Record<string, ToolDecision>;
  /** Evaluated context providers, by `<flow id>/<provider id>` */
  contextValues: Record<string, Record<string, unknown>>;
  /** Provider evaluations in progress; never persisted */
  pendingContext: Map<string, Promise<Record<string, unknown>>>;
  /** Tool requests issued so far */
  requestCounter: number;
  /** Execution logs */
  logs: string[];
  /** Echo log lines to the console */
  verbose: boolean;
  debugCallbacks?: DebugCallbacks;
  memoryLimits?: MemoryLimits;
}

/**
 * Default memory limits
 */
const DEFAULT_LIMITS: Required<MemoryLimits> = {
  maxLogs: 1000,
};

export interface SharedStoreOptions {
  conversationId: string;
  messages?: Message[];
  toolResults?: Record<string, unknown>;
  toolDecisions?: Record<string, ToolDecision>;
  contextValues?: Record<string, Record<string, unknown>>;
  requestCounter?: number;
  logs?: string[];
  verbose?: boolean;
  debugCallbacks?: DebugCallbacks;
  memoryLimits?: MemoryLimits;
}

/**
 * Create a new shared store
 */
export function createSharedStore(options: SharedStoreOptions): SharedStore {
  return {
    conversationId: options.conversationId,
    messages: options.messages ?? [],
    toolResults: options.toolResults ?? {},
    toolDecisions: options.toolDecisions ?? {},
    contextValues: options.contextValues ?? {},
    pendingContext: new Map(),
    requestCounter: options.requestCounter ?? 0,
    logs: options.logs ?? [],
    verbose: options.verbose ?? false,
    debugCallbacks: options.debugCallbacks,
    memoryLimits: { ...DEFAULT_LIMITS, ...options.memoryLimits },
  };
}

/**
 * Enforce memory limits on a shared store
 */
export function enforceMemoryLimits(store: SharedStore): void {
  const limits = { ...DEFAULT_LIMITS, ...store.memoryLimits };

  if (store.logs.length > limits.maxLogs) {
    const excess = store.logs.length - limits.maxLogs;
    store.logs.splice(0, excess);
    store.logs.unshift(`[SYSTEM] Log truncated: removed ${excess} old entries`);
  }
}

/**
 * Record a log line
 */
export function record(store: SharedStore, line: string): void {
  store.logs.push(line);
  store.debugCallbacks?.onLog?.(line);
  if (store.verbose) console.log(line);
  enforceMemoryLimits(store);
}

/**
 * Helper to log a message for a step path
 */
export function log(store: SharedStore, path: string, message: string): void {
  record(store, `[${path}] ${message}`);
}
