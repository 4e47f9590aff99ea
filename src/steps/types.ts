/**
 * Step Types
 * Messages, tool requests, suspensions and the context a step runs in
 */

import type { Flow } from "../graph/flow";

// ============================================================================
// Conversation Data
// ============================================================================

export type MessageRole = "user" | "agent" | "tool" | "system";

/** Tool invocation the engine asks an outside party to perform or approve */
export interface ToolRequest {
  id: string;
  name: string;
  args: Record<string, unknown>;
}

export interface Message {
  role: MessageRole;
  content: string;
  /** Present on agent messages that request tool calls */
  toolRequests?: ToolRequest[];
  /** Present on tool messages answering a request */
  toolRequestId?: string;
}

/** Caller's answer to a confirmation request */
export type ToolDecision =
  | { confirmed: true }
  | { confirmed: false; reason: string | null };

// ============================================================================
// Step Results
// ============================================================================

/** Why a step cannot complete yet */
export type Suspension =
  | { kind: "needs_user_message"; prompt: string | null }
  | { kind: "needs_tool_result"; toolRequests: ToolRequest[] }
  | { kind: "needs_tool_confirmation"; toolRequests: ToolRequest[] };

export type SuspensionKind = Suspension["kind"];

/** Outcome of one step invocation */
export type StepResult =
  | { type: "complete"; outputs: Record<string, unknown>; branch: string }
  | { type: "suspend"; suspension: Suspension };

/** Outcome of running a nested flow on behalf of a composite step */
export type FlowRunResult =
  | { type: "finished"; outputs: Record<string, unknown>; branch: string }
  | { type: "suspended"; suspension: Suspension };

/** Per-invocation scratch a step keeps across suspensions */
export type StepScratch = Record<string, unknown>;

// ============================================================================
// Variables
// ============================================================================

/** Flow-scoped variable storage as seen by a step */
export interface VariableStore {
  has(name: string): boolean;
  /** Copy of the current value */
  read(name: string): unknown;
  write(name: string, value: unknown): void;
}

// ============================================================================
// Step Context
// ============================================================================

export interface NestedRunOptions {
  /**
   * Variables of the nested flow that read and write through `store`
   * instead of the nested flow's own storage
   */
  sharedVariables?: {
    names: readonly string[];
    store: VariableStore;
  };
  /** Checked before each nested step; once true the run stops with CancelledError */
  cancelled?: () => boolean;
}

/**
 * Everything a step may touch while it runs. Threaded through every call;
 * there is no ambient conversation.
 */
export interface StepContext {
  /** Position of the step, e.g. `outer/map#2/ask` */
  readonly path: string;
  readonly conversationId: string;
  readonly variables: VariableStore;

  messages(): readonly Message[];
  appendMessage(message: Message): void;

  /** Result supplied for a tool request, if any */
  toolResult(requestId: string): { value: unknown } | undefined;
  /** Confirmation decision supplied for a tool request, if any */
  toolDecision(requestId: string): ToolDecision | undefined;
  /** Fresh request id, unique within the conversation */
  createRequestId(): string;

  /** Scratch kept for this step while it is suspended */
  getStepState(): StepScratch | undefined;
  setStepState(state: StepScratch): void;

  /**
   * Run (or resume) the nested flow stored under `key`. Nested state is
   * kept until the step completes or `discardFlow` drops it.
   */
  runFlow(
    flow: Flow,
    key: string,
    inputs: Record<string, unknown>,
    options?: NestedRunOptions,
  ): Promise<FlowRunResult>;
  discardFlow(key: string): void;

  log(message: string): void;
}
