/**
 * Conversation
 *
 * One live or paused execution of a flow. `execute()` runs until the flow
 * finishes, suspends or is interrupted; the caller supplies what a
 * suspension asked for and calls `execute()` again. A conversation can be
 * serialized at any point between calls and resumed in another process.
 */

import { ConversationStateError, SerializationError } from "../errors";
import type { Flow } from "../graph/flow";
import {
  type DebugCallbacks,
  type MemoryLimits,
  type SharedStore,
  createSharedStore,
  record,
} from "../pocketflow/shared";
import type { Message } from "../steps/types";
import { stringify } from "../steps/values";
import { runFlowState, scopeProviders, type DriveResult } from "./executor";
import { InterruptMonitor, type ExecutionInterrupt } from "./interrupts";
import {
  CONVERSATION_FORMAT,
  CONVERSATION_FORMAT_VERSION,
  assertJsonSafe,
  decodeConversation,
  encodeConversation,
  type ConversationDocument,
} from "./serializer";
import {
  createConversationState,
  type ConversationState,
  type FlowStatus,
  type PendingWork,
} from "./state";
import { statusFromSuspension, type ExecutionStatus } from "./status";
import { StateVariableStore } from "./variables";

// ============================================================================
// Options
// ============================================================================

export interface ExecutionOptions {
  /** Defaults to a generated id; ignored when deserializing */
  conversationId?: string;
  /** Echo log lines with console.log (env RESUMEFLOW_VERBOSE=1) */
  verbose?: boolean;
  /** Callback for log lines */
  onLog?: (line: string) => void;
  debugCallbacks?: DebugCallbacks;
  memoryLimits?: MemoryLimits;
  /** Checked before each root-flow step */
  interrupts?: readonly ExecutionInterrupt[];
}

/** Where `deserialize` finds the flow a document was saved from */
export type FlowSource =
  | Flow
  | ReadonlyMap<string, Flow>
  | ((flowId: string) => Flow | undefined);

/**
 * Create a conversation id
 */
export function createConversationId(): string {
  return `conv_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

function sharedOptions(options: ExecutionOptions) {
  const { onLog, debugCallbacks } = options;
  return {
    verbose: options.verbose ?? process.env.RESUMEFLOW_VERBOSE === "1",
    memoryLimits: options.memoryLimits,
    debugCallbacks: {
      ...debugCallbacks,
      onLog: (line: string) => {
        debugCallbacks?.onLog?.(line);
        onLog?.(line);
      },
    },
  };
}

function resolveFlow(source: FlowSource, flowId: string): Flow | undefined {
  if (typeof source === "function") return source(flowId);
  if ("get" in source) return source.get(flowId);
  return source.id === flowId ? source : undefined;
}

function toStatus(result: DriveResult): ExecutionStatus {
  switch (result.type) {
    case "finished":
      return {
        type: "finished",
        outputValues: result.outputs,
        terminalBranch: result.branch,
      };
    case "suspended":
      return statusFromSuspension(result.suspension);
    case "interrupted":
      return { type: "interrupted", reason: result.reason };
  }
}

// ============================================================================
// Conversation
// ============================================================================

export class Conversation {
  private lastStatus: ExecutionStatus | null;
  private executing = false;

  private constructor(
    readonly flow: Flow,
    private readonly shared: SharedStore,
    private readonly state: ConversationState,
    private readonly inputs: Record<string, unknown>,
    readonly startedAt: Date,
    status: ExecutionStatus | null,
    private readonly interrupts: readonly ExecutionInterrupt[],
  ) {
    this.lastStatus = status;
  }

  /**
   * Validate inputs and create a conversation that has not run yet
   */
  static start(
    flow: Flow,
    inputs: Record<string, unknown> = {},
    options: ExecutionOptions = {},
  ): Conversation {
    const provided = new Set(
      flow.contextProviders.flatMap((p) =>
        p.outputDescriptors.map((d) => d.name),
      ),
    );
    assertJsonSafe(inputs);
    const state = createConversationState(flow, inputs, provided);
    const shared = createSharedStore({
      conversationId: options.conversationId ?? createConversationId(),
      ...sharedOptions(options),
    });
    record(shared, `[${flow.id}] Conversation ${shared.conversationId} started`);
    return new Conversation(
      flow,
      shared,
      state,
      structuredClone(inputs),
      new Date(),
      null,
      options.interrupts ?? [],
    );
  }

  /**
   * Restore a conversation saved with `serialize()`
   */
  static deserialize(
    text: string,
    flows: FlowSource,
    options: ExecutionOptions = {},
  ): Conversation {
    const document = decodeConversation(text);
    const flow = resolveFlow(flows, document.flowId);
    if (!flow || flow.id !== document.flowId) {
      throw new SerializationError(
        `Flow "${document.flowId}" of conversation "${document.conversationId}" is not available`,
      );
    }
    if (flow.fingerprint !== document.fingerprint) {
      throw new SerializationError(
        `Flow "${flow.id}" has changed since conversation "${document.conversationId}" was saved`,
      );
    }

    const shared = createSharedStore({
      conversationId: document.conversationId,
      messages: document.messages,
      toolResults: document.toolResults,
      toolDecisions: document.toolDecisions,
      contextValues: document.contextValues,
      requestCounter: document.requestCounter,
      logs: document.logs,
      ...sharedOptions(options),
    });
    return new Conversation(
      flow,
      shared,
      document.state,
      document.inputs,
      new Date(document.startedAt),
      document.status,
      options.interrupts ?? [],
    );
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  /**
   * Run until the flow finishes, suspends or is interrupted. Step failures
   * propagate unchanged and leave the conversation failed.
   */
  async execute(): Promise<ExecutionStatus> {
    if (this.executing) {
      throw new ConversationStateError(
        `Conversation "${this.conversationId}" is already executing`,
      );
    }
    if (this.state.status === "failed") {
      throw new ConversationStateError(
        `Conversation "${this.conversationId}" has failed and cannot continue`,
      );
    }

    this.executing = true;
    try {
      const result = await runFlowState(
        this.flow,
        this.state,
        this.shared,
        {
          path: "",
          variables: new StateVariableStore(this.flow, this.state),
          providers: scopeProviders(this.flow),
        },
        new InterruptMonitor(this.interrupts),
      );
      this.lastStatus = toStatus(result);
      return this.lastStatus;
    } finally {
      this.executing = false;
    }
  }

  // ==========================================================================
  // Supplying Values
  // ==========================================================================

  /**
   * Append a user message
   */
  supplyUserMessage(text: string): void {
    this.assertOpen();
    this.shared.messages.push({ role: "user", content: text });
  }

  /**
   * Supply the result of a pending tool request
   */
  supplyToolResult(requestId: string, value: unknown): void {
    this.assertOpen();
    this.requirePending("tool_result", requestId);
    assertJsonSafe(value, `/toolResults/${requestId}`);
    this.shared.toolResults[requestId] = structuredClone(value);
    this.shared.messages.push({
      role: "tool",
      content: stringify(value),
      toolRequestId: requestId,
    });
  }

  /**
   * Approve a tool request awaiting confirmation
   */
  confirmTool(requestId: string): void {
    this.assertOpen();
    this.requirePending("tool_confirmation", requestId);
    this.shared.toolDecisions[requestId] = { confirmed: true };
  }

  /**
   * Deny a tool request awaiting confirmation
   */
  rejectTool(requestId: string, reason: string | null = null): void {
    this.assertOpen();
    this.requirePending("tool_confirmation", requestId);
    this.shared.toolDecisions[requestId] = { confirmed: false, reason };
  }

  private assertOpen(): void {
    if (this.state.status === "failed" || this.state.status === "finished") {
      throw new ConversationStateError(
        `Conversation "${this.conversationId}" is ${this.state.status}`,
      );
    }
  }

  private requirePending(kind: PendingWork["kind"], requestId: string): void {
    const pending = this.state.pendingWork.some(
      (work) =>
        work.kind === kind &&
        work.kind !== "user_message" &&
        work.request.id === requestId,
    );
    if (!pending) {
      const what =
        kind === "tool_result" ? "a tool result" : "a confirmation decision";
      throw new ConversationStateError(
        `No request "${requestId}" is waiting for ${what}`,
      );
    }
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  get conversationId(): string {
    return this.shared.conversationId;
  }

  get flowId(): string {
    return this.flow.id;
  }

  /** Status returned by the last `execute()` call */
  get status(): ExecutionStatus | null {
    return this.lastStatus;
  }

  get executionState(): FlowStatus {
    return this.state.status;
  }

  get messages(): readonly Message[] {
    return this.shared.messages;
  }

  get logs(): readonly string[] {
    return this.shared.logs;
  }

  get pendingWork(): readonly PendingWork[] {
    return this.state.pendingWork;
  }

  /** Current value of a root-flow variable */
  getVariable(name: string): unknown {
    return new StateVariableStore(this.flow, this.state).read(name);
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  toDocument(): ConversationDocument {
    return {
      format: CONVERSATION_FORMAT,
      version: CONVERSATION_FORMAT_VERSION,
      savedAt: new Date().toISOString(),
      startedAt: this.startedAt.toISOString(),
      conversationId: this.conversationId,
      flowId: this.flow.id,
      fingerprint: this.flow.fingerprint,
      inputs: this.inputs,
      messages: this.shared.messages,
      toolResults: this.shared.toolResults,
      toolDecisions: this.shared.toolDecisions,
      contextValues: this.shared.contextValues,
      requestCounter: this.shared.requestCounter,
      logs: this.shared.logs,
      status: this.lastStatus,
      state: this.state,
    };
  }

  /**
   * Save the conversation as a JSON document
   */
  serialize(): string {
    if (this.executing) {
      throw new ConversationStateError(
        `Conversation "${this.conversationId}" cannot be saved while executing`,
      );
    }
    return encodeConversation(this.toDocument());
  }
}

/**
 * Start a conversation on a flow
 */
export function startConversation(
  flow: Flow,
  inputs: Record<string, unknown> = {},
  options: ExecutionOptions = {},
): Conversation {
  return Conversation.start(flow, inputs, options);
}
