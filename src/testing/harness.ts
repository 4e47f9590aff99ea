/**
 * Testing Harness
 * Utilities for driving ResumeFlow conversations in tests
 */

import { errorMessage } from "../errors";
import type { Flow } from "../graph/flow";
import type { DebugCallbacks } from "../pocketflow/shared";
import {
  Conversation,
  type ExecutionOptions,
  type FlowSource,
} from "../runtime/conversation";
import type { ExecutionStatus } from "../runtime/status";
import type { ToolRequest } from "../steps/types";
import { isRecord } from "../steps/values";

// ============================================================================
// Deep Equality Helper
// ============================================================================

/**
 * Dependency-free deep equality comparison.
 * Handles primitives, plain objects, arrays, Date, null and undefined.
 * Falls back to strict equality for other types.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;

  if (a == null || b == null) return a === b;

  if (typeof a !== typeof b) return false;

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  if (a instanceof Date || b instanceof Date) return false;

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    return a.every((item, i) => deepEqual(item, b[i]));
  }
  if (Array.isArray(a) || Array.isArray(b)) return false;

  if (isRecord(a) && isRecord(b)) {
    const aKeys = Object.keys(a);
    const bKeys = Object.keys(b);
    if (aKeys.length !== bKeys.length) return false;
    return aKeys.every(
      (key) => Object.hasOwn(b, key) && deepEqual(a[key], b[key]),
    );
  }

  return false;
}

// ============================================================================
// Scripted Conversations
// ============================================================================

/** Confirmation answer: true approves; false or `{ reject }` rejects */
export type ScriptedDecision = boolean | { reject: string | null };

/**
 * Answers a scripted run gives to suspensions. User messages are consumed in
 * order; tool results and decisions are looked up by tool name.
 */
export interface Script {
  userMessages?: string[];
  toolResults?: Record<string, unknown | ((request: ToolRequest) => unknown)>;
  decisions?: Record<string, ScriptedDecision>;
}

export interface ScriptedRunOptions {
  /** Give up after this many `execute()` calls (default 50) */
  maxRounds?: number;
  /**
   * Serialize and deserialize the conversation between rounds against these
   * flows
   */
  serializeBetweenRounds?: FlowSource;
  /** Options used when deserializing */
  executionOptions?: ExecutionOptions;
}

export interface ScriptedRun {
  /** Conversation after the last round (a new instance when serializing) */
  conversation: Conversation;
  status: ExecutionStatus;
  /** Every status returned, in order */
  statuses: ExecutionStatus[];
  rounds: number;
}

function answerToolResult(script: Script, request: ToolRequest): unknown {
  const results = script.toolResults ?? {};
  if (!Object.hasOwn(results, request.name)) {
    throw new Error(`Script has no result for tool "${request.name}"`);
  }
  const answer = results[request.name];
  return typeof answer === "function" ? answer(request) : answer;
}

function answerDecision(
  conversation: Conversation,
  script: Script,
  request: ToolRequest,
): void {
  const decisions = script.decisions ?? {};
  if (!Object.hasOwn(decisions, request.name)) {
    throw new Error(`Script has no decision for tool "${request.name}"`);
  }
  const decision = decisions[request.name];
  if (decision === true) conversation.confirmTool(request.id);
  else if (decision === false) conversation.rejectTool(request.id);
  else conversation.rejectTool(request.id, decision.reject);
}

/**
 * Execute a conversation, answering each suspension from the script, until
 * it finishes or is interrupted
 */
export async function runScripted(
  conversation: Conversation,
  script: Script = {},
  options: ScriptedRunOptions = {},
): Promise<ScriptedRun> {
  const { maxRounds = 50 } = options;
  const userMessages = [...(script.userMessages ?? [])];
  const statuses: ExecutionStatus[] = [];
  let current = conversation;

  for (let round = 1; round <= maxRounds; round++) {
    const status = await current.execute();
    statuses.push(status);

    switch (status.type) {
      case "finished":
      case "interrupted":
        return { conversation: current, status, statuses, rounds: round };
      case "needs_external_input": {
        const message = userMessages.shift();
        if (message === undefined) {
          throw new Error(
            `Script ran out of user messages (prompt: ${status.prompt ?? "none"})`,
          );
        }
        current.supplyUserMessage(message);
        break;
      }
      case "needs_tool_result":
        for (const request of status.pendingToolCalls) {
          current.supplyToolResult(request.id, answerToolResult(script, request));
        }
        break;
      case "needs_confirmation":
        for (const request of status.pendingToolCalls) {
          answerDecision(current, script, request);
        }
        break;
    }

    if (options.serializeBetweenRounds) {
      current = Conversation.deserialize(
        current.serialize(),
        options.serializeBetweenRounds,
        options.executionOptions,
      );
    }
  }

  throw new Error(`Conversation did not finish within ${maxRounds} rounds`);
}

// ============================================================================
// Test Options & Result
// ============================================================================

export interface TestFlowOptions extends ExecutionOptions {
  inputs?: Record<string, unknown>;
  script?: Script;
  /** Round-trip the conversation through serialization between rounds */
  serializeBetweenRounds?: boolean;
  /** Expected flow outputs (only the listed names are compared) */
  expectedOutputs?: Record<string, unknown>;
  expectedBranch?: string;
  /** Expected error message (partial match) */
  expectedError?: string;
  /** Timeout in milliseconds */
  timeout?: number;
}

export interface TestResult {
  /** Whether the test passed */
  passed: boolean;
  /** Test execution duration */
  duration: number;
  /** Collected logs */
  logs: string[];
  /** Final flow outputs */
  outputs: Record<string, unknown>;
  branch?: string;
  /** Last status, if execution got that far */
  status?: ExecutionStatus;
  rounds: number;
  /** Error if any */
  error?: string;
  /** Assertion failures */
  failures: string[];
}

// ============================================================================
// testFlow
// ============================================================================

/**
 * Run a flow against a script and check the outcome.
 * Uses a cancellable timeout to avoid dangling timers after completion.
 */
export async function testFlow(
  flow: Flow,
  options: TestFlowOptions = {},
): Promise<TestResult> {
  const {
    inputs,
    script,
    serializeBetweenRounds,
    expectedOutputs,
    expectedBranch,
    expectedError,
    timeout = 30000,
    ...execOptions
  } = options;

  const failures: string[] = [];
  const logs: string[] = [];
  const startTime = performance.now();
  const executionOptions: ExecutionOptions = {
    ...execOptions,
    onLog: (line) => {
      logs.push(line);
      execOptions.onLog?.(line);
    },
  };

  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => reject(new Error("Test timeout")), timeout);
    });

    const conversation = Conversation.start(flow, inputs, executionOptions);
    const run = await Promise.race([
      runScripted(conversation, script, {
        serializeBetweenRounds: serializeBetweenRounds ? flow : undefined,
        executionOptions,
      }),
      timeoutPromise,
    ]);

    const duration = performance.now() - startTime;
    const { status } = run;
    const outputs = status.type === "finished" ? status.outputValues : {};
    const branch = status.type === "finished" ? status.terminalBranch : undefined;

    if (status.type !== "finished") {
      failures.push(`Expected the flow to finish, got status "${status.type}"`);
    }
    if (expectedError) {
      failures.push(`Expected error containing "${expectedError}", got none`);
    }
    if (expectedBranch !== undefined && branch !== expectedBranch) {
      failures.push(`Expected branch "${expectedBranch}", got "${branch}"`);
    }
    if (expectedOutputs) {
      for (const [key, expectedValue] of Object.entries(expectedOutputs)) {
        const actualValue = outputs[key];
        if (!deepEqual(actualValue, expectedValue)) {
          failures.push(
            `Expected outputs.${key}=${JSON.stringify(expectedValue)}, got ${JSON.stringify(actualValue)}`,
          );
        }
      }
    }

    return {
      passed: failures.length === 0,
      duration,
      logs,
      outputs,
      branch,
      status,
      rounds: run.rounds,
      failures,
    };
  } catch (e) {
    const duration = performance.now() - startTime;
    const error = errorMessage(e);
    const expected = expectedError !== undefined && error.includes(expectedError);

    return {
      passed: expected,
      duration,
      logs,
      outputs: {},
      rounds: 0,
      error,
      failures: expected ? [] : [`Unexpected error: ${error}`],
    };
  } finally {
    if (timeoutId !== undefined) clearTimeout(timeoutId);
  }
}

// ============================================================================
// StepSpy
// ============================================================================

/** Shape of a single recorded spy call */
export interface SpyCall {
  path: string;
  inputs: Record<string, unknown>;
  outcome: "completed" | "suspended" | "failed";
  branch?: string;
  outputs?: Record<string, unknown>;
  timestampStart: number;
  timestampEnd: number;
}

/**
 * Spy on step invocations through debug callbacks
 */
export class StepSpy {
  private calls: SpyCall[] = [];
  private pending = new Map<
    string,
    { inputs: Record<string, unknown>; timestampStart: number }
  >();

  /**
   * Callbacks to pass as `ExecutionOptions.debugCallbacks`
   */
  getCallbacks(): DebugCallbacks {
    const finish = (path: string, call: Omit<SpyCall, "path" | "inputs" | "timestampStart" | "timestampEnd">) => {
      const started = this.pending.get(path);
      this.pending.delete(path);
      this.calls.push({
        path,
        inputs: started?.inputs ?? {},
        ...call,
        timestampStart: started?.timestampStart ?? performance.now(),
        timestampEnd: performance.now(),
      });
    };

    return {
      onStepStart: (path, inputs) => {
        this.pending.set(path, {
          inputs: { ...inputs },
          timestampStart: performance.now(),
        });
      },
      onStepComplete: (path, branch, outputs) =>
        finish(path, { outcome: "completed", branch, outputs: { ...outputs } }),
      onStepSuspend: (path) => finish(path, { outcome: "suspended" }),
      onStepError: (path) => finish(path, { outcome: "failed" }),
    };
  }

  getCalls(): SpyCall[] {
    return [...this.calls];
  }

  getCallsForStep(path: string): SpyCall[] {
    return this.calls.filter((call) => call.path === path);
  }

  wasStepCalled(path: string): boolean {
    return this.calls.some((call) => call.path === path);
  }

  reset(): void {
    this.calls = [];
    this.pending.clear();
  }
}

// ============================================================================
// Assertion Helpers
// ============================================================================

/**
 * Assert helper for cleaner test code
 */
export function assert(condition: boolean, message: string): void {
  if (!condition) {
    throw new Error(`Assertion failed: ${message}`);
  }
}

/**
 * Deep equality check using `deepEqual`
 */
export function assertEqual<T>(actual: T, expected: T, message?: string): void {
  if (!deepEqual(actual, expected)) {
    const msg =
      message ??
      `Expected ${JSON.stringify(expected)}, got ${JSON.stringify(actual)}`;
    throw new Error(`Assertion failed: ${msg}`);
  }
}
