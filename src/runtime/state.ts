/**
 * Conversation State
 * Plain, JSON-serializable execution state of one flow, nested states
 * included
 */

import { MissingInputError, ValidationFailure } from "../errors";
import { defaultValue, hasDefault } from "../schema/descriptors";
import { validateValue } from "../schema/validator";
import type { Flow } from "../graph/flow";
import type { StepScratch, ToolRequest } from "../steps/types";

export type FlowStatus =
  | "running"
  | "suspended"
  | "interrupted"
  | "finished"
  | "failed";

/** External input a suspended step is waiting for */
export type PendingWork =
  | { kind: "user_message"; step: string; prompt: string | null }
  | { kind: "tool_result"; step: string; request: ToolRequest }
  | { kind: "tool_confirmation"; step: string; request: ToolRequest };

export interface ProducedValue {
  value: unknown;
  /** Position in the order values were produced */
  seq: number;
}

export interface ConversationState {
  flowId: string;
  status: FlowStatus;
  /** Step to run (or resume) next; null once finished */
  position: string | null;
  inputs: Record<string, unknown>;
  variables: Record<string, unknown>;
  /** step → output → value */
  produced: Record<string, Record<string, ProducedValue>>;
  sequence: number;
  visits: Record<string, number>;
  iterations: number;
  /** Step awaiting resumption, if suspended */
  suspendedStep: string | null;
  stepStates: Record<string, StepScratch>;
  pendingWork: PendingWork[];
  result: { outputs: Record<string, unknown>; branch: string } | null;
  /** Nested flow states, keyed by `<step>` or `<step>#<key>` */
  nested: Record<string, ConversationState>;
}

/**
 * Validate flow inputs and create the state of a flow that has not started.
 * Names in `provided` are satisfied by context providers and may be absent.
 */
export function createConversationState(
  flow: Flow,
  inputs: Record<string, unknown>,
  provided: ReadonlySet<string> = new Set(),
): ConversationState {
  for (const name of Object.keys(inputs)) {
    if (!flow.getInput(name)) {
      throw new ValidationFailure(
        `Flow "${flow.id}" has no input "${name}"`,
        `/${name}`,
      );
    }
  }

  const resolved: Record<string, unknown> = {};
  const missing: string[] = [];
  for (const input of flow.inputDescriptors) {
    if (Object.hasOwn(inputs, input.name) && inputs[input.name] !== undefined) {
      const result = validateValue(input, inputs[input.name]);
      if (!result.valid) {
        throw new ValidationFailure(
          `Invalid input "${input.name}" for flow "${flow.id}": ${result.errors[0].message}`,
          result.errors[0].path,
        );
      }
      resolved[input.name] = inputs[input.name];
    } else if (hasDefault(input)) {
      resolved[input.name] = defaultValue(input);
    } else if (!provided.has(input.name)) {
      missing.push(input.name);
    }
  }
  if (missing.length > 0) {
    throw new MissingInputError(null, missing);
  }

  return {
    flowId: flow.id,
    status: "running",
    position: flow.beginStep,
    inputs: resolved,
    variables: Object.fromEntries(
      flow.variables.map((v) => [v.name, structuredClone(v.default)]),
    ),
    produced: {},
    sequence: 0,
    visits: {},
    iterations: 0,
    suspendedStep: null,
    stepStates: {},
    pendingWork: [],
    result: null,
    nested: {},
  };
}
