/**
 * Graph Types
 * Edges, variables and context providers that make up a flow
 */

import type { Descriptor, DescriptorType } from "../schema/types";
import type { Message } from "../steps/types";
import type { Flow } from "./flow";

/** Transition taken when `source` completes on `branch`. A null destination ends the flow. */
export interface ControlEdge {
  readonly source: string;
  readonly branch: string;
  readonly destination: string | null;
}

/** Routes the value of `source.output` into `destination.input` */
export interface DataEdge {
  readonly source: string;
  readonly output: string;
  readonly destination: string;
  readonly input: string;
}

/** Flow-scoped mutable value */
export interface Variable {
  readonly name: string;
  readonly type: DescriptorType;
  readonly default: unknown;
  readonly description?: string;
}

// ============================================================================
// Context Providers
// ============================================================================

export interface ProviderContext {
  readonly conversationId: string;
  messages(): readonly Message[];
  /** Run a flow to completion and return its outputs */
  runFlow(flow: Flow, inputs: Record<string, unknown>): Promise<Record<string, unknown>>;
  log(message: string): void;
}

/**
 * Supplies input values by name when no data edge or flow input does.
 * Evaluated lazily, at most once per conversation.
 */
export interface ContextProvider {
  readonly id: string;
  readonly outputDescriptors: readonly Descriptor[];
  provide(context: ProviderContext): Promise<Record<string, unknown>>;
}
