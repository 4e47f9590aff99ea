/**
 * Flow Definition Types
 * JSON shape of a flow that the compiler turns into a Flow
 */

import type { Descriptor, DescriptorType } from "./types";

/** Step kinds a JSON definition may declare */
export type StepDefinitionKind =
  | "start"
  | "end"
  | "output"
  | "input"
  | "branching"
  | "variable_read"
  | "variable_write"
  | "function"
  | "tool"
  | "flow"
  | "map"
  | "retry"
  | "catch_exception";

/** Runtime configuration shared by every step kind */
export interface StepRuntimeDefinition {
  /** Attempts before a failure propagates (default 1) */
  maxRetries?: number;
  /** Delay between attempts in milliseconds */
  retryDelay?: number;
  /** Cap on how often the step may run in one flow execution */
  maxVisits?: number;
}

/** Client-side tool declared inline in a definition */
export interface ClientToolDefinition {
  name: string;
  description?: string;
  parameters: Descriptor[];
  output: Descriptor;
}

/**
 * One step. Which fields apply depends on `kind`; the compiler reports the
 * ones a kind needs but lacks.
 */
export interface StepDefinition {
  kind: StepDefinitionKind;
  name: string;
  description?: string;
  runtime?: StepRuntimeDefinition;

  /** start: flow inputs. function: input descriptors (default from metadata) */
  inputs?: Descriptor[];
  /** function: output descriptors (default from metadata) */
  outputs?: Descriptor[];
  /** function: declared branches (default from metadata, else "next") */
  branches?: string[];

  /** end */
  branchName?: string;

  /** output */
  template?: string;
  outputName?: string;

  /** input */
  prompt?: string;

  /** branching */
  mapping?: Record<string, string>;
  inputName?: string;

  /** variable_read / variable_write */
  variable?: string;
  operation?: "overwrite" | "insert" | "merge";

  /** function */
  functionId?: string;

  /** tool: server tool looked up in the registry */
  toolId?: string;
  /** tool: client tool executed outside the engine */
  clientTool?: ClientToolDefinition;
  requiresConfirmation?: boolean;
  raiseOnRejection?: boolean;

  /** flow / map / retry / catch_exception */
  flow?: FlowDefinition;

  /** map */
  unpackInput?: Record<string, string>;
  collect?: string[];
  parallel?: boolean;
  sharedVariables?: string[];
  iteratedType?: DescriptorType;

  /** retry */
  successCondition?: string;
  maxNumTrials?: number;

  /** catch_exception */
  exceptOn?: Record<string, string>;
  catchAllExceptions?: boolean;
}

export interface ControlEdgeDefinition {
  from: string;
  /** Destination step, or null to end the flow on this branch */
  to: string | null;
  /** Defaults to "next" */
  branch?: string;
}

export interface DataEdgeDefinition {
  from: string;
  output: string;
  to: string;
  /** Defaults to `output` */
  input?: string;
}

export interface VariableDefinition {
  name: string;
  type: DescriptorType;
  default?: unknown;
  description?: string;
}

export interface ContextProviderDefinition {
  kind: "constant" | "message_window";
  id: string;
  /** constant */
  output?: Descriptor;
  value?: unknown;
  /** message_window */
  outputName?: string;
  windowSize?: number;
}

/** Complete flow definition */
export interface FlowDefinition {
  $schema?: string;
  id: string;
  name: string;
  version?: string;
  description?: string;
  /** Defaults to the first step */
  beginStep?: string;
  maxIterations?: number;
  steps: StepDefinition[];
  controlEdges: ControlEdgeDefinition[];
  dataEdges?: DataEdgeDefinition[];
  variables?: VariableDefinition[];
  contextProviders?: ContextProviderDefinition[];
  /** Restrict the flow outputs to these names */
  outputs?: string[];
}
