/**
 * Flow
 *
 * Immutable, validated graph of steps. Steps are addressed by name; control
 * edges decide which step runs next, data edges decide where inputs come
 * from. Construction fails with a GraphError listing every problem found.
 */

import { createHash } from "crypto";
import { GraphError } from "../errors";
import { describeType } from "../schema/descriptors";
import type {
  Descriptor,
  ValidationError,
  ValidationResult,
} from "../schema/types";
import type { Step } from "../steps/step";
import type { ContextProvider, ControlEdge, DataEdge, Variable } from "./types";
import { analyzeFlow, type FlowConfig, type Transitions } from "./validator";

/** Default cap on step executions in one flow execution */
export const DEFAULT_MAX_ITERATIONS = 10_000;

export class Flow {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly beginStep: string;
  readonly steps: ReadonlyMap<string, Step>;
  readonly controlEdges: readonly ControlEdge[];
  readonly dataEdges: readonly DataEdge[];
  readonly variables: readonly Variable[];
  readonly contextProviders: readonly ContextProvider[];
  readonly maxIterations: number;

  /** Values the flow needs to start */
  readonly inputDescriptors: readonly Descriptor[];
  /** Values the flow guarantees when it finishes */
  readonly outputDescriptors: readonly Descriptor[];
  /** Branches a finished flow may report */
  readonly outgoingBranches: readonly string[];
  readonly warnings: readonly ValidationError[];
  /** Hash of the flow structure, used to match saved conversations */
  readonly fingerprint: string;

  private readonly config: FlowConfig;
  private readonly transitions: Transitions;
  private readonly incoming: Map<string, DataEdge[]>;

  constructor(config: FlowConfig) {
    const analysis = analyzeFlow(config);
    if (!analysis.validation.valid) {
      throw new GraphError(analysis.validation.errors);
    }

    this.config = config;
    this.id = config.id;
    this.name = config.name;
    this.description = config.description;
    this.beginStep = config.beginStep;
    this.steps = new Map(config.steps.map((step) => [step.name, step]));
    this.controlEdges = Object.freeze([...config.controlEdges]);
    this.dataEdges = Object.freeze([...config.dataEdges]);
    this.variables = Object.freeze([...config.variables]);
    this.contextProviders = Object.freeze([...config.contextProviders]);
    this.maxIterations = config.maxIterations;

    this.inputDescriptors = Object.freeze(analysis.inputDescriptors);
    this.outputDescriptors = Object.freeze(analysis.outputDescriptors);
    this.outgoingBranches = Object.freeze(analysis.outgoingBranches);
    this.warnings = Object.freeze(analysis.validation.warnings);
    this.transitions = analysis.transitions;

    this.incoming = new Map();
    for (const edge of config.dataEdges) {
      const key = `${edge.destination}.${edge.input}`;
      const edges = this.incoming.get(key) ?? [];
      edges.push(edge);
      this.incoming.set(key, edges);
    }

    this.fingerprint = fingerprintFlow(config);
  }

  /**
   * Validate a configuration without building a flow
   */
  static validate(config: FlowConfig): ValidationResult {
    return analyzeFlow(config).validation;
  }

  /**
   * Re-run validation; throws GraphError when the flow is not well formed
   */
  validate(): ValidationResult {
    const result = Flow.validate(this.config);
    if (!result.valid) throw new GraphError(result.errors);
    return result;
  }

  getStep(name: string): Step {
    const step = this.steps.get(name);
    if (!step) {
      throw new GraphError(`Flow "${this.id}" has no step "${name}"`);
    }
    return step;
  }

  /**
   * Destination of `branch` out of `stepName`: a step name, null for the end
   * of the flow, undefined when no edge exists
   */
  nextStep(stepName: string, branch: string): string | null | undefined {
    return this.transitions.get(stepName)?.get(branch);
  }

  /** Data edges feeding an input of a step */
  incomingDataEdges(stepName: string, input: string): readonly DataEdge[] {
    return this.incoming.get(`${stepName}.${input}`) ?? [];
  }

  getVariable(name: string): Variable | undefined {
    return this.variables.find((v) => v.name === name);
  }

  getInput(name: string): Descriptor | undefined {
    return this.inputDescriptors.find((d) => d.name === name);
  }

  getOutput(name: string): Descriptor | undefined {
    return this.outputDescriptors.find((d) => d.name === name);
  }
}

// ============================================================================
// Fingerprint
// ============================================================================

function describeDescriptor(desc: Descriptor): string {
  const fallback =
    desc.default === undefined ? "" : `=${JSON.stringify(desc.default)}`;
  return `${desc.name}:${describeType(desc.type)}${fallback}`;
}

/**
 * SHA-256 over the flow's structure. Step order, edge order and descriptions
 * do not change it.
 */
export function fingerprintFlow(config: FlowConfig): string {
  const canonical = {
    id: config.id,
    beginStep: config.beginStep,
    maxIterations: config.maxIterations,
    steps: [...config.steps]
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
      .map((step) => ({
        name: step.name,
        kind: step.kind,
        inputs: step.inputDescriptors.map(describeDescriptor),
        outputs: step.outputDescriptors.map(describeDescriptor),
        branches: [...step.branches],
        config: step.describe(),
        subflows: step.subflows().map((flow) => flow.fingerprint),
      })),
    controlEdges: config.controlEdges
      .map((e) => `${e.source}:${e.branch}->${e.destination ?? "<end>"}`)
      .sort(),
    dataEdges: config.dataEdges
      .map((e) => `${e.source}.${e.output}->${e.destination}.${e.input}`)
      .sort(),
    variables: config.variables
      .map((v) => `${v.name}:${describeType(v.type)}=${JSON.stringify(v.default)}`)
      .sort(),
    contextProviders: config.contextProviders
      .map((p) => `${p.id}(${p.outputDescriptors.map(describeDescriptor).join(",")})`)
      .sort(),
    outputs: config.outputs ? [...config.outputs] : null,
  };
  return createHash("sha256").update(JSON.stringify(canonical)).digest("hex");
}
