/**
 * Flow Builder
 * Fluent construction of flows from steps and edges
 */

import { GraphError } from "../errors";
import { BRANCH_NEXT, type Step } from "../steps/step";
import { DEFAULT_MAX_ITERATIONS, Flow } from "./flow";
import type {
  ContextProvider,
  ControlEdge,
  DataEdge,
  Variable,
} from "./types";

export interface FlowBuilderOptions {
  /** Defaults to the flow name */
  id?: string;
  description?: string;
  maxIterations?: number;
}

type StepRef = Step | string;

function stepName(ref: StepRef): string {
  return typeof ref === "string" ? ref : ref.name;
}

/**
 * @example
 * const flow = new FlowBuilder("greeting")
 *   .addSequence(start, greet)
 *   .addEdge(greet, null)
 *   .build();
 */
export class FlowBuilder {
  private readonly steps: Step[] = [];
  private readonly controlEdges: ControlEdge[] = [];
  private readonly dataEdges: DataEdge[] = [];
  private readonly variables: Variable[] = [];
  private readonly contextProviders: ContextProvider[] = [];
  private beginStep: string | null = null;
  private outputs: string[] | null = null;

  constructor(
    private readonly name: string,
    private readonly options: FlowBuilderOptions = {},
  ) {}

  /**
   * Add a step. The first step added is the begin step unless
   * `setBeginStep` says otherwise.
   */
  addStep(step: Step): this {
    const existing = this.steps.find((s) => s.name === step.name);
    if (existing && existing !== step) {
      throw new GraphError(`Duplicate step name: ${step.name}`);
    }
    if (!existing) this.steps.push(step);
    return this;
  }

  addSteps(...steps: Step[]): this {
    for (const step of steps) this.addStep(step);
    return this;
  }

  /**
   * Connect `branch` of `source` to `destination`; null ends the flow
   */
  addEdge(
    source: StepRef,
    destination: StepRef | null,
    branch: string = BRANCH_NEXT,
  ): this {
    this.include(source);
    if (destination !== null) this.include(destination);
    this.controlEdges.push({
      source: stepName(source),
      branch,
      destination: destination === null ? null : stepName(destination),
    });
    return this;
  }

  /**
   * Chain steps on their "next" branch
   */
  addSequence(...steps: StepRef[]): this {
    steps.forEach((step) => this.include(step));
    for (let i = 0; i + 1 < steps.length; i++) {
      this.addEdge(steps[i], steps[i + 1]);
    }
    return this;
  }

  /**
   * Route `output` of `source` into `input` (default: same name) of
   * `destination`
   */
  addDataEdge(
    source: StepRef,
    destination: StepRef,
    output: string,
    input: string = output,
  ): this {
    this.include(source);
    this.include(destination);
    this.dataEdges.push({
      source: stepName(source),
      output,
      destination: stepName(destination),
      input,
    });
    return this;
  }

  addVariable(variable: Variable): this {
    this.variables.push(variable);
    return this;
  }

  addContextProvider(provider: ContextProvider): this {
    this.contextProviders.push(provider);
    return this;
  }

  setBeginStep(step: StepRef): this {
    this.include(step);
    this.beginStep = stepName(step);
    return this;
  }

  /** Restrict the flow outputs to these names */
  setOutputs(...names: string[]): this {
    this.outputs = names;
    return this;
  }

  /**
   * Validate and build. Throws GraphError on any structural problem.
   */
  build(): Flow {
    const beginStep = this.beginStep ?? this.steps[0]?.name;
    if (beginStep === undefined) {
      throw new GraphError(`Flow "${this.name}" has no steps`);
    }
    return new Flow({
      id: this.options.id ?? this.name,
      name: this.name,
      description: this.options.description,
      beginStep,
      steps: this.steps,
      controlEdges: this.controlEdges,
      dataEdges: this.dataEdges,
      variables: this.variables,
      contextProviders: this.contextProviders,
      outputs: this.outputs ?? undefined,
      maxIterations: this.options.maxIterations ?? DEFAULT_MAX_ITERATIONS,
    });
  }

  private include(ref: StepRef): void {
    if (typeof ref !== "string") this.addStep(ref);
  }
}
