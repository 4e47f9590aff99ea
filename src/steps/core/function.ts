/**
 * Function Step
 * Runs a plain function over the step inputs
 */

import { ValidationFailure } from "../../errors";
import type { Descriptor, JsonValue } from "../../schema/types";
import { Step, complete, type StepRuntime } from "../step";
import type { StepContext, StepResult } from "../types";

/** What a step function returns */
export interface FunctionResult {
  outputs?: Record<string, unknown>;
  /** Required when the step declares more than one branch */
  branch?: string;
}

export type StepFunction = (
  inputs: Record<string, unknown>,
  context: StepContext,
) => FunctionResult | Promise<FunctionResult>;

export interface FunctionStepConfig {
  name: string;
  run: StepFunction;
  inputs?: readonly Descriptor[];
  outputs?: readonly Descriptor[];
  branches?: readonly string[];
  /** Registry id, part of the flow fingerprint */
  functionId?: string;
  runtime?: StepRuntime;
}

export class FunctionStep extends Step {
  readonly kind = "function";
  readonly functionId: string | null;
  private readonly run: StepFunction;

  constructor(config: FunctionStepConfig) {
    super(config);
    this.run = config.run;
    this.functionId = config.functionId ?? null;
  }

  async invoke(
    inputs: Record<string, unknown>,
    context: StepContext,
  ): Promise<StepResult> {
    const result = await this.run(inputs, context);
    const branch = result.branch ?? this.defaultBranch();
    return complete(result.outputs ?? {}, branch);
  }

  describe(): Record<string, JsonValue> {
    return { functionId: this.functionId };
  }

  private defaultBranch(): string {
    if (this.branches.length !== 1) {
      throw new ValidationFailure(
        `Function of step "${this.name}" must choose one of: ${this.branches.join(", ")}`,
      );
    }
    return this.branches[0];
  }
}
