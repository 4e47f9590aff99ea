/**
 * Start & End Steps
 */

import type { Descriptor, JsonValue } from "../../schema/types";
import { BRANCH_NEXT, Step, complete, type StepRuntime } from "../step";
import type { StepResult } from "../types";

export interface StartStepConfig {
  name?: string;
  /** Flow inputs, re-emitted as outputs */
  inputs?: readonly Descriptor[];
  runtime?: StepRuntime;
}

/**
 * Entry point that declares the flow's inputs and passes them on as outputs
 */
export class StartStep extends Step {
  readonly kind = "start";

  constructor(config: StartStepConfig = {}) {
    super({
      name: config.name ?? "start",
      inputs: config.inputs,
      outputs: config.inputs,
      runtime: config.runtime,
    });
  }

  async invoke(inputs: Record<string, unknown>): Promise<StepResult> {
    return complete({ ...inputs });
  }
}

export interface EndStepConfig {
  name?: string;
  /** Branch the enclosing flow reports when it ends here */
  branchName?: string;
}

/**
 * Terminal step. Has no branches of its own.
 */
export class EndStep extends Step {
  readonly kind = "end";
  readonly branchName: string;

  constructor(config: EndStepConfig = {}) {
    super({ name: config.name ?? "end", branches: [] });
    this.branchName = config.branchName ?? BRANCH_NEXT;
  }

  async invoke(): Promise<StepResult> {
    return complete({}, this.branchName);
  }

  endBranch(): string {
    return this.branchName;
  }

  describe(): Record<string, JsonValue> {
    return { branchName: this.branchName };
  }
}
