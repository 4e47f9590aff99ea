/**
 * Branching Step
 * Routes on an exact match of a string input against a mapping table
 */

import { descriptor, types } from "../../schema/descriptors";
import type { JsonValue } from "../../schema/types";
import { Step, complete, type StepRuntime } from "../step";
import type { StepResult } from "../types";

/** Branch taken when no mapping entry matches */
export const BRANCH_DEFAULT = "default";

export const NEXT_STEP_NAME = "next_step_name";

export interface BranchingStepConfig {
  name: string;
  /** Input value → branch name */
  mapping: Record<string, string>;
  /** Defaults to "next_step_name" */
  inputName?: string;
  runtime?: StepRuntime;
}

export class BranchingStep extends Step {
  readonly kind = "branching";
  readonly mapping: Readonly<Record<string, string>>;
  readonly inputName: string;

  constructor(config: BranchingStepConfig) {
    const inputName = config.inputName ?? NEXT_STEP_NAME;
    const branches = [
      ...new Set([...Object.values(config.mapping), BRANCH_DEFAULT]),
    ];
    super({
      name: config.name,
      inputs: [descriptor(inputName, types.string())],
      branches,
      runtime: config.runtime,
    });
    this.mapping = Object.freeze({ ...config.mapping });
    this.inputName = inputName;
  }

  async invoke(inputs: Record<string, unknown>): Promise<StepResult> {
    const value = inputs[this.inputName];
    const branch =
      typeof value === "string" && Object.hasOwn(this.mapping, value)
        ? this.mapping[value]
        : BRANCH_DEFAULT;
    return complete({}, branch);
  }

  describe(): Record<string, JsonValue> {
    return { mapping: { ...this.mapping }, inputName: this.inputName };
  }
}
