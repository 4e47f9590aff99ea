/**
 * Retry Step
 * Re-runs a nested flow until a boolean output holds or the trials run out
 */

import { GraphError } from "../../errors";
import type { JsonValue } from "../../schema/types";
import type { Flow } from "../../graph/flow";
import { Step, complete, suspend, type StepRuntime } from "../step";
import type { StepContext, StepResult } from "../types";

export const BRANCH_SUCCESS = "success";
export const BRANCH_FAILURE = "failure";

export const DEFAULT_MAX_TRIALS = 5;

export interface RetryStepConfig {
  name: string;
  flow: Flow;
  /** Name of a bool output of the nested flow */
  successCondition: string;
  maxNumTrials?: number;
  runtime?: StepRuntime;
}

/**
 * Each failed attempt discards the nested state, so the next attempt starts
 * fresh. A suspended attempt resumes where it left off.
 */
export class RetryStep extends Step {
  readonly kind = "retry";
  readonly flow: Flow;
  readonly successCondition: string;
  readonly maxNumTrials: number;

  constructor(config: RetryStepConfig) {
    const condition = config.flow.getOutput(config.successCondition);
    if (!condition) {
      throw new GraphError(
        `Retry step "${config.name}": nested flow has no output "${config.successCondition}"`,
      );
    }
    if (condition.type.kind !== "bool") {
      throw new GraphError(
        `Retry step "${config.name}": output "${config.successCondition}" must be a bool`,
      );
    }
    const maxNumTrials = config.maxNumTrials ?? DEFAULT_MAX_TRIALS;
    if (!Number.isInteger(maxNumTrials) || maxNumTrials < 1) {
      throw new GraphError(
        `Retry step "${config.name}": maxNumTrials must be a positive integer`,
      );
    }

    super({
      name: config.name,
      inputs: config.flow.inputDescriptors,
      outputs: config.flow.outputDescriptors,
      branches: [BRANCH_SUCCESS, BRANCH_FAILURE],
      runtime: config.runtime,
    });
    this.flow = config.flow;
    this.successCondition = config.successCondition;
    this.maxNumTrials = maxNumTrials;
  }

  async invoke(
    inputs: Record<string, unknown>,
    context: StepContext,
  ): Promise<StepResult> {
    const stored = context.getStepState()?.attempt;
    let attempt = typeof stored === "number" ? stored : 1;

    for (;;) {
      const result = await context.runFlow(this.flow, "", inputs);
      if (result.type === "suspended") {
        context.setStepState({ attempt });
        return suspend(result.suspension);
      }

      if (result.outputs[this.successCondition] === true) {
        context.log(`Succeeded on attempt ${attempt}`);
        return complete(result.outputs, BRANCH_SUCCESS);
      }
      if (attempt >= this.maxNumTrials) {
        context.log(`Failed after ${attempt} attempts`);
        return complete(result.outputs, BRANCH_FAILURE);
      }

      context.log(`Attempt ${attempt} did not succeed, retrying`);
      context.discardFlow("");
      attempt++;
      context.setStepState({ attempt });
    }
  }

  subflows(): readonly Flow[] {
    return [this.flow];
  }

  describe(): Record<string, JsonValue> {
    return {
      flow: this.flow.id,
      successCondition: this.successCondition,
      maxNumTrials: this.maxNumTrials,
    };
  }
}
