/**
 * Flow Execution Step
 * Runs a nested flow as one step; its outgoing branches become the step's
 */

import type { JsonValue } from "../../schema/types";
import type { Flow } from "../../graph/flow";
import { Step, complete, suspend, type StepRuntime } from "../step";
import type { StepContext, StepResult } from "../types";

export interface FlowExecutionStepConfig {
  name: string;
  flow: Flow;
  runtime?: StepRuntime;
}

export class FlowExecutionStep extends Step {
  readonly kind = "flow";
  readonly flow: Flow;

  constructor(config: FlowExecutionStepConfig) {
    super({
      name: config.name,
      inputs: config.flow.inputDescriptors,
      outputs: config.flow.outputDescriptors,
      branches: config.flow.outgoingBranches,
      runtime: config.runtime,
    });
    this.flow = config.flow;
  }

  async invoke(
    inputs: Record<string, unknown>,
    context: StepContext,
  ): Promise<StepResult> {
    const result = await context.runFlow(this.flow, "", inputs);
    if (result.type === "suspended") {
      return suspend(result.suspension);
    }
    return complete(result.outputs, result.branch);
  }

  subflows(): readonly Flow[] {
    return [this.flow];
  }

  describe(): Record<string, JsonValue> {
    return { flow: this.flow.id };
  }
}
