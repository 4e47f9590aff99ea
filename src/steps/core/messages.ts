/**
 * Message Steps
 * OutputMessageStep posts a rendered template; InputMessageStep waits for the
 * next user message
 */

import { descriptor, types } from "../../schema/descriptors";
import type { JsonValue } from "../../schema/types";
import { Step, complete, suspend, type StepRuntime } from "../step";
import type { StepContext, StepResult } from "../types";
import { renderTemplate, templateVariables } from "../values";

// ============================================================================
// OutputMessageStep
// ============================================================================

export const OUTPUT_MESSAGE = "output_message";

export interface OutputMessageStepConfig {
  name: string;
  /** Text with {{placeholders}}; each placeholder root becomes an input */
  template: string;
  outputName?: string;
  runtime?: StepRuntime;
}

export class OutputMessageStep extends Step {
  readonly kind = "output";
  readonly template: string;
  readonly outputName: string;

  constructor(config: OutputMessageStepConfig) {
    const outputName = config.outputName ?? OUTPUT_MESSAGE;
    super({
      name: config.name,
      inputs: templateVariables(config.template).map((name) =>
        descriptor(name, types.any()),
      ),
      outputs: [descriptor(outputName, types.string())],
      runtime: config.runtime,
    });
    this.template = config.template;
    this.outputName = outputName;
  }

  async invoke(
    inputs: Record<string, unknown>,
    context: StepContext,
  ): Promise<StepResult> {
    const content = renderTemplate(this.template, inputs);
    context.appendMessage({ role: "agent", content });
    return complete({ [this.outputName]: content });
  }

  describe(): Record<string, JsonValue> {
    return { template: this.template };
  }
}

// ============================================================================
// InputMessageStep
// ============================================================================

export const USER_PROVIDED_INPUT = "user_provided_input";

export interface InputMessageStepConfig {
  name: string;
  /** Optional prompt posted before waiting */
  prompt?: string;
  outputName?: string;
  runtime?: StepRuntime;
}

/**
 * Suspends until a user message arrives after the step started waiting, then
 * outputs its text
 */
export class InputMessageStep extends Step {
  readonly kind = "input";
  readonly prompt: string | null;
  readonly outputName: string;

  constructor(config: InputMessageStepConfig) {
    const outputName = config.outputName ?? USER_PROVIDED_INPUT;
    super({
      name: config.name,
      inputs:
        config.prompt === undefined
          ? []
          : templateVariables(config.prompt).map((name) =>
              descriptor(name, types.any()),
            ),
      outputs: [descriptor(outputName, types.string())],
      runtime: config.runtime,
    });
    this.prompt = config.prompt ?? null;
    this.outputName = outputName;
  }

  async invoke(
    inputs: Record<string, unknown>,
    context: StepContext,
  ): Promise<StepResult> {
    const waiting = context.getStepState();
    const waitingFrom = waiting?.waitingFrom;

    if (typeof waitingFrom === "number") {
      const stored = waiting?.prompt;
      const prompt = typeof stored === "string" ? stored : null;
      const reply = context
        .messages()
        .slice(waitingFrom)
        .find((message) => message.role === "user");
      if (reply) {
        context.log("Received user message");
        return complete({ [this.outputName]: reply.content });
      }
      return suspend({ kind: "needs_user_message", prompt });
    }

    const prompt =
      this.prompt === null ? null : renderTemplate(this.prompt, inputs);
    if (prompt !== null) {
      context.appendMessage({ role: "agent", content: prompt });
    }
    context.setStepState({
      waitingFrom: context.messages().length,
      prompt,
    });
    return suspend({ kind: "needs_user_message", prompt });
  }

  describe(): Record<string, JsonValue> {
    return { prompt: this.prompt };
  }
}
