/**
 * Tools & ToolExecutionStep
 *
 * Server tools run inside the engine. Client tools are executed by the
 * caller: the step suspends with a tool request and resumes once the result
 * is supplied. Either kind may require the caller's confirmation first.
 */

import { StepFailure, ToolFailure, errorMessage } from "../../errors";
import type { Descriptor, JsonValue } from "../../schema/types";
import { Step, complete, suspend, type StepRuntime } from "../step";
import type { StepContext, StepResult, ToolRequest } from "../types";
import { stringify } from "../values";

// ============================================================================
// Tools
// ============================================================================

export interface ToolContext {
  readonly conversationId: string;
  readonly path: string;
  log(message: string): void;
}

interface ToolBase {
  name: string;
  description?: string;
  parameters: readonly Descriptor[];
  output: Descriptor;
  requiresConfirmation?: boolean;
}

export interface ServerTool extends ToolBase {
  kind: "server";
  run(
    args: Record<string, unknown>,
    context: ToolContext,
  ): unknown | Promise<unknown>;
}

export interface ClientTool extends ToolBase {
  kind: "client";
}

export type Tool = ServerTool | ClientTool;

export function serverTool(definition: Omit<ServerTool, "kind">): ServerTool {
  return { ...definition, kind: "server" };
}

export function clientTool(definition: Omit<ClientTool, "kind">): ClientTool {
  return { ...definition, kind: "client" };
}

// ============================================================================
// ToolExecutionStep
// ============================================================================

export interface ToolExecutionStepConfig {
  name: string;
  tool: Tool;
  /** Overrides the tool's own setting */
  requiresConfirmation?: boolean;
  /** Fail with ToolFailure on rejection instead of outputting a message */
  raiseOnRejection?: boolean;
  runtime?: StepRuntime;
}

type Phase = "confirmation" | "result";

export class ToolExecutionStep extends Step {
  readonly kind = "tool";
  readonly tool: Tool;
  readonly requiresConfirmation: boolean;
  readonly raiseOnRejection: boolean;

  constructor(config: ToolExecutionStepConfig) {
    super({
      name: config.name,
      inputs: config.tool.parameters,
      outputs: [config.tool.output],
      runtime: config.runtime,
    });
    this.tool = config.tool;
    this.requiresConfirmation =
      config.requiresConfirmation ?? config.tool.requiresConfirmation ?? false;
    this.raiseOnRejection = config.raiseOnRejection ?? false;
  }

  async invoke(
    inputs: Record<string, unknown>,
    context: StepContext,
  ): Promise<StepResult> {
    const pending = this.pendingRequest(context);
    if (!pending && !this.requiresConfirmation && this.tool.kind === "server") {
      return this.runServerTool(this.tool, inputs, context);
    }

    const request: ToolRequest = {
      id: pending?.requestId ?? context.createRequestId(),
      name: this.tool.name,
      args: { ...inputs },
    };
    let phase: Phase;
    if (pending) {
      phase = pending.phase;
    } else {
      phase = this.requiresConfirmation ? "confirmation" : "result";
      context.appendMessage({
        role: "agent",
        content: "",
        toolRequests: [request],
      });
    }

    if (phase === "confirmation") {
      const decision = context.toolDecision(request.id);
      if (!decision) {
        context.setStepState({ requestId: request.id, phase });
        return suspend({
          kind: "needs_tool_confirmation",
          toolRequests: [request],
        });
      }
      if (!decision.confirmed) {
        return this.rejected(decision.reason, context);
      }
      context.log(`Tool call ${request.id} confirmed`);
      if (this.tool.kind === "server") {
        return this.runServerTool(this.tool, inputs, context, request.id);
      }
      phase = "result";
    }

    const supplied = context.toolResult(request.id);
    if (!supplied) {
      context.setStepState({ requestId: request.id, phase });
      return suspend({ kind: "needs_tool_result", toolRequests: [request] });
    }
    return complete({ [this.tool.output.name]: supplied.value });
  }

  describe(): Record<string, JsonValue> {
    return {
      tool: this.tool.name,
      toolKind: this.tool.kind,
      requiresConfirmation: this.requiresConfirmation,
      raiseOnRejection: this.raiseOnRejection,
    };
  }

  private pendingRequest(
    context: StepContext,
  ): { requestId: string; phase: Phase } | null {
    const state = context.getStepState();
    const requestId = state?.requestId;
    const phase = state?.phase;
    if (typeof requestId !== "string") return null;
    if (phase !== "confirmation" && phase !== "result") return null;
    return { requestId, phase };
  }

  private async runServerTool(
    tool: ServerTool,
    inputs: Record<string, unknown>,
    context: StepContext,
    requestId?: string,
  ): Promise<StepResult> {
    let value: unknown;
    try {
      value = await tool.run(inputs, {
        conversationId: context.conversationId,
        path: context.path,
        log: (message) => context.log(message),
      });
    } catch (e) {
      if (e instanceof StepFailure) throw e;
      throw new ToolFailure(`Tool "${tool.name}" failed: ${errorMessage(e)}`, {
        cause: e,
      });
    }
    if (requestId !== undefined) {
      context.appendMessage({
        role: "tool",
        content: stringify(value),
        toolRequestId: requestId,
      });
    }
    return complete({ [tool.output.name]: value });
  }

  private rejected(reason: string | null, context: StepContext): StepResult {
    const message = `Tool execution rejected by the user${reason ? `: ${reason}` : ""}`;
    context.log(message);
    if (this.raiseOnRejection) {
      throw new ToolFailure(message);
    }
    return complete({ [this.tool.output.name]: message });
  }
}
