/**
 * Context Providers
 * Built-in providers of input values that no data edge supplies
 */

import { GraphError } from "../errors";
import { descriptor, hasDefault, types } from "../schema/descriptors";
import { validateValue } from "../schema/validator";
import type { Descriptor } from "../schema/types";
import type { Flow } from "../graph/flow";
import type { ContextProvider, ProviderContext } from "../graph/types";
import type { MessageRole } from "../steps/types";
import type { ServerTool } from "../steps/core/tool";

// ============================================================================
// ConstantContextProvider
// ============================================================================

export interface ConstantContextProviderConfig {
  id: string;
  output: Descriptor;
  value: unknown;
}

/**
 * Always provides the same value
 */
export class ConstantContextProvider implements ContextProvider {
  readonly id: string;
  readonly outputDescriptors: readonly Descriptor[];
  private readonly value: unknown;

  constructor(config: ConstantContextProviderConfig) {
    const result = validateValue(config.output, config.value);
    if (!result.valid) {
      throw new GraphError(
        `Context provider "${config.id}": ${result.errors[0].message}`,
      );
    }
    this.id = config.id;
    this.outputDescriptors = [config.output];
    this.value = structuredClone(config.value);
  }

  async provide(): Promise<Record<string, unknown>> {
    return { [this.outputDescriptors[0].name]: structuredClone(this.value) };
  }
}

// ============================================================================
// ToolContextProvider
// ============================================================================

export interface ToolContextProviderConfig {
  id: string;
  /** Server tool whose parameters all have defaults */
  tool: ServerTool;
}

/**
 * Provides the result of calling a server tool with its default arguments
 */
export class ToolContextProvider implements ContextProvider {
  readonly id: string;
  readonly outputDescriptors: readonly Descriptor[];
  private readonly tool: ServerTool;

  constructor(config: ToolContextProviderConfig) {
    const required = config.tool.parameters.filter((p) => !hasDefault(p));
    if (required.length > 0) {
      throw new GraphError(
        `Context provider "${config.id}": tool parameters need defaults: ${required.map((p) => p.name).join(", ")}`,
      );
    }
    this.id = config.id;
    this.tool = config.tool;
    this.outputDescriptors = [config.tool.output];
  }

  async provide(context: ProviderContext): Promise<Record<string, unknown>> {
    const args = Object.fromEntries(
      this.tool.parameters.map((p) => [p.name, structuredClone(p.default)]),
    );
    const value = await this.tool.run(args, {
      conversationId: context.conversationId,
      path: `provider:${this.id}`,
      log: (message) => context.log(message),
    });
    return { [this.tool.output.name]: value };
  }
}

// ============================================================================
// FlowContextProvider
// ============================================================================

export interface FlowContextProviderConfig {
  id: string;
  /** Flow whose inputs all have defaults; it must not suspend */
  flow: Flow;
  /** Flow outputs to expose; defaults to all of them */
  outputs?: readonly string[];
}

/**
 * Provides the outputs of running a flow
 */
export class FlowContextProvider implements ContextProvider {
  readonly id: string;
  readonly outputDescriptors: readonly Descriptor[];
  private readonly flow: Flow;

  constructor(config: FlowContextProviderConfig) {
    const required = config.flow.inputDescriptors.filter((d) => !hasDefault(d));
    if (required.length > 0) {
      throw new GraphError(
        `Context provider "${config.id}": flow inputs need defaults: ${required.map((d) => d.name).join(", ")}`,
      );
    }
    const names =
      config.outputs ?? config.flow.outputDescriptors.map((d) => d.name);
    this.outputDescriptors = names.map((name) => {
      const output = config.flow.getOutput(name);
      if (!output) {
        throw new GraphError(
          `Context provider "${config.id}": flow has no output "${name}"`,
        );
      }
      return output;
    });
    this.id = config.id;
    this.flow = config.flow;
  }

  async provide(context: ProviderContext): Promise<Record<string, unknown>> {
    const outputs = await context.runFlow(this.flow, {});
    return Object.fromEntries(
      this.outputDescriptors.map((d) => [d.name, outputs[d.name]]),
    );
  }
}

// ============================================================================
// MessageWindowContextProvider
// ============================================================================

export const CHAT_HISTORY = "chat_history";

export interface MessageWindowContextProviderConfig {
  id: string;
  outputName?: string;
  /** Most recent messages to include */
  windowSize?: number;
  /** Roles to include; defaults to all */
  roles?: readonly MessageRole[];
}

/**
 * Provides the most recent messages as `{ role, content }` maps, taken when
 * the value is first needed
 */
export class MessageWindowContextProvider implements ContextProvider {
  readonly id: string;
  readonly outputDescriptors: readonly Descriptor[];
  private readonly windowSize: number;
  private readonly roles: ReadonlySet<MessageRole> | null;

  constructor(config: MessageWindowContextProviderConfig) {
    const windowSize = config.windowSize ?? 10;
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new GraphError(
        `Context provider "${config.id}": windowSize must be a positive integer`,
      );
    }
    this.id = config.id;
    this.windowSize = windowSize;
    this.roles = config.roles ? new Set(config.roles) : null;
    this.outputDescriptors = [
      descriptor(
        config.outputName ?? CHAT_HISTORY,
        types.list(types.map(types.string())),
      ),
    ];
  }

  async provide(context: ProviderContext): Promise<Record<string, unknown>> {
    const messages = context
      .messages()
      .filter((m) => this.roles === null || this.roles.has(m.role))
      .slice(-this.windowSize)
      .map((m) => ({ role: m.role, content: m.content }));
    return { [this.outputDescriptors[0].name]: messages };
  }
}
