/**
 * Catch Exception Step
 * Runs a nested flow and turns selected step failures into branches
 */

import { GraphError, errorKind, errorMessage, isEngineError } from "../../errors";
import {
  defaultValue,
  descriptor,
  hasDefault,
  types,
} from "../../schema/descriptors";
import type { JsonValue } from "../../schema/types";
import type { Flow } from "../../graph/flow";
import { Step, complete, suspend, type StepRuntime } from "../step";
import type { StepContext, StepResult } from "../types";

export const EXCEPTION_NAME = "exception_name";
export const EXCEPTION_PAYLOAD = "exception_payload";
export const DEFAULT_EXCEPTION_BRANCH = "default_exception_branch";

export interface CatchExceptionStepConfig {
  name: string;
  flow: Flow;
  /** Failure kind → branch */
  exceptOn?: Record<string, string>;
  /** Route unlisted failures to "default_exception_branch" */
  catchAllExceptions?: boolean;
  runtime?: StepRuntime;
}

/**
 * Every nested output needs a default: those defaults are the outputs when a
 * failure is caught. Engine errors always propagate.
 */
export class CatchExceptionStep extends Step {
  readonly kind = "catch_exception";
  readonly flow: Flow;
  readonly exceptOn: Readonly<Record<string, string>>;
  readonly catchAllExceptions: boolean;

  constructor(config: CatchExceptionStepConfig) {
    const withoutDefault = config.flow.outputDescriptors.filter(
      (d) => !hasDefault(d),
    );
    if (withoutDefault.length > 0) {
      throw new GraphError(
        `Catch step "${config.name}": nested outputs need defaults: ${withoutDefault.map((d) => d.name).join(", ")}`,
      );
    }
    const clashing = config.flow.outputDescriptors.filter(
      (d) => d.name === EXCEPTION_NAME || d.name === EXCEPTION_PAYLOAD,
    );
    if (clashing.length > 0) {
      throw new GraphError(
        `Catch step "${config.name}": nested output "${clashing[0].name}" is reserved`,
      );
    }

    const exceptOn = { ...config.exceptOn };
    const catchAll = config.catchAllExceptions ?? false;
    const branches = [
      ...new Set([
        ...config.flow.outgoingBranches,
        ...Object.values(exceptOn),
        ...(catchAll ? [DEFAULT_EXCEPTION_BRANCH] : []),
      ]),
    ];

    super({
      name: config.name,
      inputs: config.flow.inputDescriptors,
      outputs: [
        ...config.flow.outputDescriptors,
        descriptor(EXCEPTION_NAME, types.string(), { default: "" }),
        descriptor(EXCEPTION_PAYLOAD, types.string(), { default: "" }),
      ],
      branches,
      runtime: config.runtime,
    });
    this.flow = config.flow;
    this.exceptOn = Object.freeze(exceptOn);
    this.catchAllExceptions = catchAll;
  }

  async invoke(
    inputs: Record<string, unknown>,
    context: StepContext,
  ): Promise<StepResult> {
    try {
      const result = await context.runFlow(this.flow, "", inputs);
      if (result.type === "suspended") {
        return suspend(result.suspension);
      }
      return complete(
        { ...result.outputs, [EXCEPTION_NAME]: "", [EXCEPTION_PAYLOAD]: "" },
        result.branch,
      );
    } catch (e) {
      if (isEngineError(e)) throw e;

      const kind = errorKind(e);
      const branch = Object.hasOwn(this.exceptOn, kind)
        ? this.exceptOn[kind]
        : this.catchAllExceptions
          ? DEFAULT_EXCEPTION_BRANCH
          : null;
      if (branch === null) throw e;

      context.log(`Caught ${kind}, taking branch "${branch}"`);
      context.discardFlow("");
      const defaults = Object.fromEntries(
        this.flow.outputDescriptors.map((d) => [d.name, defaultValue(d)]),
      );
      return complete(
        {
          ...defaults,
          [EXCEPTION_NAME]: kind,
          [EXCEPTION_PAYLOAD]: errorMessage(e),
        },
        branch,
      );
    }
  }

  subflows(): readonly Flow[] {
    return [this.flow];
  }

  describe(): Record<string, JsonValue> {
    return {
      flow: this.flow.id,
      exceptOn: { ...this.exceptOn },
      catchAllExceptions: this.catchAllExceptions,
    };
  }
}
