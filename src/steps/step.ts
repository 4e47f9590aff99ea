/**
 * Step Contract
 *
 * A step declares typed inputs, typed outputs and the branches it may take,
 * and implements `invoke`. The driver resolves inputs, runs the step and
 * follows the control edge of the branch it returns.
 */

import { GraphError } from "../errors";
import { findDuplicateNames } from "../schema/descriptors";
import type { Descriptor, JsonValue } from "../schema/types";
import type { Flow } from "../graph/flow";
import type { Variable } from "../graph/types";
import type { StepContext, StepResult, Suspension } from "./types";

/** Default branch of single-branch steps */
export const BRANCH_NEXT = "next";

export type StepKind =
  | "start"
  | "end"
  | "output"
  | "input"
  | "branching"
  | "variable_read"
  | "variable_write"
  | "function"
  | "tool"
  | "flow"
  | "map"
  | "retry"
  | "catch_exception"
  | "custom";

/** Retry and visit settings applied by the driver */
export interface StepRuntime {
  /** Attempts before a failure propagates (default 1) */
  maxRetries?: number;
  /** Delay between attempts in milliseconds */
  retryDelay?: number;
  /** Cap on how often the step may run in one flow execution */
  maxVisits?: number;
}

export interface StepConfig {
  name: string;
  inputs?: readonly Descriptor[];
  outputs?: readonly Descriptor[];
  /** Defaults to a single "next" branch */
  branches?: readonly string[];
  runtime?: StepRuntime;
}

// ============================================================================
// Step
// ============================================================================

export abstract class Step {
  abstract readonly kind: StepKind;

  readonly name: string;
  readonly inputDescriptors: readonly Descriptor[];
  readonly outputDescriptors: readonly Descriptor[];
  readonly branches: readonly string[];
  readonly runtime: StepRuntime;

  protected constructor(config: StepConfig) {
    if (!config.name) {
      throw new GraphError("Step name must not be empty");
    }
    this.name = config.name;
    this.inputDescriptors = Object.freeze([...(config.inputs ?? [])]);
    this.outputDescriptors = Object.freeze([...(config.outputs ?? [])]);
    this.branches = Object.freeze([...(config.branches ?? [BRANCH_NEXT])]);
    this.runtime = Object.freeze({ ...config.runtime });

    const issues = [
      ...findDuplicateNames(this.inputDescriptors).map(
        (name) => `duplicate input "${name}"`,
      ),
      ...findDuplicateNames(this.outputDescriptors).map(
        (name) => `duplicate output "${name}"`,
      ),
      ...(new Set(this.branches).size !== this.branches.length
        ? ["duplicate branch names"]
        : []),
    ];
    if (issues.length > 0) {
      throw new GraphError(
        issues.map((message) => ({
          path: `/steps/${config.name}`,
          message,
          severity: "error" as const,
        })),
      );
    }
  }

  /**
   * Run the step. Return `complete(...)` with the outputs and the branch to
   * follow, or `suspend(...)` when outside input is needed first.
   */
  abstract invoke(
    inputs: Record<string, unknown>,
    context: StepContext,
  ): Promise<StepResult>;

  /** Flow variables this step reads or writes */
  referencedVariables(): readonly Variable[] {
    return [];
  }

  /** Branch reported when this step itself ends the flow */
  endBranch(): string | null {
    return null;
  }

  /** Nested flows, for fingerprinting */
  subflows(): readonly Flow[] {
    return [];
  }

  /** Configuration that identifies the step's behavior */
  describe(): Record<string, JsonValue> {
    return {};
  }

  getInput(name: string): Descriptor | undefined {
    return this.inputDescriptors.find((d) => d.name === name);
  }

  getOutput(name: string): Descriptor | undefined {
    return this.outputDescriptors.find((d) => d.name === name);
  }
}

// ============================================================================
// Result Helpers
// ============================================================================

export function complete(
  outputs: Record<string, unknown> = {},
  branch: string = BRANCH_NEXT,
): StepResult {
  return { type: "complete", outputs, branch };
}

export function suspend(suspension: Suspension): StepResult {
  return { type: "suspend", suspension };
}
