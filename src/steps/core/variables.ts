/**
 * Variable Steps
 * Read and write flow-scoped variables
 */

import { GraphError, ValidationFailure } from "../../errors";
import { describeType, descriptor } from "../../schema/descriptors";
import type { DescriptorType, JsonValue } from "../../schema/types";
import type { Variable } from "../../graph/types";
import { Step, complete, type StepRuntime } from "../step";
import type { StepContext, StepResult } from "../types";
import { isRecord } from "../values";

/**
 * How a write combines with the current value:
 * - overwrite: replace it
 * - insert: append one element to a list
 * - merge: concatenate lists or shallow-merge maps
 */
export type WriteOperation = "overwrite" | "insert" | "merge";

// ============================================================================
// VariableReadStep
// ============================================================================

export interface VariableReadStepConfig {
  name: string;
  variable: Variable;
  /** Defaults to the variable name */
  outputName?: string;
  runtime?: StepRuntime;
}

export class VariableReadStep extends Step {
  readonly kind = "variable_read";
  readonly variable: Variable;
  readonly outputName: string;

  constructor(config: VariableReadStepConfig) {
    const outputName = config.outputName ?? config.variable.name;
    super({
      name: config.name,
      outputs: [descriptor(outputName, config.variable.type)],
      runtime: config.runtime,
    });
    this.variable = config.variable;
    this.outputName = outputName;
  }

  async invoke(
    _inputs: Record<string, unknown>,
    context: StepContext,
  ): Promise<StepResult> {
    return complete({
      [this.outputName]: context.variables.read(this.variable.name),
    });
  }

  referencedVariables(): readonly Variable[] {
    return [this.variable];
  }

  describe(): Record<string, JsonValue> {
    return { variable: this.variable.name };
  }
}

// ============================================================================
// VariableWriteStep
// ============================================================================

export interface VariableWriteStepConfig {
  name: string;
  variable: Variable;
  operation?: WriteOperation;
  /** Defaults to the variable name */
  inputName?: string;
  runtime?: StepRuntime;
}

function writeInputType(
  variable: Variable,
  operation: WriteOperation,
): DescriptorType {
  const { type } = variable;
  switch (operation) {
    case "overwrite":
      return type;
    case "insert":
      if (type.kind !== "list") {
        throw new GraphError(
          `Cannot insert into variable "${variable.name}" of type ${describeType(type)}`,
        );
      }
      return type.items;
    case "merge":
      if (type.kind !== "list" && type.kind !== "map") {
        throw new GraphError(
          `Cannot merge into variable "${variable.name}" of type ${describeType(type)}`,
        );
      }
      return type;
  }
}

export class VariableWriteStep extends Step {
  readonly kind = "variable_write";
  readonly variable: Variable;
  readonly operation: WriteOperation;
  readonly inputName: string;

  constructor(config: VariableWriteStepConfig) {
    const operation = config.operation ?? "overwrite";
    const inputName = config.inputName ?? config.variable.name;
    super({
      name: config.name,
      inputs: [
        descriptor(inputName, writeInputType(config.variable, operation)),
      ],
      runtime: config.runtime,
    });
    this.variable = config.variable;
    this.operation = operation;
    this.inputName = inputName;
  }

  async invoke(
    inputs: Record<string, unknown>,
    context: StepContext,
  ): Promise<StepResult> {
    const name = this.variable.name;
    const value = inputs[this.inputName];

    if (this.operation === "overwrite") {
      context.variables.write(name, value);
      return complete();
    }

    const current = context.variables.read(name);
    if (this.operation === "insert") {
      if (!Array.isArray(current)) {
        throw new ValidationFailure(`Variable "${name}" is not a list`);
      }
      context.variables.write(name, [...current, value]);
      return complete();
    }

    if (Array.isArray(current) && Array.isArray(value)) {
      context.variables.write(name, [...current, ...value]);
    } else if (isRecord(current) && isRecord(value)) {
      context.variables.write(name, { ...current, ...value });
    } else {
      throw new ValidationFailure(
        `Cannot merge value into variable "${name}"`,
      );
    }
    return complete();
  }

  referencedVariables(): readonly Variable[] {
    return [this.variable];
  }

  describe(): Record<string, JsonValue> {
    return { variable: this.variable.name, operation: this.operation };
  }
}
