/**
 * Variable Stores
 * Typed access to the variables kept in a conversation state
 */

import { ConversationStateError, ValidationFailure } from "../errors";
import { validateValue } from "../schema/validator";
import type { Flow } from "../graph/flow";
import type { VariableStore } from "../steps/types";
import type { ConversationState } from "./state";

/**
 * Variables of one flow execution, validated against their declared types
 */
export class StateVariableStore implements VariableStore {
  constructor(
    private readonly flow: Flow,
    private readonly state: ConversationState,
  ) {}

  has(name: string): boolean {
    return this.flow.getVariable(name) !== undefined;
  }

  read(name: string): unknown {
    this.require(name);
    return structuredClone(this.state.variables[name]);
  }

  write(name: string, value: unknown): void {
    const variable = this.require(name);
    const result = validateValue(
      { name: variable.name, type: variable.type },
      value,
    );
    if (!result.valid) {
      throw new ValidationFailure(
        `Cannot write variable "${name}": ${result.errors[0].message}`,
        result.errors[0].path,
      );
    }
    this.state.variables[name] = structuredClone(value);
  }

  private require(name: string) {
    const variable = this.flow.getVariable(name);
    if (!variable) {
      throw new ConversationStateError(
        `Flow "${this.flow.id}" has no variable "${name}"`,
      );
    }
    return variable;
  }
}

/**
 * Routes some variable names to another store, the rest to a local one
 */
export class OverlayVariableStore implements VariableStore {
  private readonly names: ReadonlySet<string>;

  constructor(
    private readonly local: VariableStore,
    names: readonly string[],
    private readonly shared: VariableStore,
  ) {
    this.names = new Set(names);
  }

  has(name: string): boolean {
    return this.storeFor(name).has(name);
  }

  read(name: string): unknown {
    return this.storeFor(name).read(name);
  }

  write(name: string, value: unknown): void {
    this.storeFor(name).write(name, value);
  }

  private storeFor(name: string): VariableStore {
    return this.names.has(name) ? this.shared : this.local;
  }
}
