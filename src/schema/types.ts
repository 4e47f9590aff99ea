/**
 * ResumeFlow Schema Types
 * Typed value contracts shared by steps, flows, variables and context providers
 */

// ============================================================================
// Descriptor Types
// ============================================================================

/** Scalar descriptor kinds */
export type ScalarKind = "string" | "int" | "float" | "bool" | "any";

/**
 * Structural type of a value flowing through a flow.
 * `list` and `map` carry their element type, `union` its alternatives.
 */
export type DescriptorType =
  | { kind: ScalarKind }
  | { kind: "list"; items: DescriptorType }
  | { kind: "map"; values: DescriptorType }
  | { kind: "union"; options: DescriptorType[] };

/** Every descriptor kind */
export type DescriptorKind = DescriptorType["kind"];

/**
 * Named, typed value contract.
 * An absent `default` means the value must be supplied.
 */
export interface Descriptor {
  readonly name: string;
  readonly type: DescriptorType;
  readonly default?: unknown;
  readonly description?: string;
}

// ============================================================================
// JSON Values
// ============================================================================

/** Value that survives a JSON round trip unchanged */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// ============================================================================
// Validation Results
// ============================================================================

export interface ValidationError {
  path: string;
  message: string;
  severity: "error" | "warning";
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationError[];
}
