/**
 * Value & Document Validation
 * Validates runtime values against descriptors and JSON documents against
 * their schemas
 */

import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import {
  descriptorTypeToJsonSchema,
  flowDefinitionJsonSchema,
} from "./json-schema";
import { describeType } from "./descriptors";
import type { FlowDefinition } from "./definition";
import type {
  Descriptor,
  DescriptorType,
  ValidationError,
  ValidationResult,
} from "./types";

// Initialize AJV with formats support
export const ajv = new Ajv({
  allErrors: true,
  verbose: true,
  allowUnionTypes: true,
});
addFormats(ajv);

const validateFlowSchema =
  ajv.compile<FlowDefinition>(flowDefinitionJsonSchema);

// Compiled validators per descriptor type, keyed by the rendered type
const valueValidators = new Map<string, ValidateFunction>();

function valueValidator(type: DescriptorType): ValidateFunction {
  const key = describeType(type);
  let validate = valueValidators.get(key);
  if (!validate) {
    validate = ajv.compile(descriptorTypeToJsonSchema(type));
    valueValidators.set(key, validate);
  }
  return validate;
}

/**
 * Convert AJV errors into validation errors under a path prefix
 */
export function toValidationErrors(
  errors: ErrorObject[] | null | undefined,
  prefix = "",
): ValidationError[] {
  return (errors ?? []).map((err) => ({
    path: `${prefix}${err.instancePath}` || "/",
    message: err.message ?? "Unknown validation error",
    severity: "error" as const,
  }));
}

// ============================================================================
// Values
// ============================================================================

/**
 * Check a value against a descriptor type. Returns one message per problem.
 */
export function checkValue(type: DescriptorType, value: unknown): string[] {
  if (value === undefined) return ["value is undefined"];
  if (type.kind === "any") return [];

  const validate = valueValidator(type);
  if (validate(value)) return [];
  return toValidationErrors(validate.errors).map(
    (err) => `${err.path === "/" ? "" : `${err.path} `}${err.message}`,
  );
}

/**
 * Check a named value against its descriptor
 */
export function validateValue(
  desc: Descriptor,
  value: unknown,
): ValidationResult {
  const errors: ValidationError[] = checkValue(desc.type, value).map(
    (message) => ({
      path: `/${desc.name}`,
      message: `expected ${describeType(desc.type)}: ${message}`,
      severity: "error",
    }),
  );
  return { valid: errors.length === 0, errors, warnings: [] };
}

// ============================================================================
// Flow Definitions
// ============================================================================

/**
 * Validate a JSON flow definition against the definition schema
 */
export function validateFlowDefinition(
  definition: unknown,
): ValidationResult & { definition?: FlowDefinition } {
  if (validateFlowSchema(definition)) {
    return { valid: true, errors: [], warnings: [], definition };
  }
  return {
    valid: false,
    errors: toValidationErrors(validateFlowSchema.errors),
    warnings: [],
  };
}
