/**
 * Flow Variables
 */

import { GraphError } from "../errors";
import { describeType } from "../schema/descriptors";
import { checkValue } from "../schema/validator";
import type { DescriptorType } from "../schema/types";
import type { Variable } from "./types";

export interface VariableOptions {
  default?: unknown;
  description?: string;
}

/**
 * Declare a flow variable. Lists and maps start empty unless a default is
 * given; every other type needs an explicit default.
 */
export function variable(
  name: string,
  type: DescriptorType,
  options: VariableOptions = {},
): Variable {
  let initial = options.default;
  if (initial === undefined) {
    if (type.kind === "list") initial = [];
    else if (type.kind === "map") initial = {};
    else {
      throw new GraphError(
        `Variable "${name}" of type ${describeType(type)} needs a default value`,
      );
    }
  }

  const problems = checkValue(type, initial);
  if (problems.length > 0) {
    throw new GraphError(
      `Default of variable "${name}" is not a ${describeType(type)}: ${problems.join(", ")}`,
    );
  }

  return Object.freeze({
    name,
    type,
    default: initial,
    ...(options.description !== undefined
      ? { description: options.description }
      : {}),
  });
}
