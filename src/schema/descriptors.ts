/**
 * Descriptor Helpers
 * Constructors, type compatibility and rendering for descriptors
 */

import type { Descriptor, DescriptorType } from "./types";

// ============================================================================
// Constructors
// ============================================================================

const ANY: DescriptorType = { kind: "any" };

/** Descriptor type constructors */
export const types = {
  string: (): DescriptorType => ({ kind: "string" }),
  int: (): DescriptorType => ({ kind: "int" }),
  float: (): DescriptorType => ({ kind: "float" }),
  bool: (): DescriptorType => ({ kind: "bool" }),
  any: (): DescriptorType => ({ kind: "any" }),
  list: (items: DescriptorType = ANY): DescriptorType => ({
    kind: "list",
    items,
  }),
  map: (values: DescriptorType = ANY): DescriptorType => ({
    kind: "map",
    values,
  }),
  union: (...options: DescriptorType[]): DescriptorType => ({
    kind: "union",
    options,
  }),
};

export interface DescriptorOptions {
  default?: unknown;
  description?: string;
}

/**
 * Create a frozen descriptor
 */
export function descriptor(
  name: string,
  type: DescriptorType,
  options: DescriptorOptions = {},
): Descriptor {
  return Object.freeze({
    name,
    type,
    ...(options.default !== undefined ? { default: options.default } : {}),
    ...(options.description !== undefined
      ? { description: options.description }
      : {}),
  });
}

/** Copy of a descriptor under another name */
export function renameDescriptor(source: Descriptor, name: string): Descriptor {
  return descriptor(name, source.type, {
    default: source.default,
    description: source.description,
  });
}

/** Copy of a descriptor with its default removed */
export function requiredDescriptor(source: Descriptor): Descriptor {
  return descriptor(source.name, source.type, {
    description: source.description,
  });
}

export function hasDefault(desc: Descriptor): boolean {
  return desc.default !== undefined;
}

/** Fresh copy of a descriptor's default, so callers may mutate it */
export function defaultValue(desc: Descriptor): unknown {
  return structuredClone(desc.default);
}

/** Names that appear more than once */
export function findDuplicateNames(descriptors: readonly Descriptor[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const desc of descriptors) {
    if (seen.has(desc.name)) duplicates.add(desc.name);
    seen.add(desc.name);
  }
  return [...duplicates];
}

// ============================================================================
// Compatibility
// ============================================================================

/**
 * Whether a value of `source` type may be fed into a `destination` slot.
 * `any` is compatible both ways and an int widens to a float.
 */
export function isAssignable(
  source: DescriptorType,
  destination: DescriptorType,
): boolean {
  if (source.kind === "any" || destination.kind === "any") return true;

  if (source.kind === "union") {
    return source.options.every((option) => isAssignable(option, destination));
  }
  if (destination.kind === "union") {
    return destination.options.some((option) => isAssignable(source, option));
  }

  if (source.kind === "list") {
    return (
      destination.kind === "list" &&
      isAssignable(source.items, destination.items)
    );
  }
  if (source.kind === "map") {
    return (
      destination.kind === "map" &&
      isAssignable(source.values, destination.values)
    );
  }

  if (source.kind === destination.kind) return true;
  return source.kind === "int" && destination.kind === "float";
}

/** Structural equality of two descriptor types */
export function sameType(a: DescriptorType, b: DescriptorType): boolean {
  return describeType(a) === describeType(b);
}

/**
 * Render a type for messages, e.g. `list<map<int>>` or `string | null`
 */
export function describeType(type: DescriptorType): string {
  switch (type.kind) {
    case "list":
      return `list<${describeType(type.items)}>`;
    case "map":
      return `map<${describeType(type.values)}>`;
    case "union":
      return type.options.map(describeType).join(" | ");
    default:
      return type.kind;
  }
}
