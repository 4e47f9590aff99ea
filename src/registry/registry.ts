/**
 * Step Registry
 * Named step functions and server tools that JSON flow definitions refer to
 */

import type { Descriptor } from "../schema/types";
import type { StepFunction } from "../steps/core/function";
import type { ServerTool } from "../steps/core/tool";

// ============================================================================
// Registry Types
// ============================================================================

/**
 * Metadata of a registered step function
 */
export interface FunctionMetadata {
  /** Unique id, e.g. "math.add" */
  id: string;
  name: string;
  description?: string;
  category?: string;
  inputs: Descriptor[];
  outputs: Descriptor[];
  /** Defaults to a single "next" branch */
  branches?: string[];
}

/**
 * Complete function registration
 */
export interface RegisteredFunction {
  metadata: FunctionMetadata;
  execute: StepFunction;
}

// ============================================================================
// Registry Implementation
// ============================================================================

export class StepRegistry {
  private functions = new Map<string, RegisteredFunction>();
  private tools = new Map<string, ServerTool>();

  /**
   * Register a function; an existing id is replaced
   */
  register(fn: RegisteredFunction): void {
    this.functions.set(fn.metadata.id, fn);
  }

  /**
   * Register a function from its parts
   */
  registerFunction(metadata: FunctionMetadata, execute: StepFunction): void {
    this.register(defineFunction(metadata, execute));
  }

  /**
   * Register a server tool under its name (or an explicit id)
   */
  registerTool(tool: ServerTool, id: string = tool.name): void {
    this.tools.set(id, tool);
  }

  /**
   * Unregister a function
   */
  unregister(id: string): boolean {
    return this.functions.delete(id);
  }

  /**
   * Get a registered function by ID
   */
  get(id: string): RegisteredFunction | undefined {
    return this.functions.get(id);
  }

  /**
   * Get a registered server tool by ID
   */
  getTool(id: string): ServerTool | undefined {
    return this.tools.get(id);
  }

  /**
   * Check if a function is registered
   */
  has(id: string): boolean {
    return this.functions.has(id);
  }

  hasTool(id: string): boolean {
    return this.tools.has(id);
  }

  /**
   * Get all registered function IDs
   */
  getIds(): Set<string> {
    return new Set(this.functions.keys());
  }

  /**
   * Get all function metadata
   */
  getAllMetadata(): FunctionMetadata[] {
    return Array.from(this.functions.values()).map((fn) => fn.metadata);
  }

  /**
   * Get metadata grouped by category
   */
  getMetadataByCategory(): Map<string, FunctionMetadata[]> {
    const byCategory = new Map<string, FunctionMetadata[]>();
    for (const fn of this.functions.values()) {
      const category = fn.metadata.category ?? "General";
      const list = byCategory.get(category) ?? [];
      list.push(fn.metadata);
      byCategory.set(category, list);
    }
    return byCategory;
  }

  /**
   * Clear all registrations
   */
  clear(): void {
    this.functions.clear();
    this.tools.clear();
  }

  /**
   * Get count of registered functions
   */
  get size(): number {
    return this.functions.size;
  }
}

// ============================================================================
// Registration Helpers
// ============================================================================

/**
 * Helper to create a function registration
 */
export function defineFunction(
  metadata: FunctionMetadata,
  execute: StepFunction,
): RegisteredFunction {
  return { metadata, execute };
}
