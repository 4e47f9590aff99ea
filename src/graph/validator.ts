/**
 * Flow Validation
 * Structural rules every flow must satisfy, plus inference of the flow's
 * inputs, outputs and outgoing branches
 */

import {
  describeType,
  findDuplicateNames,
  hasDefault,
  isAssignable,
  sameType,
} from "../schema/descriptors";
import { checkValue } from "../schema/validator";
import type {
  Descriptor,
  ValidationError,
  ValidationResult,
} from "../schema/types";
import { BRANCH_NEXT, type Step } from "../steps/step";
import type {
  ContextProvider,
  ControlEdge,
  DataEdge,
  Variable,
} from "./types";

/** Everything needed to build a flow */
export interface FlowConfig {
  id: string;
  name: string;
  description?: string;
  beginStep: string;
  steps: readonly Step[];
  controlEdges: readonly ControlEdge[];
  dataEdges: readonly DataEdge[];
  variables: readonly Variable[];
  contextProviders: readonly ContextProvider[];
  /** Restrict the inferred outputs to these names */
  outputs?: readonly string[];
  maxIterations: number;
}

/** Transition table: step → branch → destination (null ends the flow) */
export type Transitions = Map<string, Map<string, string | null>>;

export interface FlowAnalysis {
  validation: ValidationResult;
  transitions: Transitions;
  inputDescriptors: Descriptor[];
  outputDescriptors: Descriptor[];
  outgoingBranches: string[];
}

type Report = (path: string, message: string) => void;

// ============================================================================
// Entry Point
// ============================================================================

/**
 * Validate a flow configuration and infer its interface
 */
export function analyzeFlow(config: FlowConfig): FlowAnalysis {
  const errors: ValidationError[] = [];
  const warnings: ValidationError[] = [];
  const error: Report = (path, message) =>
    errors.push({ path, message, severity: "error" });

  const steps = new Map<string, Step>();
  for (const step of config.steps) {
    if (steps.has(step.name)) {
      error(`/steps/${step.name}`, `Duplicate step name: ${step.name}`);
    }
    steps.set(step.name, step);
  }

  if (config.steps.length === 0) {
    error("/steps", "Flow has no steps");
  }
  if (!steps.has(config.beginStep)) {
    error("/beginStep", `Begin step "${config.beginStep}" does not exist`);
  }
  if (!Number.isInteger(config.maxIterations) || config.maxIterations < 1) {
    error("/maxIterations", "maxIterations must be a positive integer");
  }
  for (const step of config.steps) {
    if (step.kind === "start" && step.name !== config.beginStep) {
      error(
        `/steps/${step.name}`,
        `Start step "${step.name}" must be the begin step`,
      );
    }
  }

  const transitions = validateControlEdges(config, steps, error);
  validateDataEdges(config, steps, error);
  validateVariables(config, error);
  validateContextProviders(config, error);

  const reachable = reachableSteps(config.beginStep, steps, transitions);
  for (const step of config.steps) {
    if (!reachable.has(step.name)) {
      warnings.push({
        path: `/steps/${step.name}`,
        message: `Step "${step.name}" is not reachable from the begin step`,
        severity: "warning",
      });
    }
  }

  const inputDescriptors = inferInputs(config, steps, error);
  const { outputDescriptors, outgoingBranches } = inferOutputs(
    config,
    steps,
    transitions,
    reachable,
    error,
  );

  return {
    validation: { valid: errors.length === 0, errors, warnings },
    transitions,
    inputDescriptors,
    outputDescriptors,
    outgoingBranches,
  };
}

// ============================================================================
// Control Edges
// ============================================================================

function validateControlEdges(
  config: FlowConfig,
  steps: Map<string, Step>,
  error: Report,
): Transitions {
  const transitions: Transitions = new Map();

  for (const edge of config.controlEdges) {
    const path = `/controlEdges/${edge.source}:${edge.branch}`;
    const source = steps.get(edge.source);
    if (!source) {
      error(path, `Control edge source "${edge.source}" does not exist`);
      continue;
    }
    if (!source.branches.includes(edge.branch)) {
      error(path, `Step "${edge.source}" has no branch "${edge.branch}"`);
      continue;
    }
    if (edge.destination !== null && !steps.has(edge.destination)) {
      error(
        path,
        `Control edge destination "${edge.destination}" does not exist`,
      );
      continue;
    }

    let byBranch = transitions.get(edge.source);
    if (!byBranch) {
      byBranch = new Map();
      transitions.set(edge.source, byBranch);
    }
    if (byBranch.has(edge.branch)) {
      error(
        path,
        `Duplicate control edge for branch "${edge.branch}" of step "${edge.source}"`,
      );
      continue;
    }
    byBranch.set(edge.branch, edge.destination);
  }

  for (const step of steps.values()) {
    for (const branch of step.branches) {
      if (!transitions.get(step.name)?.has(branch)) {
        error(
          `/steps/${step.name}`,
          `Branch "${branch}" of step "${step.name}" has no control edge`,
        );
      }
    }
  }

  return transitions;
}

function reachableSteps(
  begin: string,
  steps: Map<string, Step>,
  transitions: Transitions,
): Set<string> {
  const reachable = new Set<string>();
  if (!steps.has(begin)) return reachable;

  const queue = [begin];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || reachable.has(current)) continue;
    reachable.add(current);
    for (const destination of transitions.get(current)?.values() ?? []) {
      if (destination !== null && !reachable.has(destination)) {
        queue.push(destination);
      }
    }
  }
  return reachable;
}

// ============================================================================
// Data Edges
// ============================================================================

function validateDataEdges(
  config: FlowConfig,
  steps: Map<string, Step>,
  error: Report,
): void {
  const graph = new Map<string, Set<string>>();

  for (const edge of config.dataEdges) {
    const path = `/dataEdges/${edge.source}.${edge.output}->${edge.destination}.${edge.input}`;
    const source = steps.get(edge.source);
    const destination = steps.get(edge.destination);
    if (!source) {
      error(path, `Data edge source "${edge.source}" does not exist`);
      continue;
    }
    if (!destination) {
      error(path, `Data edge destination "${edge.destination}" does not exist`);
      continue;
    }

    const output = source.getOutput(edge.output);
    const input = destination.getInput(edge.input);
    if (!output) {
      error(path, `Step "${edge.source}" has no output "${edge.output}"`);
      continue;
    }
    if (!input) {
      error(path, `Step "${edge.destination}" has no input "${edge.input}"`);
      continue;
    }
    if (!isAssignable(output.type, input.type)) {
      error(
        path,
        `Type mismatch: output "${edge.output}" (${describeType(output.type)}) cannot feed input "${edge.input}" (${describeType(input.type)})`,
      );
      continue;
    }

    const targets = graph.get(edge.source) ?? new Set<string>();
    targets.add(edge.destination);
    graph.set(edge.source, targets);
  }

  const cycle = findCycle(graph);
  if (cycle) {
    error("/dataEdges", `Data edges form a cycle: ${cycle.join(" -> ")}`);
  }
}

function findCycle(graph: Map<string, Set<string>>): string[] | null {
  const visiting = new Set<string>();
  const done = new Set<string>();
  const stack: string[] = [];

  const visit = (node: string): string[] | null => {
    if (done.has(node)) return null;
    if (visiting.has(node)) {
      return [...stack.slice(stack.indexOf(node)), node];
    }
    visiting.add(node);
    stack.push(node);
    for (const next of graph.get(node) ?? []) {
      const cycle = visit(next);
      if (cycle) return cycle;
    }
    stack.pop();
    visiting.delete(node);
    done.add(node);
    return null;
  };

  for (const node of graph.keys()) {
    const cycle = visit(node);
    if (cycle) return cycle;
  }
  return null;
}

// ============================================================================
// Variables & Context Providers
// ============================================================================

function validateVariables(config: FlowConfig, error: Report): void {
  const declared = new Map<string, Variable>();
  for (const variable of config.variables) {
    if (declared.has(variable.name)) {
      error(
        `/variables/${variable.name}`,
        `Duplicate variable: ${variable.name}`,
      );
    }
    declared.set(variable.name, variable);

    const problems = checkValue(variable.type, variable.default);
    if (problems.length > 0) {
      error(
        `/variables/${variable.name}`,
        `Default does not match ${describeType(variable.type)}: ${problems.join(", ")}`,
      );
    }
  }

  for (const step of config.steps) {
    for (const used of step.referencedVariables()) {
      const variable = declared.get(used.name);
      if (!variable) {
        error(
          `/steps/${step.name}`,
          `Step "${step.name}" references undeclared variable "${used.name}"`,
        );
      } else if (!sameType(variable.type, used.type)) {
        error(
          `/steps/${step.name}`,
          `Variable "${used.name}" is declared as ${describeType(variable.type)} but step "${step.name}" uses ${describeType(used.type)}`,
        );
      }
    }
  }
}

function validateContextProviders(config: FlowConfig, error: Report): void {
  const ids = new Set<string>();
  for (const provider of config.contextProviders) {
    if (ids.has(provider.id)) {
      error(
        `/contextProviders/${provider.id}`,
        `Duplicate context provider: ${provider.id}`,
      );
    }
    ids.add(provider.id);
  }

  const outputs = config.contextProviders.flatMap((p) => p.outputDescriptors);
  for (const name of findDuplicateNames(outputs)) {
    error(
      "/contextProviders",
      `Several context providers produce "${name}"`,
    );
  }
}

// ============================================================================
// Inputs
// ============================================================================

/**
 * With a start step the flow inputs are its inputs, and every other step
 * input must be resolvable. Without one, unresolvable inputs become the
 * flow's inputs.
 */
function inferInputs(
  config: FlowConfig,
  steps: Map<string, Step>,
  error: Report,
): Descriptor[] {
  const fed = new Set(
    config.dataEdges.map((edge) => `${edge.destination}.${edge.input}`),
  );
  const provided = new Set(
    config.contextProviders.flatMap((p) =>
      p.outputDescriptors.map((d) => d.name),
    ),
  );
  const resolvable = (step: Step, input: Descriptor): boolean =>
    fed.has(`${step.name}.${input.name}`) || provided.has(input.name);

  const begin = steps.get(config.beginStep);
  if (begin?.kind === "start") {
    const flowInputs = new Set(begin.inputDescriptors.map((d) => d.name));
    for (const step of steps.values()) {
      if (step === begin) continue;
      for (const input of step.inputDescriptors) {
        if (
          resolvable(step, input) ||
          flowInputs.has(input.name) ||
          hasDefault(input)
        ) {
          continue;
        }
        error(
          `/steps/${step.name}/inputs/${input.name}`,
          `Input "${input.name}" of step "${step.name}" cannot be resolved`,
        );
      }
    }
    return [...begin.inputDescriptors];
  }

  const inferred = new Map<string, Descriptor>();
  for (const step of config.steps) {
    for (const input of step.inputDescriptors) {
      if (resolvable(step, input)) continue;

      const existing = inferred.get(input.name);
      if (!existing) {
        inferred.set(input.name, input);
        continue;
      }
      if (
        !isAssignable(existing.type, input.type) &&
        !isAssignable(input.type, existing.type)
      ) {
        error(
          `/steps/${step.name}/inputs/${input.name}`,
          `Input "${input.name}" is used as both ${describeType(existing.type)} and ${describeType(input.type)}`,
        );
      } else if (hasDefault(existing) && !hasDefault(input)) {
        inferred.set(input.name, input);
      }
    }
  }
  return [...inferred.values()];
}

// ============================================================================
// Outputs
// ============================================================================

/**
 * Flow outputs are the values produced on every path from the begin step to
 * an exit, except those only the start step produces.
 */
function inferOutputs(
  config: FlowConfig,
  steps: Map<string, Step>,
  transitions: Transitions,
  reachable: Set<string>,
  error: Report,
): { outputDescriptors: Descriptor[]; outgoingBranches: string[] } {
  const outputNames = (name: string): string[] =>
    steps.get(name)?.outputDescriptors.map((d) => d.name) ?? [];

  const universe = new Set(config.steps.flatMap((s) => outputNames(s.name)));
  const available = new Map<string, Set<string>>();
  for (const name of reachable) {
    available.set(
      name,
      name === config.beginStep ? new Set() : new Set(universe),
    );
  }
  const producedAfter = (name: string): Set<string> =>
    new Set([...(available.get(name) ?? []), ...outputNames(name)]);

  let changed = true;
  while (changed) {
    changed = false;
    for (const name of reachable) {
      const produced = producedAfter(name);
      for (const destination of transitions.get(name)?.values() ?? []) {
        if (destination === null) continue;
        const current = available.get(destination);
        if (!current) continue;
        for (const value of [...current]) {
          if (!produced.has(value)) {
            current.delete(value);
            changed = true;
          }
        }
      }
    }
  }

  const exits: Set<string>[] = [];
  const outgoingBranches: string[] = [];
  const addBranch = (branch: string): void => {
    if (!outgoingBranches.includes(branch)) outgoingBranches.push(branch);
  };

  for (const step of config.steps) {
    if (!reachable.has(step.name)) continue;
    if (step.branches.length === 0) {
      exits.push(producedAfter(step.name));
      addBranch(step.endBranch() ?? BRANCH_NEXT);
      continue;
    }
    for (const [branch, destination] of transitions.get(step.name) ?? []) {
      if (destination === null) {
        exits.push(producedAfter(step.name));
        addBranch(branch);
      }
    }
  }

  const begin = steps.get(config.beginStep);
  const declaredElsewhere = (name: string): Descriptor | undefined => {
    for (const step of config.steps) {
      if (!reachable.has(step.name)) continue;
      if (step === begin && step.kind === "start") continue;
      const output = step.getOutput(name);
      if (output) return output;
    }
    return undefined;
  };

  const inferred = new Map<string, Descriptor>();
  if (exits.length > 0) {
    const [first, ...rest] = exits;
    for (const name of first) {
      if (!rest.every((exit) => exit.has(name))) continue;
      const output = declaredElsewhere(name);
      if (output) inferred.set(name, output);
    }
  }

  if (!config.outputs) {
    return { outputDescriptors: [...inferred.values()], outgoingBranches };
  }

  const selected: Descriptor[] = [];
  for (const name of config.outputs) {
    const output = inferred.get(name);
    if (!output) {
      error(
        `/outputs/${name}`,
        `Output "${name}" is not produced on every path to an exit`,
      );
      continue;
    }
    selected.push(output);
  }
  return { outputDescriptors: selected, outgoingBranches };
}
