/**
 * Map Step
 *
 * Runs a nested flow once per item of a list (or entry of a map) and
 * collects each nested output into a list ordered by item index. Iterations
 * run one after another or concurrently; a suspended iteration resumes
 * without re-running the ones that already finished.
 */

import {
  CancelledError,
  GraphError,
  SharedVariableConflictError,
  ValidationFailure,
} from "../../errors";
import { describeType, descriptor, types } from "../../schema/descriptors";
import type { DescriptorType, JsonValue } from "../../schema/types";
import type { Flow } from "../../graph/flow";
import type { Variable } from "../../graph/types";
import {
  ParallelIterationNode,
  SequentialIterationNode,
  type IterationBatch,
} from "../../pocketflow/nodes";
import { InputMessageStep } from "../core/messages";
import { Step, complete, suspend, type StepRuntime } from "../step";
import type {
  FlowRunResult,
  NestedRunOptions,
  StepContext,
  StepResult,
  Suspension,
  ToolRequest,
  VariableStore,
} from "../types";
import { getPath, isRecord } from "../values";

export const ITERATED_INPUT = "iterated_input";

export interface MapStepConfig {
  name: string;
  flow: Flow;
  /**
   * Nested input → path into the item. "." is the item itself; map entries
   * are `{ _key, _value }`. Defaults to "." for a nested flow with a single
   * input.
   */
  unpackInput?: Record<string, string>;
  /** Nested outputs to collect; defaults to all of them */
  outputs?: readonly string[];
  parallel?: boolean;
  /** Nested variables that read and write the enclosing flow's variables */
  sharedVariables?: readonly string[];
  /** Type of the iterated input; defaults to list<any> */
  iteratedType?: DescriptorType;
  runtime?: StepRuntime;
}

type IterationResults = (Record<string, unknown> | null)[];

export class MapStep extends Step {
  readonly kind = "map";
  readonly flow: Flow;
  readonly unpackInput: Readonly<Record<string, string>>;
  readonly collected: readonly string[];
  readonly parallel: boolean;
  readonly sharedVariables: readonly Variable[];
  private readonly passthrough: readonly string[];

  constructor(config: MapStepConfig) {
    const { flow } = config;
    const fail = (message: string): never => {
      throw new GraphError(`Map step "${config.name}": ${message}`);
    };

    const unpackInput =
      config.unpackInput ??
      (flow.inputDescriptors.length === 1
        ? { [flow.inputDescriptors[0].name]: "." }
        : {});
    for (const [input, path] of Object.entries(unpackInput)) {
      if (!flow.getInput(input)) fail(`nested flow has no input "${input}"`);
      if (!path.startsWith(".")) fail(`unpack path "${path}" must start with "."`);
    }

    const passthrough = flow.inputDescriptors.filter(
      (d) => !Object.hasOwn(unpackInput, d.name),
    );
    if (passthrough.some((d) => d.name === ITERATED_INPUT)) {
      fail(`nested input "${ITERATED_INPUT}" must be unpacked`);
    }

    if (config.parallel) {
      const waiting = userInputSteps(flow);
      if (waiting.length > 0) {
        fail(
          `parallel iterations cannot wait for user messages (${waiting.join(", ")})`,
        );
      }
    }

    const iteratedType = config.iteratedType ?? types.list();
    if (iteratedType.kind !== "list" && iteratedType.kind !== "map") {
      fail(`cannot iterate over ${describeType(iteratedType)}`);
    }

    const collected =
      config.outputs ?? flow.outputDescriptors.map((d) => d.name);
    const outputs = collected.map((name) => {
      const output = flow.getOutput(name);
      if (!output) return fail(`nested flow has no output "${name}"`);
      return descriptor(name, types.list(output.type));
    });

    const sharedVariables = (config.sharedVariables ?? []).map((name) => {
      const shared = flow.getVariable(name);
      if (!shared) return fail(`nested flow has no variable "${name}"`);
      return shared;
    });

    super({
      name: config.name,
      inputs: [descriptor(ITERATED_INPUT, iteratedType), ...passthrough],
      outputs,
      runtime: config.runtime,
    });
    this.flow = flow;
    this.unpackInput = Object.freeze({ ...unpackInput });
    this.collected = Object.freeze([...collected]);
    this.parallel = config.parallel ?? false;
    this.sharedVariables = Object.freeze(sharedVariables);
    this.passthrough = Object.freeze(passthrough.map((d) => d.name));
  }

  async invoke(
    inputs: Record<string, unknown>,
    context: StepContext,
  ): Promise<StepResult> {
    const items = this.items(inputs[ITERATED_INPUT]);
    const results = this.restoreResults(context, items.length);
    const pending = results.flatMap((r, i) => (r === null ? [i] : []));
    const passthrough = Object.fromEntries(
      this.passthrough.map((name) => [name, inputs[name]]),
    );

    let inFlight = 0;
    const guarded: VariableStore = {
      has: (name) => context.variables.has(name),
      read: (name) => context.variables.read(name),
      write: (name, value) => {
        if (inFlight > 1) throw new SharedVariableConflictError(name, inFlight);
        context.variables.write(name, value);
      },
    };
    const options: NestedRunOptions = {
      cancelled: () => batch.aborted,
      ...(this.sharedVariables.length > 0
        ? {
            sharedVariables: {
              names: this.sharedVariables.map((v) => v.name),
              store: guarded,
            },
          }
        : {}),
    };

    const batch: IterationBatch = {
      indices: pending,
      outcomes: new Map(),
      halted: false,
      aborted: false,
      run: async (index): Promise<FlowRunResult> => {
        inFlight++;
        try {
          const key = String(index);
          const result = await context.runFlow(
            this.flow,
            key,
            { ...passthrough, ...this.unpack(items[index]) },
            options,
          );
          if (result.type === "finished") {
            results[index] = Object.fromEntries(
              this.collected.map((name) => [name, result.outputs[name]]),
            );
            context.discardFlow(key);
          }
          return result;
        } finally {
          inFlight--;
        }
      },
    };

    context.log(
      `Running ${pending.length} of ${items.length} iterations ${this.parallel ? "in parallel" : "sequentially"}`,
    );
    const node = this.parallel
      ? new ParallelIterationNode()
      : new SequentialIterationNode();
    await node.run(batch);

    // Lowest failed iteration wins; results of the others are discarded
    for (const index of pending) {
      const outcome = batch.outcomes.get(index);
      if (outcome?.type === "failed" && !(outcome.error instanceof CancelledError)) {
        throw outcome.error;
      }
    }

    const suspensions: Suspension[] = [];
    for (const index of pending) {
      const outcome = batch.outcomes.get(index);
      if (outcome?.type === "suspended") suspensions.push(outcome.suspension);
    }
    if (suspensions.length > 0) {
      context.setStepState({ results });
      return suspend(mergeSuspensions(suspensions));
    }

    return complete(
      Object.fromEntries(
        this.collected.map((name) => [
          name,
          results.map((result) => result?.[name]),
        ]),
      ),
    );
  }

  referencedVariables(): readonly Variable[] {
    return this.sharedVariables;
  }

  subflows(): readonly Flow[] {
    return [this.flow];
  }

  describe(): Record<string, JsonValue> {
    return {
      flow: this.flow.id,
      unpackInput: { ...this.unpackInput },
      collected: [...this.collected],
      parallel: this.parallel,
      sharedVariables: this.sharedVariables.map((v) => v.name),
    };
  }

  private items(value: unknown): unknown[] {
    if (Array.isArray(value)) return value;
    if (isRecord(value)) {
      return Object.entries(value).map(([key, entry]) => ({
        _key: key,
        _value: entry,
      }));
    }
    throw new ValidationFailure(
      `Map step "${this.name}" expects a list or a map to iterate over`,
      `/${ITERATED_INPUT}`,
    );
  }

  private unpack(item: unknown): Record<string, unknown> {
    const inputs: Record<string, unknown> = {};
    for (const [input, path] of Object.entries(this.unpackInput)) {
      const value = path === "." ? item : getPath(item, path.slice(1));
      if (value !== undefined) inputs[input] = value;
    }
    return inputs;
  }

  private restoreResults(context: StepContext, count: number): IterationResults {
    const stored = context.getStepState()?.results;
    if (Array.isArray(stored) && stored.length === count) {
      return stored.map((entry) => (isRecord(entry) ? entry : null));
    }
    return new Array<Record<string, unknown> | null>(count).fill(null);
  }
}

/** Paths of the user input steps of a flow and of its nested flows */
function userInputSteps(flow: Flow): string[] {
  const found: string[] = [];
  for (const step of flow.steps.values()) {
    if (step instanceof InputMessageStep) found.push(step.name);
    for (const subflow of step.subflows()) {
      found.push(...userInputSteps(subflow).map((name) => `${step.name}/${name}`));
    }
  }
  return found;
}

/**
 * The lowest suspended iteration decides the kind; tool requests of that
 * kind from every suspended iteration are reported together
 */
function mergeSuspensions(suspensions: Suspension[]): Suspension {
  const [first] = suspensions;
  if (first.kind === "needs_user_message") return first;

  const toolRequests: ToolRequest[] = [];
  for (const suspension of suspensions) {
    if (
      suspension.kind !== "needs_user_message" &&
      suspension.kind === first.kind
    ) {
      toolRequests.push(...suspension.toolRequests);
    }
  }
  return { kind: first.kind, toolRequests };
}
