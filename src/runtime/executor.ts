/**
 * Flow Executor
 *
 * Drives one flow execution from its current position until it finishes,
 * suspends or is interrupted. Each step runs through a PocketFlow StepNode;
 * the executor resolves inputs, validates outputs, records produced values
 * and follows control edges. Nested flows of composite steps re-enter the
 * executor with their own state, kept inside the parent state.
 */

import {
  CancelledError,
  ConversationStateError,
  IterationLimitError,
  MissingInputError,
  SerializationError,
  ValidationFailure,
  errorMessage,
} from "../errors";
import { defaultValue, hasDefault } from "../schema/descriptors";
import { validateValue } from "../schema/validator";
import type { Descriptor } from "../schema/types";
import type { Flow } from "../graph/flow";
import type { ContextProvider, ProviderContext } from "../graph/types";
import { invokeStep } from "../pocketflow/nodes";
import { type SharedStore, log, record } from "../pocketflow/shared";
import type { Step } from "../steps/step";
import type {
  FlowRunResult,
  NestedRunOptions,
  StepContext,
  StepResult,
  Suspension,
  VariableStore,
} from "../steps/types";
import type { InterruptMonitor } from "./interrupts";
import {
  createConversationState,
  type ConversationState,
  type PendingWork,
  type ProducedValue,
} from "./state";
import { OverlayVariableStore, StateVariableStore } from "./variables";

// ============================================================================
// Types
// ============================================================================

/** Where a flow execution sits in the conversation */
export interface FlowScope {
  /** Path prefix of the flow's steps; empty for the root flow */
  path: string;
  variables: VariableStore;
  /** Providers visible to the flow, innermost first */
  providers: readonly ScopedProvider[];
}

/** A context provider and the flow that declares it */
export interface ScopedProvider {
  flowId: string;
  provider: ContextProvider;
}

export type DriveResult =
  | FlowRunResult
  | { type: "interrupted"; reason: string };

type Found = { found: true; value: unknown } | { found: false };

export function scopeProviders(flow: Flow): ScopedProvider[] {
  return flow.contextProviders.map((provider) => ({ flowId: flow.id, provider }));
}

// ============================================================================
// Driver
// ============================================================================

/**
 * Run `flow` from the position stored in `state`. `state` is updated in place;
 * errors leave it marked as failed and propagate unchanged.
 */
export async function runFlowState(
  flow: Flow,
  state: ConversationState,
  shared: SharedStore,
  scope: FlowScope,
  monitor?: Pick<InterruptMonitor, "beforeStep">,
): Promise<DriveResult> {
  if (state.flowId !== flow.id) {
    throw new SerializationError(
      `State belongs to flow "${state.flowId}", not "${flow.id}"`,
    );
  }
  if (state.status === "finished" && state.result) {
    return { type: "finished", ...state.result };
  }
  if (state.status === "failed") {
    throw new ConversationStateError(`Flow "${flow.id}" has already failed`);
  }
  state.status = "running";

  while (state.position !== null) {
    const step = flow.getStep(state.position);
    const path = scope.path ? `${scope.path}/${step.name}` : step.name;
    const resuming = state.suspendedStep === step.name;

    if (!resuming && monitor) {
      const reason = monitor.beforeStep(step.name);
      if (reason !== null) {
        state.status = "interrupted";
        log(shared, path, `Interrupted: ${reason}`);
        return { type: "interrupted", reason };
      }
    }

    let result: StepResult;
    let outputs: Record<string, unknown> = {};
    try {
      if (!resuming) countVisit(flow, state, step, path);
      const inputs = await resolveInputs(flow, state, step, path, shared, scope);
      const context = createStepContext(state, step, path, shared, scope);
      result = await invokeStep(shared, { step, path, inputs, context });
      if (result.type === "complete") {
        outputs = checkOutcome(step, path, result.outputs, result.branch);
      }
    } catch (error) {
      state.status = "failed";
      shared.debugCallbacks?.onStepError?.(path, error);
      record(shared, `[✗] ${path}: ${errorMessage(error)}`);
      throw error;
    }

    if (result.type === "suspend") {
      state.status = "suspended";
      state.suspendedStep = step.name;
      state.pendingWork = pendingWorkFor(step.name, result.suspension);
      return { type: "suspended", suspension: result.suspension };
    }

    state.suspendedStep = null;
    state.pendingWork = [];
    recordOutputs(state, step.name, outputs);
    clearStepState(state, step.name);

    if (step.branches.length === 0) {
      return finish(flow, state, result.branch);
    }
    const next = flow.nextStep(step.name, result.branch);
    if (next === null || next === undefined) {
      return finish(flow, state, result.branch);
    }
    state.position = next;
  }

  if (state.result) return { type: "finished", ...state.result };
  throw new ConversationStateError(`Flow "${flow.id}" has no step to run`);
}

// ============================================================================
// Visits
// ============================================================================

function countVisit(
  flow: Flow,
  state: ConversationState,
  step: Step,
  path: string,
): void {
  const visits = (state.visits[step.name] ?? 0) + 1;
  const limit = step.runtime.maxVisits;
  if (limit !== undefined && visits > limit) {
    throw new IterationLimitError(path, limit);
  }
  if (state.iterations + 1 > flow.maxIterations) {
    throw new IterationLimitError(path, flow.maxIterations);
  }
  state.visits[step.name] = visits;
  state.iterations++;
}

// ============================================================================
// Inputs
// ============================================================================

async function resolveInputs(
  flow: Flow,
  state: ConversationState,
  step: Step,
  path: string,
  shared: SharedStore,
  scope: FlowScope,
): Promise<Record<string, unknown>> {
  const inputs: Record<string, unknown> = {};
  const missing: string[] = [];

  for (const input of step.inputDescriptors) {
    const resolved = await resolveInput(flow, state, step, input, shared, scope);
    if (!resolved.found) {
      missing.push(input.name);
      continue;
    }
    const check = validateValue(input, resolved.value);
    if (!check.valid) {
      throw new ValidationFailure(
        `Invalid input "${input.name}" for step "${path}": ${check.errors[0].message}`,
        check.errors[0].path,
      );
    }
    inputs[input.name] = resolved.value;
  }

  if (missing.length > 0) throw new MissingInputError(path, missing);
  return inputs;
}

/**
 * Latest value from a data edge, then a flow input of the same name, then a
 * context provider, then the descriptor default
 */
async function resolveInput(
  flow: Flow,
  state: ConversationState,
  step: Step,
  input: Descriptor,
  shared: SharedStore,
  scope: FlowScope,
): Promise<Found> {
  let latest: ProducedValue | undefined;
  for (const edge of flow.incomingDataEdges(step.name, input.name)) {
    const produced = state.produced[edge.source]?.[edge.output];
    if (produced && (!latest || produced.seq > latest.seq)) latest = produced;
  }
  if (latest) return { found: true, value: latest.value };

  if (Object.hasOwn(state.inputs, input.name)) {
    return { found: true, value: state.inputs[input.name] };
  }

  const provided = await resolveContextValue(input.name, shared, scope);
  if (provided.found) return provided;

  if (hasDefault(input)) return { found: true, value: defaultValue(input) };
  return { found: false };
}

async function resolveContextValue(
  name: string,
  shared: SharedStore,
  scope: FlowScope,
): Promise<Found> {
  for (const scoped of scope.providers) {
    if (!scoped.provider.outputDescriptors.some((d) => d.name === name)) continue;

    const values = await providerValues(scoped, shared, scope);
    return { found: true, value: structuredClone(values[name]) };
  }
  return { found: false };
}

/**
 * Cached values of a provider. Concurrent callers share one evaluation, so a
 * provider runs at most once per conversation.
 */
function providerValues(
  { flowId, provider }: ScopedProvider,
  shared: SharedStore,
  scope: FlowScope,
): Promise<Record<string, unknown>> {
  const key = `${flowId}/${provider.id}`;
  if (Object.hasOwn(shared.contextValues, key)) {
    return Promise.resolve(shared.contextValues[key]);
  }

  let pending = shared.pendingContext.get(key);
  if (!pending) {
    pending = evaluateProvider(provider, shared, scope)
      .then((values) => {
        shared.contextValues[key] = values;
        return values;
      })
      .finally(() => shared.pendingContext.delete(key));
    shared.pendingContext.set(key, pending);
  }
  return pending;
}

async function evaluateProvider(
  provider: ContextProvider,
  shared: SharedStore,
  scope: FlowScope,
): Promise<Record<string, unknown>> {
  const path = `provider:${provider.id}`;
  const context: ProviderContext = {
    conversationId: shared.conversationId,
    messages: () => shared.messages,
    log: (message) => log(shared, path, message),
    runFlow: async (flow, inputs) => {
      const state = createConversationState(flow, inputs);
      const result = await runFlowState(flow, state, shared, {
        path,
        variables: new StateVariableStore(flow, state),
        providers: [...scopeProviders(flow), ...scope.providers],
      });
      if (result.type !== "finished") {
        throw new ConversationStateError(
          `Context provider "${provider.id}" ran a flow that did not finish`,
        );
      }
      return result.outputs;
    },
  };

  const values = await provider.provide(context);
  for (const output of provider.outputDescriptors) {
    const check = validateValue(output, values[output.name]);
    if (!check.valid) {
      throw new ValidationFailure(
        `Context provider "${provider.id}" gave an invalid "${output.name}": ${check.errors[0].message}`,
        check.errors[0].path,
      );
    }
  }
  log(shared, path, `Provided ${provider.outputDescriptors.map((d) => d.name).join(", ")}`);
  return values;
}

// ============================================================================
// Step Context
// ============================================================================

function nestedKey(stepName: string, key: string): string {
  return key === "" ? stepName : `${stepName}#${key}`;
}

function createStepContext(
  state: ConversationState,
  step: Step,
  path: string,
  shared: SharedStore,
  scope: FlowScope,
): StepContext {
  return {
    path,
    conversationId: shared.conversationId,
    variables: scope.variables,

    messages: () => shared.messages,
    appendMessage: (message) => {
      shared.messages.push(message);
    },

    toolResult: (requestId) =>
      Object.hasOwn(shared.toolResults, requestId)
        ? { value: structuredClone(shared.toolResults[requestId]) }
        : undefined,
    toolDecision: (requestId) =>
      Object.hasOwn(shared.toolDecisions, requestId)
        ? shared.toolDecisions[requestId]
        : undefined,
    createRequestId: () => {
      shared.requestCounter++;
      return `tool_${shared.requestCounter}`;
    },

    getStepState: () =>
      Object.hasOwn(state.stepStates, step.name)
        ? state.stepStates[step.name]
        : undefined,
    setStepState: (scratch) => {
      state.stepStates[step.name] = scratch;
    },

    runFlow: (flow, key, inputs, options) =>
      runNested(flow, key, inputs, options, { state, step, path, shared, scope }),
    discardFlow: (key) => {
      delete state.nested[nestedKey(step.name, key)];
    },

    log: (message) => log(shared, path, message),
  };
}

interface Parent {
  state: ConversationState;
  step: Step;
  path: string;
  shared: SharedStore;
  scope: FlowScope;
}

async function runNested(
  flow: Flow,
  key: string,
  inputs: Record<string, unknown>,
  options: NestedRunOptions | undefined,
  parent: Parent,
): Promise<FlowRunResult> {
  const stateKey = nestedKey(parent.step.name, key);
  const providers = [...scopeProviders(flow), ...parent.scope.providers];

  let child: ConversationState | undefined = Object.hasOwn(
    parent.state.nested,
    stateKey,
  )
    ? parent.state.nested[stateKey]
    : undefined;
  if (child && child.flowId !== flow.id) {
    throw new SerializationError(
      `Nested state "${stateKey}" belongs to flow "${child.flowId}", not "${flow.id}"`,
    );
  }
  // A failed or cancelled attempt is replaced, so a retried composite step
  // starts over
  if (!child || child.status === "failed" || child.status === "interrupted") {
    const provided = new Set(
      providers.flatMap((p) => p.provider.outputDescriptors.map((d) => d.name)),
    );
    child = createConversationState(flow, inputs, provided);
    parent.state.nested[stateKey] = child;
  }

  const local = new StateVariableStore(flow, child);
  const variables = options?.sharedVariables
    ? new OverlayVariableStore(
        local,
        options.sharedVariables.names,
        options.sharedVariables.store,
      )
    : local;

  const path = key === "" ? parent.path : `${parent.path}#${key}`;
  const cancelled = options?.cancelled;
  const result = await runFlowState(
    flow,
    child,
    parent.shared,
    { path, variables, providers },
    cancelled
      ? { beforeStep: () => (cancelled() ? "cancelled" : null) }
      : undefined,
  );
  if (result.type === "interrupted" && cancelled?.()) {
    throw new CancelledError(path);
  }
  if (result.type === "interrupted") {
    throw new ConversationStateError(
      `Nested flow "${flow.id}" was interrupted`,
    );
  }
  return result;
}

// ============================================================================
// Outcomes
// ============================================================================

function checkOutcome(
  step: Step,
  path: string,
  produced: Record<string, unknown>,
  branch: string,
): Record<string, unknown> {
  if (step.branches.length > 0 && !step.branches.includes(branch)) {
    throw new ValidationFailure(
      `Step "${path}" chose undeclared branch "${branch}"`,
    );
  }

  const outputs: Record<string, unknown> = {};
  for (const output of step.outputDescriptors) {
    const value = Object.hasOwn(produced, output.name)
      ? produced[output.name]
      : undefined;
    if (value === undefined) {
      if (!hasDefault(output)) {
        throw new ValidationFailure(
          `Step "${path}" did not produce output "${output.name}"`,
          `/${output.name}`,
        );
      }
      outputs[output.name] = defaultValue(output);
      continue;
    }
    const check = validateValue(output, value);
    if (!check.valid) {
      throw new ValidationFailure(
        `Invalid output "${output.name}" of step "${path}": ${check.errors[0].message}`,
        check.errors[0].path,
      );
    }
    outputs[output.name] = value;
  }
  return outputs;
}

function recordOutputs(
  state: ConversationState,
  stepName: string,
  outputs: Record<string, unknown>,
): void {
  const produced = { ...state.produced[stepName] };
  for (const [name, value] of Object.entries(outputs)) {
    state.sequence++;
    produced[name] = { value, seq: state.sequence };
  }
  state.produced[stepName] = produced;
}

function clearStepState(state: ConversationState, stepName: string): void {
  delete state.stepStates[stepName];
  for (const key of Object.keys(state.nested)) {
    if (key === stepName || key.startsWith(`${stepName}#`)) {
      delete state.nested[key];
    }
  }
}

function pendingWorkFor(stepName: string, suspension: Suspension): PendingWork[] {
  switch (suspension.kind) {
    case "needs_user_message":
      return [{ kind: "user_message", step: stepName, prompt: suspension.prompt }];
    case "needs_tool_result":
      return suspension.toolRequests.map((request) => ({
        kind: "tool_result",
        step: stepName,
        request,
      }));
    case "needs_tool_confirmation":
      return suspension.toolRequests.map((request) => ({
        kind: "tool_confirmation",
        step: stepName,
        request,
      }));
  }
}

/** Latest value produced under `name` by any step */
function latestValue(
  state: ConversationState,
  name: string,
): ProducedValue | undefined {
  let latest: ProducedValue | undefined;
  for (const outputs of Object.values(state.produced)) {
    const produced = Object.hasOwn(outputs, name) ? outputs[name] : undefined;
    if (produced && (!latest || produced.seq > latest.seq)) latest = produced;
  }
  return latest;
}

function finish(
  flow: Flow,
  state: ConversationState,
  branch: string,
): DriveResult {
  const outputs: Record<string, unknown> = {};
  for (const output of flow.outputDescriptors) {
    const latest = latestValue(state, output.name);
    if (latest) outputs[output.name] = latest.value;
    else if (hasDefault(output)) outputs[output.name] = defaultValue(output);
  }

  state.position = null;
  state.status = "finished";
  state.stepStates = {};
  state.nested = {};
  state.result = { outputs, branch };
  return { type: "finished", outputs, branch };
}
