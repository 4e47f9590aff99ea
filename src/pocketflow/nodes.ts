/**
 * ResumeFlow Node Types
 *
 * Thin wrappers over PocketFlow node classes:
 * - StepNode → Node: one step invocation, with the step's retry settings
 * - SequentialIterationNode → BatchNode: map iterations one after another
 * - ParallelIterationNode → ParallelBatchNode: map iterations concurrently
 */

import { BatchNode, Node, ParallelBatchNode } from "pocketflow";
import { ResumeFlowError } from "../errors";
import type { Step } from "../steps/step";
import type { FlowRunResult, StepContext, StepResult } from "../steps/types";
import { type SharedStore, record } from "./shared";

// ============================================================================
// StepNode - Maps to PocketFlow Node
// Single step invocation with retry logic
// ============================================================================

export interface StepInvocation {
  step: Step;
  path: string;
  inputs: Record<string, unknown>;
  context: StepContext;
}

export class StepNode extends Node<SharedStore> {
  private result: StepResult | null = null;

  constructor(private readonly invocation: StepInvocation) {
    super(
      invocation.step.runtime.maxRetries ?? 1,
      (invocation.step.runtime.retryDelay ?? 0) / 1000,
    );
  }

  async prep(shared: SharedStore): Promise<StepInvocation> {
    shared.debugCallbacks?.onStepStart?.(
      this.invocation.path,
      this.invocation.inputs,
    );
    return this.invocation;
  }

  async exec(invocation: StepInvocation): Promise<StepResult> {
    return invocation.step.invoke(invocation.inputs, invocation.context);
  }

  async post(
    shared: SharedStore,
    invocation: StepInvocation,
    result: StepResult,
  ): Promise<string | undefined> {
    this.result = result;

    if (result.type === "complete") {
      shared.debugCallbacks?.onStepComplete?.(
        invocation.path,
        result.branch,
        result.outputs,
      );
      record(shared, `[✓] ${invocation.path}: completed (${result.branch})`);
    } else {
      shared.debugCallbacks?.onStepSuspend?.(invocation.path, result.suspension);
      record(
        shared,
        `[…] ${invocation.path}: suspended (${result.suspension.kind})`,
      );
    }

    // Return action for edge routing
    return result.type === "complete" ? result.branch : undefined;
  }

  getResult(): StepResult | null {
    return this.result;
  }
}

/**
 * Run one step invocation through a StepNode
 */
export async function invokeStep(
  shared: SharedStore,
  invocation: StepInvocation,
): Promise<StepResult> {
  const node = new StepNode(invocation);
  await node.run(shared);
  const result = node.getResult();
  if (!result) {
    throw new ResumeFlowError(
      `Step "${invocation.path}" finished without a result`,
    );
  }
  return result;
}

// ============================================================================
// Iteration Nodes - Map to PocketFlow BatchNode / ParallelBatchNode
// ============================================================================

/** Outcome of one map iteration; skipped ones did not run this time */
export type IterationOutcome =
  | FlowRunResult
  | { type: "skipped" }
  | { type: "failed"; error: unknown };

export interface IterationBatch {
  /** Iteration indices to run, in order */
  indices: number[];
  run(index: number): Promise<FlowRunResult>;
  outcomes: Map<number, IterationOutcome>;
  /** Set once a sequential batch hits a suspension */
  halted: boolean;
  /** Set once an iteration of a parallel batch fails */
  aborted: boolean;
}

interface IterationItem {
  index: number;
  batch: IterationBatch;
}

function iterationItems(batch: IterationBatch): IterationItem[] {
  return batch.indices.map((index) => ({ index, batch }));
}

function collectOutcomes(
  batch: IterationBatch,
  items: IterationItem[],
  outcomes: IterationOutcome[],
): void {
  items.forEach((item, i) => batch.outcomes.set(item.index, outcomes[i]));
}

/**
 * Runs iterations in index order and starts no new one after a suspension
 */
export class SequentialIterationNode extends BatchNode<IterationBatch> {
  async prep(batch: IterationBatch): Promise<IterationItem[]> {
    return iterationItems(batch);
  }

  async exec(item: IterationItem): Promise<IterationOutcome> {
    if (item.batch.halted) return { type: "skipped" };
    const outcome = await item.batch.run(item.index);
    if (outcome.type === "suspended") item.batch.halted = true;
    return outcome;
  }

  async post(
    batch: IterationBatch,
    items: IterationItem[],
    outcomes: IterationOutcome[],
  ): Promise<string | undefined> {
    collectOutcomes(batch, items, outcomes);
    return undefined;
  }
}

/**
 * Runs every iteration concurrently. Failures are settled per item, so the
 * node returns only after every iteration has stopped.
 */
export class ParallelIterationNode extends ParallelBatchNode<IterationBatch> {
  async prep(batch: IterationBatch): Promise<IterationItem[]> {
    return iterationItems(batch);
  }

  async exec(item: IterationItem): Promise<IterationOutcome> {
    if (item.batch.aborted) return { type: "skipped" };
    try {
      return await item.batch.run(item.index);
    } catch (error) {
      item.batch.aborted = true;
      return { type: "failed", error };
    }
  }

  async post(
    batch: IterationBatch,
    items: IterationItem[],
    outcomes: IterationOutcome[],
  ): Promise<string | undefined> {
    collectOutcomes(batch, items, outcomes);
    return undefined;
  }
}
