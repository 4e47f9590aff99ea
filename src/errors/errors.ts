/**
 * ResumeFlow Errors
 *
 * Two families:
 * - Engine errors (GraphError, MissingInputError, IterationLimitError, ...)
 *   describe a broken flow or a misused conversation. They are never caught
 *   by CatchExceptionStep.
 * - Step failures (StepFailure and its subclasses) describe a step that could
 *   not complete. Their `kind` is what CatchExceptionStep routes on.
 */

import type { ValidationError } from "../schema/types";

/** Base class of every error raised by the engine */
export class ResumeFlowError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ============================================================================
// Engine Errors
// ============================================================================

/** A flow failed structural validation */
export class GraphError extends ResumeFlowError {
  readonly issues: ValidationError[];

  constructor(issues: ValidationError[] | string) {
    const list: ValidationError[] =
      typeof issues === "string"
        ? [{ path: "/", message: issues, severity: "error" }]
        : issues;
    super(formatIssues(list));
    this.issues = list;
  }
}

/** A required input had no value when a step (or a flow) was about to run */
export class MissingInputError extends ResumeFlowError {
  constructor(
    readonly stepName: string | null,
    readonly missing: string[],
  ) {
    super(
      stepName === null
        ? `Missing flow input(s): ${missing.join(", ")}`
        : `Step "${stepName}" is missing input(s): ${missing.join(", ")}`,
    );
  }
}

/** A step's visit cap or a flow's iteration cap was exceeded */
export class IterationLimitError extends ResumeFlowError {
  constructor(
    readonly path: string,
    readonly limit: number,
  ) {
    super(`Iteration limit of ${limit} exceeded at "${path}"`);
  }
}

/** A shared variable was written while several map iterations were in flight */
export class SharedVariableConflictError extends ResumeFlowError {
  constructor(
    readonly variable: string,
    readonly inFlight: number,
  ) {
    super(
      `Variable "${variable}" written while ${inFlight} iterations were in flight`,
    );
  }
}

/** A conversation document could not be written or restored */
export class SerializationError extends ResumeFlowError {}

/** A conversation operation was called in a state that does not allow it */
export class ConversationStateError extends ResumeFlowError {}

/** A nested flow was stopped before its next step by the step running it */
export class CancelledError extends ResumeFlowError {
  constructor(readonly path: string) {
    super(`Nested flow at "${path}" was cancelled`);
  }
}

// ============================================================================
// Step Failures
// ============================================================================

/**
 * Failure raised by a step. `kind` defaults to the class name and is the key
 * CatchExceptionStep looks up in its `exceptOn` table.
 */
export class StepFailure extends ResumeFlowError {
  readonly kind: string;

  constructor(message: string, options?: { kind?: string; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.kind = options?.kind ?? new.target.name;
  }
}

/** A value did not match its descriptor */
export class ValidationFailure extends StepFailure {
  constructor(
    message: string,
    readonly path: string = "/",
  ) {
    super(message);
  }
}

/** A tool call failed or was rejected */
export class ToolFailure extends StepFailure {}

// ============================================================================
// Helpers
// ============================================================================

/** True for engine errors that no step may catch */
export function isEngineError(error: unknown): error is ResumeFlowError {
  return error instanceof ResumeFlowError && !(error instanceof StepFailure);
}

/** Kind name used for exception routing */
export function errorKind(error: unknown): string {
  if (error instanceof StepFailure) return error.kind;
  if (error instanceof Error) return error.name;
  return typeof error;
}

/** Human-readable message of any thrown value */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Render validation issues as one message */
export function formatIssues(issues: ValidationError[]): string {
  if (issues.length === 0) return "Invalid flow";
  return issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ");
}
