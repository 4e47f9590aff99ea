/**
 * Execution Interrupts
 * Checked before each step of the root flow; a non-null reason stops
 * `execute()` with an `interrupted` status. The conversation stays resumable.
 */

export interface InterruptCheck {
  stepName: string;
  /** Root-flow steps started during this `execute()` call */
  stepsExecuted: number;
  /** Milliseconds since this `execute()` call began */
  elapsedMs: number;
}

export interface ExecutionInterrupt {
  check(info: InterruptCheck): string | null;
}

/**
 * Stops after a fixed number of steps per `execute()` call
 */
export class StepLimitInterrupt implements ExecutionInterrupt {
  constructor(private readonly maxSteps: number) {}

  check(info: InterruptCheck): string | null {
    return info.stepsExecuted >= this.maxSteps
      ? `Step limit of ${this.maxSteps} reached before "${info.stepName}"`
      : null;
  }
}

/**
 * Stops at the first step boundary after a time budget is spent
 */
export class SoftTimeoutInterrupt implements ExecutionInterrupt {
  constructor(private readonly timeoutMs: number) {}

  check(info: InterruptCheck): string | null {
    return info.elapsedMs >= this.timeoutMs
      ? `Soft timeout of ${this.timeoutMs}ms reached before "${info.stepName}"`
      : null;
  }
}

/**
 * Per-call bookkeeping for interrupt checks
 */
export class InterruptMonitor {
  private readonly startedAt = Date.now();
  private stepsExecuted = 0;

  constructor(private readonly interrupts: readonly ExecutionInterrupt[]) {}

  /** Reason to stop before `stepName`, or null to run it */
  beforeStep(stepName: string): string | null {
    const info: InterruptCheck = {
      stepName,
      stepsExecuted: this.stepsExecuted,
      elapsedMs: Date.now() - this.startedAt,
    };
    for (const interrupt of this.interrupts) {
      const reason = interrupt.check(info);
      if (reason !== null) return reason;
    }
    this.stepsExecuted++;
    return null;
  }
}
