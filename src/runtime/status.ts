/**
 * Execution Status
 * What a call to `execute()` reports back to the caller
 */

import type { Suspension, ToolRequest } from "../steps/types";

export type ExecutionStatus =
  | {
      type: "finished";
      outputValues: Record<string, unknown>;
      terminalBranch: string;
    }
  | { type: "needs_external_input"; prompt: string | null }
  | { type: "needs_tool_result"; pendingToolCalls: ToolRequest[] }
  | { type: "needs_confirmation"; pendingToolCalls: ToolRequest[] }
  | { type: "interrupted"; reason: string };

export type ExecutionStatusType = ExecutionStatus["type"];

/**
 * Status reported for a root-flow suspension
 */
export function statusFromSuspension(suspension: Suspension): ExecutionStatus {
  switch (suspension.kind) {
    case "needs_user_message":
      return { type: "needs_external_input", prompt: suspension.prompt };
    case "needs_tool_result":
      return {
        type: "needs_tool_result",
        pendingToolCalls: [...suspension.toolRequests],
      };
    case "needs_tool_confirmation":
      return {
        type: "needs_confirmation",
        pendingToolCalls: [...suspension.toolRequests],
      };
  }
}

export function isFinished(
  status: ExecutionStatus | null,
): status is Extract<ExecutionStatus, { type: "finished" }> {
  return status?.type === "finished";
}
