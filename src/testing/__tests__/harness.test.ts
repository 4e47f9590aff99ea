/**
 * Testing Harness Tests
 */

import { describe, it, expect } from "vitest";
import { FlowBuilder } from "../../graph/builder";
import { Conversation } from "../../runtime/conversation";
import { descriptor, types } from "../../schema/descriptors";
import { StepFailure } from "../../errors";
import {
  EndStep,
  FunctionStep,
  InputMessageStep,
  StartStep,
  ToolExecutionStep,
  clientTool,
} from "../../steps";
import type { ToolRequest } from "../../steps/types";
import {
  StepSpy,
  assert,
  assertEqual,
  deepEqual,
  runScripted,
  testFlow,
} from "../harness";

// ============================================================================
// Fixtures
// ============================================================================

function weatherFlow() {
  const weather = clientTool({
    name: "weather",
    parameters: [descriptor("city", types.string())],
    output: descriptor("forecast", types.string()),
    requiresConfirmation: true,
  });
  return new FlowBuilder("weather")
    .addEdge(new ToolExecutionStep({ name: "lookup", tool: weather }), null)
    .build();
}

function adderFlow() {
  const start = new StartStep({
    inputs: [descriptor("a", types.int()), descriptor("b", types.int())],
  });
  const sum = new FunctionStep({
    name: "sum",
    inputs: [descriptor("a", types.int()), descriptor("b", types.int())],
    outputs: [descriptor("total", types.int())],
    run: ({ a, b }) => ({ outputs: { total: Number(a) + Number(b) } }),
  });
  return new FlowBuilder("adder").addSequence(start, sum, new EndStep()).build();
}

// ============================================================================
// runScripted
// ============================================================================

describe("runScripted", () => {
  it("should answer confirmations and tool results from the script", async () => {
    const flow = weatherFlow();

    const run = await runScripted(Conversation.start(flow, { city: "Oslo" }), {
      decisions: { weather: true },
      toolResults: {
        weather: (request: ToolRequest) =>
          `sunny in ${String(request.args.city)}`,
      },
    });

    expect(run.statuses.map((s) => s.type)).toEqual([
      "needs_confirmation",
      "needs_tool_result",
      "finished",
    ]);
    expect(run.rounds).toBe(3);
    expect(run.status).toEqual({
      type: "finished",
      outputValues: { forecast: "sunny in Oslo" },
      terminalBranch: "next",
    });
  });

  it("should reject with the scripted reason", async () => {
    const run = await runScripted(
      Conversation.start(weatherFlow(), { city: "Oslo" }),
      { decisions: { weather: { reject: "not now" } } },
      { serializeBetweenRounds: weatherFlow() },
    );

    expect(run.rounds).toBe(2);
    expect(run.status).toEqual({
      type: "finished",
      outputValues: { forecast: "Tool execution rejected by the user: not now" },
      terminalBranch: "next",
    });
  });

  it("should fail when the script runs out of messages", async () => {
    const flow = new FlowBuilder("ask")
      .addEdge(new InputMessageStep({ name: "ask", prompt: "Name?" }), null)
      .build();

    await expect(runScripted(Conversation.start(flow))).rejects.toThrow(
      "Script ran out of user messages (prompt: Name?)",
    );
  });

  it("should give up after maxRounds", async () => {
    await expect(
      runScripted(
        Conversation.start(weatherFlow(), { city: "Oslo" }),
        { decisions: { weather: true }, toolResults: { weather: "rain" } },
        { maxRounds: 1 },
      ),
    ).rejects.toThrow("Conversation did not finish within 1 rounds");
  });
});

// ============================================================================
// testFlow
// ============================================================================

describe("testFlow", () => {
  it("should pass when outputs and branch match", async () => {
    const result = await testFlow(weatherFlow(), {
      inputs: { city: "Oslo" },
      script: { decisions: { weather: true }, toolResults: { weather: "rain" } },
      serializeBetweenRounds: true,
      expectedOutputs: { forecast: "rain" },
      expectedBranch: "next",
    });

    expect(result.passed).toBe(true);
    expect(result.failures).toEqual([]);
    expect(result.rounds).toBe(3);
    expect(result.logs).toContain("[lookup] Tool call tool_1 confirmed");
  });

  it("should collect failures for mismatched outputs", async () => {
    const result = await testFlow(adderFlow(), {
      inputs: { a: 1, b: 2 },
      expectedOutputs: { total: 4 },
    });

    expect(result.passed).toBe(false);
    expect(result.outputs).toEqual({ total: 3 });
    expect(result.failures).toEqual(["Expected outputs.total=4, got 3"]);
  });

  it("should pass when the expected error occurs", async () => {
    const explode = new FunctionStep({
      name: "explode",
      run: () => {
        throw new StepFailure("disk full");
      },
    });
    const flow = new FlowBuilder("fragile").addEdge(explode, null).build();

    const result = await testFlow(flow, { expectedError: "disk" });

    expect(result.passed).toBe(true);
    expect(result.error).toBe("disk full");
  });

  it("should fail on an unexpected error", async () => {
    const result = await testFlow(adderFlow(), { inputs: { a: 1 } });

    expect(result.passed).toBe(false);
    expect(result.failures).toEqual([
      "Unexpected error: Missing flow input(s): b",
    ]);
  });
});

// ============================================================================
// StepSpy
// ============================================================================

describe("StepSpy", () => {
  it("should record inputs, outputs and branches", async () => {
    const spy = new StepSpy();
    const conversation = Conversation.start(
      adderFlow(),
      { a: 1, b: 2 },
      { debugCallbacks: spy.getCallbacks() },
    );

    await conversation.execute();

    expect(spy.getCalls().map((call) => call.path)).toEqual([
      "start",
      "sum",
      "end",
    ]);
    const [sum] = spy.getCallsForStep("sum");
    expect(sum.inputs).toEqual({ a: 1, b: 2 });
    expect(sum.outcome).toBe("completed");
    expect(sum.branch).toBe("next");
    expect(sum.outputs).toEqual({ total: 3 });
    expect(spy.wasStepCalled("end")).toBe(true);

    spy.reset();
    expect(spy.getCalls()).toEqual([]);
  });

  it("should record suspensions", async () => {
    const spy = new StepSpy();
    const flow = new FlowBuilder("ask")
      .addEdge(new InputMessageStep({ name: "ask" }), null)
      .build();

    await Conversation.start(flow, {}, {
      debugCallbacks: spy.getCallbacks(),
    }).execute();

    expect(spy.getCallsForStep("ask").map((call) => call.outcome)).toEqual([
      "suspended",
    ]);
  });
});

// ============================================================================
// Assertion Helpers
// ============================================================================

describe("deepEqual", () => {
  it("should compare nested values", () => {
    expect(deepEqual({ a: [1, { b: 2 }] }, { a: [1, { b: 2 }] })).toBe(true);
    expect(deepEqual({ a: [1, { b: 2 }] }, { a: [1, { b: 3 }] })).toBe(false);
    expect(deepEqual([1, 2], { 0: 1, 1: 2 })).toBe(false);
    expect(deepEqual(new Date(5), new Date(5))).toBe(true);
    expect(deepEqual(null, undefined)).toBe(false);
  });
});

describe("assert helpers", () => {
  it("should throw with the given message", () => {
    expect(() => assert(false, "flag not set")).toThrow(
      "Assertion failed: flag not set",
    );
    expect(() => assertEqual({ n: 1 }, { n: 2 })).toThrow(
      'Assertion failed: Expected {"n":2}, got {"n":1}',
    );
    expect(() => assertEqual([1], [1])).not.toThrow();
  });
});
