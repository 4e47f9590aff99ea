/**
 * Conversation Tests
 */

import { describe, it, expect, vi } from "vitest";
import {
  ConversationStateError,
  MissingInputError,
  SerializationError,
  StepFailure,
  ValidationFailure,
} from "../../errors";
import { FlowBuilder } from "../../graph/builder";
import { descriptor, types } from "../../schema/descriptors";
import {
  EndStep,
  FunctionStep,
  InputMessageStep,
  OutputMessageStep,
  StartStep,
} from "../../steps";
import { runScripted } from "../../testing/harness";
import { Conversation, startConversation } from "../conversation";

// ============================================================================
// Fixtures
// ============================================================================

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

function greetFlow(template = "Hi {{user_provided_input}}") {
  const ask = new InputMessageStep({ name: "ask", prompt: "Name?" });
  const greet = new OutputMessageStep({ name: "greet", template });
  return new FlowBuilder("greet")
    .addSequence(ask, greet)
    .addEdge(greet, null)
    .addDataEdge(ask, greet, "user_provided_input")
    .build();
}

// ============================================================================
// Starting
// ============================================================================

describe("Conversation.start", () => {
  it("should require every flow input without a default", () => {
    expect(() => Conversation.start(adderFlow(), { b: 1 })).toThrow(
      new MissingInputError(null, ["a"]),
    );
    expect(() => Conversation.start(adderFlow(), { b: 1 })).toThrow(
      "Missing flow input(s): a",
    );
  });

  it("should reject inputs the flow does not declare", () => {
    expect(() =>
      Conversation.start(adderFlow(), { a: 1, b: 2, c: 3 }),
    ).toThrow('Flow "adder" has no input "c"');
  });

  it("should validate input values against their types", () => {
    expect(() => Conversation.start(adderFlow(), { a: "one", b: 2 })).toThrow(
      ValidationFailure,
    );
    expect(() => Conversation.start(adderFlow(), { a: "one", b: 2 })).toThrow(
      'Invalid input "a" for flow "adder": expected int: must be integer',
    );
  });

  it("should reject inputs that cannot be saved as JSON", () => {
    expect(() =>
      Conversation.start(adderFlow(), { a: 1, b: Number.NaN }),
    ).toThrow(new SerializationError("Non-finite number at /b"));
  });

  it("should use the given conversation id and log the start", () => {
    const onLog = vi.fn();
    const conversation = startConversation(
      adderFlow(),
      { a: 1, b: 2 },
      { conversationId: "conv_fixed", onLog },
    );

    expect(conversation.conversationId).toBe("conv_fixed");
    expect(conversation.flowId).toBe("adder");
    expect(conversation.status).toBeNull();
    expect(conversation.executionState).toBe("running");
    expect(onLog).toHaveBeenCalledWith("[adder] Conversation conv_fixed started");
  });

  it("should generate an id when none is given", () => {
    const conversation = Conversation.start(adderFlow(), { a: 1, b: 2 });

    expect(conversation.conversationId).toMatch(/^conv_\d+_[a-z0-9]+$/);
  });
});

// ============================================================================
// Execution
// ============================================================================

describe("Conversation.execute", () => {
  it("should run a flow to completion", async () => {
    const conversation = Conversation.start(
      adderFlow(),
      { a: 1, b: 2 },
      { conversationId: "conv_fixed" },
    );

    const status = await conversation.execute();

    expect(status).toEqual({
      type: "finished",
      outputValues: { total: 3 },
      terminalBranch: "next",
    });
    expect(conversation.executionState).toBe("finished");
    expect(conversation.logs).toEqual([
      "[adder] Conversation conv_fixed started",
      "[✓] start: completed (next)",
      "[✓] sum: completed (next)",
      "[✓] end: completed (next)",
    ]);
  });

  it("should send every log line to onLog", async () => {
    const onLog = vi.fn();
    const conversation = Conversation.start(
      greetFlow(),
      {},
      { conversationId: "conv_fixed", onLog },
    );

    await conversation.execute();

    expect(onLog.mock.calls.map(([line]) => line)).toEqual([
      "[greet] Conversation conv_fixed started",
      "[…] ask: suspended (needs_user_message)",
    ]);
    expect(onLog.mock.calls.map(([line]) => line)).toEqual(conversation.logs);
  });

  it("should return the stored result when executed again", async () => {
    const conversation = Conversation.start(adderFlow(), { a: 4, b: 5 });
    await conversation.execute();
    const logCount = conversation.logs.length;

    const status = await conversation.execute();

    expect(status).toEqual({
      type: "finished",
      outputValues: { total: 9 },
      terminalBranch: "next",
    });
    expect(conversation.logs).toHaveLength(logCount);
  });

  it("should refuse new values once finished", async () => {
    const conversation = Conversation.start(
      adderFlow(),
      { a: 1, b: 2 },
      { conversationId: "conv_fixed" },
    );
    await conversation.execute();

    expect(() => conversation.supplyUserMessage("late")).toThrow(
      new ConversationStateError('Conversation "conv_fixed" is finished'),
    );
  });

  it("should suspend for a user message and resume", async () => {
    const conversation = Conversation.start(greetFlow());

    expect(await conversation.execute()).toEqual({
      type: "needs_external_input",
      prompt: "Name?",
    });
    expect(conversation.pendingWork).toEqual([
      { kind: "user_message", step: "ask", prompt: "Name?" },
    ]);

    conversation.supplyUserMessage("Ada");
    const status = await conversation.execute();

    expect(status).toEqual({
      type: "finished",
      outputValues: { user_provided_input: "Ada", output_message: "Hi Ada" },
      terminalBranch: "next",
    });
    expect(conversation.pendingWork).toEqual([]);
    expect(conversation.messages).toEqual([
      { role: "agent", content: "Name?" },
      { role: "user", content: "Ada" },
      { role: "agent", content: "Hi Ada" },
    ]);
  });

  it("should reject a tool result nobody asked for", async () => {
    const conversation = Conversation.start(greetFlow());
    await conversation.execute();

    expect(() => conversation.supplyToolResult("tool_1", "x")).toThrow(
      'No request "tool_1" is waiting for a tool result',
    );
    expect(() => conversation.confirmTool("tool_1")).toThrow(
      'No request "tool_1" is waiting for a confirmation decision',
    );
  });

  it("should fail the conversation when a step throws", async () => {
    const explode = new FunctionStep({
      name: "explode",
      run: () => {
        throw new StepFailure("boom");
      },
    });
    const flow = new FlowBuilder("fragile").addEdge(explode, null).build();
    const conversation = Conversation.start(flow, {}, {
      conversationId: "conv_fixed",
    });

    await expect(conversation.execute()).rejects.toThrow("boom");

    expect(conversation.executionState).toBe("failed");
    expect(conversation.logs.at(-1)).toBe("[✗] explode: boom");
    await expect(conversation.execute()).rejects.toThrow(
      'Conversation "conv_fixed" has failed and cannot continue',
    );
    expect(() => conversation.supplyUserMessage("retry")).toThrow(
      'Conversation "conv_fixed" is failed',
    );
  });
});

// ============================================================================
// Serialization
// ============================================================================

describe("Conversation serialization", () => {
  it("should give the same result when resumed from a saved document", async () => {
    const flow = greetFlow();

    const direct = await runScripted(Conversation.start(flow), {
      userMessages: ["Ada"],
    });
    const saved = await runScripted(
      Conversation.start(flow, {}, { conversationId: "conv_saved" }),
      { userMessages: ["Ada"] },
      { serializeBetweenRounds: flow },
    );

    expect(saved.status).toEqual(direct.status);
    expect(saved.rounds).toBe(2);
    expect(saved.conversation.conversationId).toBe("conv_saved");
    expect(saved.conversation.messages).toEqual(direct.conversation.messages);
  });

  it("should keep the start time and last status", async () => {
    const flow = greetFlow();
    const conversation = Conversation.start(flow);
    await conversation.execute();

    const restored = Conversation.deserialize(conversation.serialize(), flow);

    expect(restored.startedAt.getTime()).toBe(conversation.startedAt.getTime());
    expect(restored.status).toEqual({
      type: "needs_external_input",
      prompt: "Name?",
    });
    expect(restored.executionState).toBe("suspended");
  });

  it("should find the flow through a map or a lookup function", async () => {
    const flow = greetFlow();
    const conversation = Conversation.start(flow);
    await conversation.execute();
    const text = conversation.serialize();

    expect(
      Conversation.deserialize(text, new Map([["greet", flow]])).flowId,
    ).toBe("greet");
    expect(
      Conversation.deserialize(text, (id) => (id === "greet" ? flow : undefined))
        .flowId,
    ).toBe("greet");
  });

  it("should refuse a flow that is not available", async () => {
    const conversation = Conversation.start(greetFlow(), {}, {
      conversationId: "conv_fixed",
    });
    await conversation.execute();

    expect(() =>
      Conversation.deserialize(conversation.serialize(), new Map()),
    ).toThrow('Flow "greet" of conversation "conv_fixed" is not available');
  });

  it("should refuse a flow that changed since the save", async () => {
    const conversation = Conversation.start(greetFlow(), {}, {
      conversationId: "conv_fixed",
    });
    await conversation.execute();

    expect(() =>
      Conversation.deserialize(
        conversation.serialize(),
        greetFlow("Hello {{user_provided_input}}"),
      ),
    ).toThrow(
      'Flow "greet" has changed since conversation "conv_fixed" was saved',
    );
  });
});
