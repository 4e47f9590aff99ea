/**
 * Serializer Tests
 */

import { describe, it, expect } from "vitest";
import { FlowBuilder } from "../../graph/builder";
import { InputMessageStep } from "../../steps";
import { Conversation } from "../conversation";
import {
  CONVERSATION_FORMAT_VERSION,
  assertJsonSafe,
  decodeConversation,
  encodeConversation,
} from "../serializer";

// ============================================================================
// JSON Safety
// ============================================================================

describe("assertJsonSafe", () => {
  it("should accept plain JSON values", () => {
    const shared = { ok: true };

    expect(() =>
      assertJsonSafe({
        list: [1, "two", null, false],
        nested: { a: shared, b: shared },
        skipped: undefined,
      }),
    ).not.toThrow();
  });

  it.each([
    [Number.NaN, "Non-finite number at /"],
    [{ list: [1, Number.POSITIVE_INFINITY] }, "Non-finite number at /list/1"],
    [{ run: () => 1 }, "Value of type function at /run is not JSON-serializable"],
    [undefined, "Value of type undefined at / is not JSON-serializable"],
    [{ when: new Date(0) }, "Instance of Date at /when is not JSON-serializable"],
    [[new Map()], "Instance of Map at /0 is not JSON-serializable"],
  ])("should reject %o", (value, message) => {
    expect(() => assertJsonSafe(value)).toThrow(message);
  });

  it("should reject circular references", () => {
    const node: Record<string, unknown> = { name: "loop" };
    node.self = node;

    expect(() => assertJsonSafe(node)).toThrow("Circular reference at /self");
  });

  it("should prefix the given path", () => {
    expect(() => assertJsonSafe({ n: Number.NaN }, "/toolResults/tool_1")).toThrow(
      "Non-finite number at /toolResults/tool_1/n",
    );
  });
});

// ============================================================================
// Documents
// ============================================================================

async function suspendedDocument() {
  const flow = new FlowBuilder("ask")
    .addEdge(new InputMessageStep({ name: "ask", prompt: "Ready?" }), null)
    .build();
  const conversation = Conversation.start(flow, {}, {
    conversationId: "conv_doc",
  });
  await conversation.execute();
  return conversation.toDocument();
}

describe("decodeConversation", () => {
  it("should read back an encoded document", async () => {
    const document = await suspendedDocument();

    const decoded = decodeConversation(encodeConversation(document));

    expect(decoded.conversationId).toBe("conv_doc");
    expect(decoded.version).toBe(CONVERSATION_FORMAT_VERSION);
    expect(decoded.state.suspendedStep).toBe("ask");
    expect(decoded.messages).toEqual([{ role: "agent", content: "Ready?" }]);
  });

  it("should reject text that is not JSON", () => {
    expect(() => decodeConversation("{not json")).toThrow(
      "Conversation document is not valid JSON",
    );
  });

  it("should reject documents missing required fields", () => {
    expect(() => decodeConversation("{}")).toThrow(
      /^Invalid conversation document: /,
    );
  });

  it("should reject documents from a newer format", async () => {
    const document = await suspendedDocument();

    expect(() =>
      decodeConversation(JSON.stringify({ ...document, version: 2 })),
    ).toThrow("Unsupported conversation format version 2");
  });
});
