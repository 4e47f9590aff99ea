/**
 * Persistence Tests
 */

import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { SerializationError } from "../../errors";
import { FlowBuilder } from "../../graph/builder";
import { InputMessageStep } from "../../steps";
import { Conversation } from "../conversation";
import {
  FileConversationStore,
  InMemoryConversationStore,
  createConversationRecord,
  type ConversationRecord,
} from "../persistence";
import type { FlowStatus } from "../state";

// ============================================================================
// Helpers
// ============================================================================

function makeRecord(
  conversationId: string,
  flowId: string,
  status: FlowStatus,
  ageMs = 0,
): ConversationRecord {
  const at = new Date(Date.now() - ageMs).toISOString();
  return {
    conversationId,
    flowId,
    status,
    payload: "{}",
    startedAt: at,
    updatedAt: at,
  };
}

function askFlow() {
  return new FlowBuilder("ask")
    .addEdge(new InputMessageStep({ name: "ask", prompt: "Ready?" }), null)
    .build();
}

// ============================================================================
// In-Memory Store
// ============================================================================

describe("InMemoryConversationStore", () => {
  let store: InMemoryConversationStore;

  beforeEach(() => {
    store = new InMemoryConversationStore();
  });

  it("should save and load a record", async () => {
    await store.save(makeRecord("conv_1", "ask", "suspended"));

    const loaded = await store.load("conv_1");

    expect(loaded?.flowId).toBe("ask");
    expect(loaded?.status).toBe("suspended");
    expect(await store.load("conv_2")).toBeNull();
  });

  it("should list a flow's records, newest first", async () => {
    await store.save(makeRecord("old", "ask", "finished", 5_000));
    await store.save(makeRecord("new", "ask", "suspended", 1_000));
    await store.save(makeRecord("other", "greet", "suspended"));

    const records = await store.list("ask");

    expect(records.map((r) => r.conversationId)).toEqual(["new", "old"]);
    expect(await store.list("ask", 1)).toHaveLength(1);
  });

  it("should delete a record", async () => {
    await store.save(makeRecord("conv_1", "ask", "suspended"));

    await store.delete("conv_1");

    expect(await store.load("conv_1")).toBeNull();
  });

  it("should clean up stale records but keep running ones", async () => {
    await store.save(makeRecord("done", "ask", "finished", 10_000));
    await store.save(makeRecord("busy", "ask", "running", 10_000));
    await store.save(makeRecord("fresh", "ask", "finished"));

    const deleted = await store.cleanup(5_000);

    expect(deleted).toBe(1);
    expect(await store.load("done")).toBeNull();
    expect(await store.load("busy")).not.toBeNull();
    expect(await store.load("fresh")).not.toBeNull();
  });

  it("should hand out copies", async () => {
    await store.save(makeRecord("conv_1", "ask", "suspended"));

    const loaded = await store.load("conv_1");
    if (loaded) loaded.status = "failed";

    expect((await store.load("conv_1"))?.status).toBe("suspended");
  });
});

// ============================================================================
// File Store
// ============================================================================

describe("FileConversationStore", () => {
  let directory: string;
  let store: FileConversationStore;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "resumeflow-"));
    store = new FileConversationStore(join(directory, "conversations"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("should round-trip a record through a file", async () => {
    const record = makeRecord("conv_1", "ask", "suspended");

    await store.save(record);

    expect(await store.load("conv_1")).toEqual(record);
  });

  it("should return null for unknown conversations", async () => {
    expect(await store.load("conv_missing")).toBeNull();
    expect(await store.list("ask")).toEqual([]);
  });

  it("should list and clean up records on disk", async () => {
    await store.save(makeRecord("old", "ask", "failed", 10_000));
    await store.save(makeRecord("new", "ask", "suspended"));

    expect((await store.list("ask")).map((r) => r.conversationId)).toEqual([
      "new",
      "old",
    ]);
    expect(await store.cleanup(5_000)).toBe(1);
    expect((await store.list("ask")).map((r) => r.conversationId)).toEqual([
      "new",
    ]);
  });

  it("should refuse ids that are not plain file names", async () => {
    await expect(
      store.save(makeRecord("../escape", "ask", "running")),
    ).rejects.toBeInstanceOf(SerializationError);
  });

  it("should reject a corrupt file", async () => {
    await store.save(makeRecord("conv_1", "ask", "suspended"));
    await writeFile(join(directory, "conversations", "conv_1.json"), "{}");

    await expect(store.load("conv_1")).rejects.toThrow(
      'Stored conversation "conv_1" is invalid',
    );
  });
});

// ============================================================================
// Records
// ============================================================================

describe("createConversationRecord", () => {
  it("should snapshot a suspended conversation", async () => {
    const flow = askFlow();
    const conversation = Conversation.start(flow, {}, {
      conversationId: "conv_1",
    });
    await conversation.execute();

    const record = createConversationRecord(conversation);

    expect(record.conversationId).toBe("conv_1");
    expect(record.flowId).toBe("ask");
    expect(record.status).toBe("suspended");
    expect(record.completedAt).toBeUndefined();
    expect(record.startedAt).toBe(conversation.startedAt.toISOString());

    const restored = Conversation.deserialize(record.payload, flow);
    expect(restored.pendingWork).toEqual([
      { kind: "user_message", step: "ask", prompt: "Ready?" },
    ]);
  });

  it("should mark finished conversations as completed", async () => {
    const flow = askFlow();
    const conversation = Conversation.start(flow);
    await conversation.execute();
    conversation.supplyUserMessage("yes");
    await conversation.execute();

    const record = createConversationRecord(conversation);

    expect(record.status).toBe("finished");
    expect(record.completedAt).toBe(record.updatedAt);
  });
});
