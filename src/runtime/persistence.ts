/**
 * Persistence
 * Pluggable stores for serialized conversations
 */

import { mkdir, readFile, readdir, rm, writeFile } from "fs/promises";
import { join } from "path";
import { SerializationError, formatIssues } from "../errors";
import { conversationRecordJsonSchema } from "../schema/json-schema";
import { ajv, toValidationErrors } from "../schema/validator";
import type { Conversation } from "./conversation";
import type { FlowStatus } from "./state";

export interface ConversationRecord {
  conversationId: string;
  flowId: string;
  /** Execution state when saved */
  status: FlowStatus;
  /** Output of `Conversation.serialize()` */
  payload: string;
  /** ISO timestamps */
  startedAt: string;
  updatedAt: string;
  /** Set once the conversation finished or failed */
  completedAt?: string;
}

export interface ConversationStore {
  /**
   * Save (or replace) a conversation record
   */
  save(record: ConversationRecord): Promise<void>;

  /**
   * Load a conversation record by id
   */
  load(conversationId: string): Promise<ConversationRecord | null>;

  /**
   * List conversations of a flow, most recently started first
   */
  list(flowId: string, limit?: number): Promise<ConversationRecord[]>;

  /**
   * Delete a conversation record
   */
  delete(conversationId: string): Promise<void>;

  /**
   * Delete records of conversations that stopped running before the cutoff
   */
  cleanup(olderThanMs: number): Promise<number>;
}

const validateRecord = ajv.compile<ConversationRecord>(
  conversationRecordJsonSchema,
);

function isSettled(record: ConversationRecord): boolean {
  return record.status !== "running";
}

function byStartedAtDesc(a: ConversationRecord, b: ConversationRecord): number {
  return Date.parse(b.startedAt) - Date.parse(a.startedAt);
}

// ============================================================================
// In-Memory Store
// ============================================================================

/**
 * In-memory store (no durability, for testing)
 */
export class InMemoryConversationStore implements ConversationStore {
  private records = new Map<string, ConversationRecord>();

  async save(record: ConversationRecord): Promise<void> {
    this.records.set(record.conversationId, { ...record });
  }

  async load(conversationId: string): Promise<ConversationRecord | null> {
    const record = this.records.get(conversationId);
    return record ? { ...record } : null;
  }

  async list(flowId: string, limit = 100): Promise<ConversationRecord[]> {
    return Array.from(this.records.values())
      .filter((r) => r.flowId === flowId)
      .sort(byStartedAtDesc)
      .slice(0, limit)
      .map((r) => ({ ...r }));
  }

  async delete(conversationId: string): Promise<void> {
    this.records.delete(conversationId);
  }

  async cleanup(olderThanMs: number): Promise<number> {
    const cutoff = Date.now() - olderThanMs;
    let deleted = 0;

    for (const [id, record] of this.records.entries()) {
      if (isSettled(record) && Date.parse(record.updatedAt) < cutoff) {
        this.records.delete(id);
        deleted++;
      }
    }

    return deleted;
  }

  clear(): void {
    this.records.clear();
  }
}

// ============================================================================
// File Store
// ============================================================================

const FILE_SUFFIX = ".json";

/**
 * One JSON file per conversation in a directory
 */
export class FileConversationStore implements ConversationStore {
  constructor(private readonly directory: string) {}

  private getFilePath(conversationId: string): string {
    if (!/^[\w.-]+$/.test(conversationId) || conversationId.startsWith(".")) {
      throw new SerializationError(
        `Conversation id "${conversationId}" cannot be used as a file name`,
      );
    }
    return join(this.directory, `${conversationId}${FILE_SUFFIX}`);
  }

  async save(record: ConversationRecord): Promise<void> {
    const path = this.getFilePath(record.conversationId);
    await mkdir(this.directory, { recursive: true });
    await writeFile(path, JSON.stringify(record, null, 2), "utf-8");
  }

  async load(conversationId: string): Promise<ConversationRecord | null> {
    let text: string;
    try {
      text = await readFile(this.getFilePath(conversationId), "utf-8");
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
    return parseRecord(text, conversationId);
  }

  async list(flowId: string, limit = 100): Promise<ConversationRecord[]> {
    const records = await this.readAll();
    return records
      .filter((r) => r.flowId === flowId)
      .sort(byStartedAtDesc)
      .slice(0, limit);
  }

  async delete(conversationId: string): Promise<void> {
    await rm(this.getFilePath(conversationId), { force: true });
  }

  async cleanup(olderThanMs: number): Promise<number> {
    const cutoff = Date.now() - olderThanMs;
    let deleted = 0;

    for (const record of await this.readAll()) {
      if (isSettled(record) && Date.parse(record.updatedAt) < cutoff) {
        await this.delete(record.conversationId);
        deleted++;
      }
    }

    return deleted;
  }

  private async readAll(): Promise<ConversationRecord[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const records: ConversationRecord[] = [];
    for (const entry of entries.filter((e) => e.endsWith(FILE_SUFFIX))) {
      const text = await readFile(join(this.directory, entry), "utf-8");
      records.push(parseRecord(text, entry));
    }
    return records;
  }
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}

function parseRecord(text: string, source: string): ConversationRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new SerializationError(`Stored conversation "${source}" is not valid JSON`, {
      cause: error,
    });
  }
  if (!validateRecord(parsed)) {
    throw new SerializationError(
      `Stored conversation "${source}" is invalid: ${formatIssues(toValidationErrors(validateRecord.errors))}`,
    );
  }
  return parsed;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Snapshot a conversation as a store record
 */
export function createConversationRecord(
  conversation: Conversation,
): ConversationRecord {
  const status = conversation.executionState;
  const now = new Date().toISOString();
  return {
    conversationId: conversation.conversationId,
    flowId: conversation.flowId,
    status,
    payload: conversation.serialize(),
    startedAt: conversation.startedAt.toISOString(),
    updatedAt: now,
    ...(status === "finished" || status === "failed"
      ? { completedAt: now }
      : {}),
  };
}
