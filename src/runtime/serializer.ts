/**
 * Conversation Serializer
 *
 * A conversation is saved as one JSON document: the conversation-wide data
 * of the shared store, the last status and the root flow state with every
 * nested state inside it. The flow itself is not saved; the document names
 * it by id and fingerprint.
 */

import { SerializationError, formatIssues } from "../errors";
import { conversationDocumentJsonSchema } from "../schema/json-schema";
import { ajv, toValidationErrors } from "../schema/validator";
import type { Message, ToolDecision } from "../steps/types";
import type { ConversationState } from "./state";
import type { ExecutionStatus } from "./status";

export const CONVERSATION_FORMAT = "resumeflow.conversation";
export const CONVERSATION_FORMAT_VERSION = 1;

export interface ConversationDocument {
  format: typeof CONVERSATION_FORMAT;
  version: number;
  savedAt: string;
  startedAt: string;
  conversationId: string;
  flowId: string;
  fingerprint: string;
  inputs: Record<string, unknown>;
  messages: Message[];
  toolResults: Record<string, unknown>;
  toolDecisions: Record<string, ToolDecision>;
  contextValues: Record<string, Record<string, unknown>>;
  requestCounter: number;
  logs: string[];
  status: ExecutionStatus | null;
  state: ConversationState;
}

const validateDocument = ajv.compile<ConversationDocument>(
  conversationDocumentJsonSchema,
);

// ============================================================================
// JSON Safety
// ============================================================================

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Throw a SerializationError naming the first value JSON cannot carry.
 * Undefined object properties are allowed; JSON drops them.
 */
export function assertJsonSafe(
  value: unknown,
  path = "",
  ancestors: Set<object> = new Set(),
): void {
  const where = path || "/";
  switch (typeof value) {
    case "string":
    case "boolean":
      return;
    case "number":
      if (!Number.isFinite(value)) {
        throw new SerializationError(`Non-finite number at ${where}`);
      }
      return;
    case "object":
      break;
    default:
      throw new SerializationError(
        `Value of type ${typeof value} at ${where} is not JSON-serializable`,
      );
  }
  if (value === null) return;

  if (ancestors.has(value)) {
    throw new SerializationError(`Circular reference at ${where}`);
  }
  ancestors.add(value);
  if (Array.isArray(value)) {
    value.forEach((item, i) => assertJsonSafe(item, `${path}/${i}`, ancestors));
  } else if (isPlainObject(value)) {
    for (const [key, item] of Object.entries(value)) {
      if (item !== undefined) assertJsonSafe(item, `${path}/${key}`, ancestors);
    }
  } else {
    throw new SerializationError(
      `Instance of ${value.constructor.name} at ${where} is not JSON-serializable`,
    );
  }
  ancestors.delete(value);
}

// ============================================================================
// Encode / Decode
// ============================================================================

export function encodeConversation(document: ConversationDocument): string {
  assertJsonSafe(document);
  return JSON.stringify(document);
}

export function decodeConversation(text: string): ConversationDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new SerializationError("Conversation document is not valid JSON", {
      cause: error,
    });
  }

  if (!validateDocument(parsed)) {
    throw new SerializationError(
      `Invalid conversation document: ${formatIssues(toValidationErrors(validateDocument.errors))}`,
    );
  }
  if (parsed.version > CONVERSATION_FORMAT_VERSION) {
    throw new SerializationError(
      `Unsupported conversation format version ${parsed.version}`,
    );
  }
  return parsed;
}
