/**
 * JSON Schemas
 * Descriptor types rendered as JSON Schema, plus the schemas of flow
 * definitions, conversation documents and stored conversation records
 */

import type { DescriptorType } from "./types";

/** JSON Schema node */
export type JsonSchema = Record<string, unknown>;

// ============================================================================
// Descriptor Types → JSON Schema
// ============================================================================

/**
 * JSON Schema accepting exactly the values of a descriptor type
 */
export function descriptorTypeToJsonSchema(type: DescriptorType): JsonSchema {
  switch (type.kind) {
    case "string":
      return { type: "string" };
    case "int":
      return { type: "integer" };
    case "float":
      return { type: "number" };
    case "bool":
      return { type: "boolean" };
    case "any":
      return {};
    case "list":
      return { type: "array", items: descriptorTypeToJsonSchema(type.items) };
    case "map":
      return {
        type: "object",
        additionalProperties: descriptorTypeToJsonSchema(type.values),
      };
    case "union":
      return { anyOf: type.options.map(descriptorTypeToJsonSchema) };
  }
}

// ============================================================================
// Shared Definitions
// ============================================================================

const descriptorTypeDefinition = {
  oneOf: [
    {
      type: "object",
      properties: {
        kind: { enum: ["string", "int", "float", "bool", "any"] },
      },
      required: ["kind"],
      additionalProperties: false,
    },
    {
      type: "object",
      properties: {
        kind: { const: "list" },
        items: { $ref: "#/definitions/descriptorType" },
      },
      required: ["kind", "items"],
      additionalProperties: false,
    },
    {
      type: "object",
      properties: {
        kind: { const: "map" },
        values: { $ref: "#/definitions/descriptorType" },
      },
      required: ["kind", "values"],
      additionalProperties: false,
    },
    {
      type: "object",
      properties: {
        kind: { const: "union" },
        options: {
          type: "array",
          items: { $ref: "#/definitions/descriptorType" },
          minItems: 1,
        },
      },
      required: ["kind", "options"],
      additionalProperties: false,
    },
  ],
} as const;

const descriptorDefinition = {
  type: "object",
  properties: {
    name: { type: "string", minLength: 1 },
    type: { $ref: "#/definitions/descriptorType" },
    default: {},
    description: { type: "string" },
  },
  required: ["name", "type"],
  additionalProperties: false,
} as const;

const identifier = { type: "string", minLength: 1 } as const;

const stringMap = {
  type: "object",
  additionalProperties: { type: "string" },
} as const;

const toolRequestDefinition = {
  type: "object",
  properties: {
    id: identifier,
    name: identifier,
    args: { type: "object" },
  },
  required: ["id", "name", "args"],
  additionalProperties: false,
} as const;

// ============================================================================
// Flow Definition Schema
// ============================================================================

export const flowDefinitionJsonSchema = {
  $schema: "http://json-schema.org/draft-07/schema#",
  $id: "https://resumeflow.dev/schemas/flow.json",
  title: "ResumeFlow Definition",
  description: "Schema for ResumeFlow JSON flow definitions",
  $ref: "#/definitions/flow",
  definitions: {
    descriptorType: descriptorTypeDefinition,
    descriptor: descriptorDefinition,
    runtime: {
      type: "object",
      properties: {
        maxRetries: { type: "integer", minimum: 1 },
        retryDelay: { type: "integer", minimum: 0 },
        maxVisits: { type: "integer", minimum: 1 },
      },
      additionalProperties: false,
    },
    step: {
      type: "object",
      properties: {
        kind: {
          enum: [
            "start",
            "end",
            "output",
            "input",
            "branching",
            "variable_read",
            "variable_write",
            "function",
            "tool",
            "flow",
            "map",
            "retry",
            "catch_exception",
          ],
        },
        name: identifier,
        description: { type: "string" },
        runtime: { $ref: "#/definitions/runtime" },
        inputs: { type: "array", items: { $ref: "#/definitions/descriptor" } },
        outputs: {
          type: "array",
          items: { $ref: "#/definitions/descriptor" },
        },
        branches: { type: "array", items: identifier, minItems: 1 },
        branchName: identifier,
        template: { type: "string" },
        outputName: identifier,
        prompt: { type: "string" },
        mapping: stringMap,
        inputName: identifier,
        variable: identifier,
        operation: { enum: ["overwrite", "insert", "merge"] },
        functionId: identifier,
        toolId: identifier,
        clientTool: {
          type: "object",
          properties: {
            name: identifier,
            description: { type: "string" },
            parameters: {
              type: "array",
              items: { $ref: "#/definitions/descriptor" },
            },
            output: { $ref: "#/definitions/descriptor" },
          },
          required: ["name", "parameters", "output"],
          additionalProperties: false,
        },
        requiresConfirmation: { type: "boolean" },
        raiseOnRejection: { type: "boolean" },
        flow: { $ref: "#/definitions/flow" },
        unpackInput: stringMap,
        collect: { type: "array", items: identifier },
        parallel: { type: "boolean" },
        sharedVariables: { type: "array", items: identifier },
        iteratedType: { $ref: "#/definitions/descriptorType" },
        successCondition: identifier,
        maxNumTrials: { type: "integer", minimum: 1 },
        exceptOn: stringMap,
        catchAllExceptions: { type: "boolean" },
      },
      required: ["kind", "name"],
      additionalProperties: false,
    },
    controlEdge: {
      type: "object",
      properties: {
        from: identifier,
        to: { anyOf: [identifier, { type: "null" }] },
        branch: identifier,
      },
      required: ["from", "to"],
      additionalProperties: false,
    },
    dataEdge: {
      type: "object",
      properties: {
        from: identifier,
        output: identifier,
        to: identifier,
        input: identifier,
      },
      required: ["from", "output", "to"],
      additionalProperties: false,
    },
    variable: {
      type: "object",
      properties: {
        name: identifier,
        type: { $ref: "#/definitions/descriptorType" },
        default: {},
        description: { type: "string" },
      },
      required: ["name", "type"],
      additionalProperties: false,
    },
    contextProvider: {
      type: "object",
      properties: {
        kind: { enum: ["constant", "message_window"] },
        id: identifier,
        output: { $ref: "#/definitions/descriptor" },
        value: {},
        outputName: identifier,
        windowSize: { type: "integer", minimum: 1 },
      },
      required: ["kind", "id"],
      additionalProperties: false,
    },
    flow: {
      type: "object",
      properties: {
        $schema: { type: "string" },
        id: identifier,
        name: { type: "string" },
        version: { type: "string" },
        description: { type: "string" },
        beginStep: identifier,
        maxIterations: { type: "integer", minimum: 1 },
        steps: {
          type: "array",
          items: { $ref: "#/definitions/step" },
          minItems: 1,
        },
        controlEdges: {
          type: "array",
          items: { $ref: "#/definitions/controlEdge" },
        },
        dataEdges: {
          type: "array",
          items: { $ref: "#/definitions/dataEdge" },
        },
        variables: {
          type: "array",
          items: { $ref: "#/definitions/variable" },
        },
        contextProviders: {
          type: "array",
          items: { $ref: "#/definitions/contextProvider" },
        },
        outputs: { type: "array", items: identifier },
      },
      required: ["id", "name", "steps", "controlEdges"],
      additionalProperties: false,
    },
  },
} as const;

// ============================================================================
// Conversation Document Schema
// ============================================================================

export const conversationDocumentJsonSchema = {
  $schema: "http://json-schema.org/draft-07/schema#",
  $id: "https://resumeflow.dev/schemas/conversation.json",
  title: "ResumeFlow Conversation",
  type: "object",
  properties: {
    format: { const: "resumeflow.conversation" },
    version: { type: "integer", minimum: 1 },
    savedAt: { type: "string", format: "date-time" },
    startedAt: { type: "string", format: "date-time" },
    conversationId: identifier,
    flowId: identifier,
    fingerprint: { type: "string", pattern: "^[0-9a-f]{64}$" },
    inputs: { type: "object" },
    messages: { type: "array", items: { $ref: "#/definitions/message" } },
    toolResults: { type: "object" },
    toolDecisions: {
      type: "object",
      additionalProperties: { $ref: "#/definitions/toolDecision" },
    },
    contextValues: {
      type: "object",
      additionalProperties: { type: "object" },
    },
    requestCounter: { type: "integer", minimum: 0 },
    logs: { type: "array", items: { type: "string" } },
    status: {
      anyOf: [{ $ref: "#/definitions/status" }, { type: "null" }],
    },
    state: { $ref: "#/definitions/state" },
  },
  required: [
    "format",
    "version",
    "savedAt",
    "startedAt",
    "conversationId",
    "flowId",
    "fingerprint",
    "inputs",
    "messages",
    "toolResults",
    "toolDecisions",
    "contextValues",
    "requestCounter",
    "logs",
    "status",
    "state",
  ],
  additionalProperties: false,
  definitions: {
    toolRequest: toolRequestDefinition,
    message: {
      type: "object",
      properties: {
        role: { enum: ["user", "agent", "tool", "system"] },
        content: { type: "string" },
        toolRequests: {
          type: "array",
          items: { $ref: "#/definitions/toolRequest" },
        },
        toolRequestId: identifier,
      },
      required: ["role", "content"],
      additionalProperties: false,
    },
    toolDecision: {
      oneOf: [
        {
          type: "object",
          properties: { confirmed: { const: true } },
          required: ["confirmed"],
          additionalProperties: false,
        },
        {
          type: "object",
          properties: {
            confirmed: { const: false },
            reason: { type: ["string", "null"] },
          },
          required: ["confirmed", "reason"],
          additionalProperties: false,
        },
      ],
    },
    status: {
      oneOf: [
        {
          type: "object",
          properties: {
            type: { const: "finished" },
            outputValues: { type: "object" },
            terminalBranch: { type: "string" },
          },
          required: ["type", "outputValues", "terminalBranch"],
          additionalProperties: false,
        },
        {
          type: "object",
          properties: {
            type: { const: "needs_external_input" },
            prompt: { type: ["string", "null"] },
          },
          required: ["type", "prompt"],
          additionalProperties: false,
        },
        {
          type: "object",
          properties: {
            type: { enum: ["needs_tool_result", "needs_confirmation"] },
            pendingToolCalls: {
              type: "array",
              items: { $ref: "#/definitions/toolRequest" },
            },
          },
          required: ["type", "pendingToolCalls"],
          additionalProperties: false,
        },
        {
          type: "object",
          properties: {
            type: { const: "interrupted" },
            reason: { type: "string" },
          },
          required: ["type", "reason"],
          additionalProperties: false,
        },
      ],
    },
    pendingWork: {
      oneOf: [
        {
          type: "object",
          properties: {
            kind: { const: "user_message" },
            step: identifier,
            prompt: { type: ["string", "null"] },
          },
          required: ["kind", "step", "prompt"],
          additionalProperties: false,
        },
        {
          type: "object",
          properties: {
            kind: { enum: ["tool_result", "tool_confirmation"] },
            step: identifier,
            request: { $ref: "#/definitions/toolRequest" },
          },
          required: ["kind", "step", "request"],
          additionalProperties: false,
        },
      ],
    },
    state: {
      type: "object",
      properties: {
        flowId: identifier,
        status: {
          enum: ["running", "suspended", "interrupted", "finished", "failed"],
        },
        position: { type: ["string", "null"] },
        inputs: { type: "object" },
        variables: { type: "object" },
        produced: {
          type: "object",
          additionalProperties: {
            type: "object",
            additionalProperties: {
              type: "object",
              properties: {
                value: {},
                seq: { type: "integer", minimum: 0 },
              },
              required: ["value", "seq"],
              additionalProperties: false,
            },
          },
        },
        sequence: { type: "integer", minimum: 0 },
        visits: {
          type: "object",
          additionalProperties: { type: "integer", minimum: 0 },
        },
        iterations: { type: "integer", minimum: 0 },
        suspendedStep: { type: ["string", "null"] },
        stepStates: {
          type: "object",
          additionalProperties: { type: "object" },
        },
        pendingWork: {
          type: "array",
          items: { $ref: "#/definitions/pendingWork" },
        },
        result: {
          anyOf: [
            {
              type: "object",
              properties: {
                outputs: { type: "object" },
                branch: { type: "string" },
              },
              required: ["outputs", "branch"],
              additionalProperties: false,
            },
            { type: "null" },
          ],
        },
        nested: {
          type: "object",
          additionalProperties: { $ref: "#/definitions/state" },
        },
      },
      required: [
        "flowId",
        "status",
        "position",
        "inputs",
        "variables",
        "produced",
        "sequence",
        "visits",
        "iterations",
        "suspendedStep",
        "stepStates",
        "pendingWork",
        "result",
        "nested",
      ],
      additionalProperties: false,
    },
  },
} as const;

// ============================================================================
// Conversation Record Schema
// ============================================================================

export const conversationRecordJsonSchema = {
  $schema: "http://json-schema.org/draft-07/schema#",
  $id: "https://resumeflow.dev/schemas/record.json",
  title: "ResumeFlow Stored Conversation",
  type: "object",
  properties: {
    conversationId: identifier,
    flowId: identifier,
    status: {
      enum: ["running", "suspended", "interrupted", "finished", "failed"],
    },
    payload: { type: "string" },
    startedAt: { type: "string", format: "date-time" },
    updatedAt: { type: "string", format: "date-time" },
    completedAt: { type: "string", format: "date-time" },
  },
  required: [
    "conversationId",
    "flowId",
    "status",
    "payload",
    "startedAt",
    "updatedAt",
  ],
  additionalProperties: false,
} as const;
