/**
 * Compiler Tests
 */

import { beforeEach, describe, it, expect } from "vitest";
import { GraphError } from "../../errors";
import { StepRegistry } from "../../registry/registry";
import { Conversation } from "../../runtime/conversation";
import { descriptor, types } from "../../schema/descriptors";
import { serverTool } from "../../steps";
import { compileFlow, compileFlowFromJson, compileFlowOrThrow } from "..";

// ============================================================================
// Helper to create valid definitions
// ============================================================================

function signDefinition() {
  return {
    id: "sign",
    name: "Sign of a sum",
    steps: [
      {
        kind: "start",
        name: "start",
        inputs: [
          { name: "a", type: { kind: "int" } },
          { name: "b", type: { kind: "int" } },
        ],
      },
      { kind: "function", name: "sum", functionId: "math.sum" },
      { kind: "function", name: "classify", functionId: "math.sign" },
      { kind: "end", name: "positive", branchName: "pos" },
      { kind: "end", name: "negative", branchName: "neg" },
    ],
    controlEdges: [
      { from: "start", to: "sum" },
      { from: "sum", to: "classify" },
      { from: "classify", to: "positive", branch: "pos" },
      { from: "classify", to: "negative", branch: "neg" },
    ],
    dataEdges: [{ from: "sum", output: "total", to: "classify", input: "n" }],
  };
}

function createRegistry(): StepRegistry {
  const registry = new StepRegistry();
  registry.registerFunction(
    {
      id: "math.sum",
      name: "Sum",
      category: "Math",
      inputs: [descriptor("a", types.int()), descriptor("b", types.int())],
      outputs: [descriptor("total", types.int())],
    },
    ({ a, b }) => ({ outputs: { total: Number(a) + Number(b) } }),
  );
  registry.registerFunction(
    {
      id: "math.sign",
      name: "Sign",
      category: "Math",
      inputs: [descriptor("n", types.int())],
      outputs: [],
      branches: ["pos", "neg"],
    },
    ({ n }) => ({ branch: Number(n) >= 0 ? "pos" : "neg" }),
  );
  registry.registerTool(
    serverTool({
      name: "echo",
      parameters: [descriptor("text", types.string())],
      output: descriptor("echoed", types.string()),
      run: (args) => args.text,
    }),
  );
  return registry;
}

// ============================================================================
// Compilation
// ============================================================================

describe("compileFlow", () => {
  let registry: StepRegistry;

  beforeEach(() => {
    registry = createRegistry();
  });

  it("should compile a valid definition", () => {
    const result = compileFlow(signDefinition(), { registry });

    expect(result.success).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.flow?.id).toBe("sign");
    expect(result.flow?.name).toBe("Sign of a sum");
    expect(result.flow?.beginStep).toBe("start");
    expect(result.flow?.outgoingBranches).toEqual(["pos", "neg"]);
  });

  it.each([
    [2, 3, 5, "pos"],
    [-4, 1, -3, "neg"],
  ])("should run %i + %i to %i on branch %s", async (a, b, total, branch) => {
    const flow = compileFlowOrThrow(signDefinition(), { registry });

    const status = await Conversation.start(flow, { a, b }).execute();

    expect(status).toEqual({
      type: "finished",
      outputValues: { total },
      terminalBranch: branch,
    });
  });

  it("should report unregistered functions by path", () => {
    const definition = signDefinition();
    definition.steps[1] = {
      kind: "function",
      name: "sum",
      functionId: "math.nope",
    };

    const result = compileFlow(definition, { registry });

    expect(result.success).toBe(false);
    expect(result.flow).toBeUndefined();
    expect(result.errors).toEqual([
      '/steps/1/functionId: Function "math.nope" is not registered',
    ]);
  });

  it("should prefix errors of nested flows", () => {
    const result = compileFlow(
      {
        id: "outer",
        name: "outer",
        steps: [
          {
            kind: "flow",
            name: "inner",
            flow: {
              id: "inner",
              name: "inner",
              steps: [{ kind: "function", name: "work", functionId: "math.nope" }],
              controlEdges: [{ from: "work", to: null }],
            },
          },
        ],
        controlEdges: [{ from: "inner", to: null }],
      },
      { registry },
    );

    expect(result.errors).toEqual([
      '/steps/0/flow/steps/0/functionId: Function "math.nope" is not registered',
    ]);
  });

  it("should check descriptor defaults against their types", () => {
    const result = compileFlow(
      {
        id: "defaults",
        name: "defaults",
        steps: [
          {
            kind: "start",
            name: "start",
            inputs: [{ name: "a", type: { kind: "int" }, default: "x" }],
          },
        ],
        controlEdges: [{ from: "start", to: null }],
      },
      { registry },
    );

    expect(result.errors).toEqual([
      '/steps/0/inputs/0/default: Default of "a" is not a int: must be integer',
    ]);
  });

  it("should report graph problems found by the flow", () => {
    const definition = signDefinition();
    definition.controlEdges.pop();

    const result = compileFlow(definition, { registry });

    expect(result.success).toBe(false);
    expect(result.errors).toContain(
      '/steps/classify: Branch "neg" of step "classify" has no control edge',
    );
  });

  it("should pass on warnings", () => {
    const definition = signDefinition();
    definition.steps.push({ kind: "end", name: "island", branchName: "pos" });

    const result = compileFlow(definition, { registry });

    expect(result.success).toBe(true);
    expect(result.warnings).toEqual([
      '/steps/island: Step "island" is not reachable from the begin step',
    ]);
  });

  it("should resolve tools from the registry", () => {
    const missing = compileFlow(
      {
        id: "tools",
        name: "tools",
        steps: [{ kind: "tool", name: "call", toolId: "ghost" }],
        controlEdges: [{ from: "call", to: null }],
      },
      { registry },
    );
    const found = compileFlow(
      {
        id: "tools",
        name: "tools",
        steps: [{ kind: "tool", name: "call", toolId: "echo" }],
        controlEdges: [{ from: "call", to: null }],
      },
      { registry },
    );

    expect(missing.errors).toEqual([
      '/steps/0/toolId: Tool "ghost" is not registered',
    ]);
    expect(found.success).toBe(true);
  });

  it("should reject definitions that break the schema", () => {
    const result = compileFlow({ id: "broken", name: "broken", steps: [] });

    expect(result.success).toBe(false);
    expect(result.validation.valid).toBe(false);
    expect(result.errors).toContain(
      "/: must have required property 'controlEdges'",
    );
    expect(result.errors).toContain("/steps: must NOT have fewer than 1 items");
  });
});

// ============================================================================
// JSON & Throwing Variants
// ============================================================================

describe("compileFlowFromJson", () => {
  it("should compile a JSON string", () => {
    const result = compileFlowFromJson(JSON.stringify(signDefinition()), {
      registry: createRegistry(),
    });

    expect(result.success).toBe(true);
  });

  it("should report invalid JSON", () => {
    const result = compileFlowFromJson("{ invalid json }");

    expect(result.success).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^Invalid JSON: /);
  });
});

describe("compileFlowOrThrow", () => {
  it("should throw a GraphError listing the problems", () => {
    const definition = signDefinition();
    definition.steps[2] = {
      kind: "function",
      name: "classify",
      functionId: "math.nope",
    };

    expect(() =>
      compileFlowOrThrow(definition, { registry: createRegistry() }),
    ).toThrow(GraphError);
    expect(() =>
      compileFlowOrThrow(definition, { registry: createRegistry() }),
    ).toThrow('/steps/2/functionId: Function "math.nope" is not registered');
  });
});
