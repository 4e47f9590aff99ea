/**
 * ResumeFlow Compiler
 * Turns a JSON flow definition + registry into a validated Flow
 */

import { GraphError } from "../errors";
import { descriptor, describeType } from "../schema/descriptors";
import { checkValue, validateFlowDefinition } from "../schema/validator";
import type {
  ContextProviderDefinition,
  FlowDefinition,
  StepDefinition,
  VariableDefinition,
} from "../schema/definition";
import type {
  Descriptor,
  ValidationError,
  ValidationResult,
} from "../schema/types";
import { DEFAULT_MAX_ITERATIONS, Flow } from "../graph/flow";
import type { ContextProvider, Variable } from "../graph/types";
import { variable } from "../graph/variable";
import { StepRegistry } from "../registry/registry";
import {
  BranchingStep,
  CatchExceptionStep,
  EndStep,
  FlowExecutionStep,
  FunctionStep,
  InputMessageStep,
  MapStep,
  OutputMessageStep,
  RetryStep,
  StartStep,
  ToolExecutionStep,
  VariableReadStep,
  VariableWriteStep,
  clientTool,
  type Step,
  type Tool,
} from "../steps";
import {
  ConstantContextProvider,
  MessageWindowContextProvider,
} from "../runtime/context-providers";

// ============================================================================
// Types
// ============================================================================

export interface CompileOptions {
  /** Functions and server tools the definition refers to */
  registry?: StepRegistry;
}

export interface CompilationResult {
  /** Whether compilation succeeded */
  success: boolean;
  /** The compiled flow (if successful) */
  flow?: Flow;
  /** Validation result */
  validation: ValidationResult;
  /** Compilation errors, as "path: message" */
  errors: string[];
  /** Warnings */
  warnings: string[];
}

// ============================================================================
// Issue Helpers
// ============================================================================

function joinPath(prefix: string, path: string): string {
  if (path === "/" || path === "") return prefix || "/";
  return `${prefix}${path}`;
}

function issue(path: string, message: string): ValidationError {
  return { path: path || "/", message, severity: "error" };
}

/**
 * Collect GraphError issues under a path prefix; anything else propagates
 */
function capture<T>(
  issues: ValidationError[],
  prefix: string,
  build: () => T,
): T | undefined {
  try {
    return build();
  } catch (error) {
    if (!(error instanceof GraphError)) throw error;
    for (const found of error.issues) {
      issues.push({ ...found, path: joinPath(prefix, found.path) });
    }
    return undefined;
  }
}

// ============================================================================
// Flow Compiler
// ============================================================================

class FlowCompiler {
  readonly errors: ValidationError[] = [];
  readonly warnings: ValidationError[] = [];

  constructor(private readonly registry: StepRegistry) {}

  compile(definition: FlowDefinition, prefix: string): Flow | undefined {
    const failures = this.errors.length;

    const variables = new Map<string, Variable>();
    (definition.variables ?? []).forEach((def, i) => {
      const compiled = this.compileVariable(def, `${prefix}/variables/${i}`);
      if (compiled) variables.set(compiled.name, compiled);
    });

    const providers: ContextProvider[] = [];
    (definition.contextProviders ?? []).forEach((def, i) => {
      const compiled = this.compileProvider(
        def,
        `${prefix}/contextProviders/${i}`,
      );
      if (compiled) providers.push(compiled);
    });

    const steps: Step[] = [];
    definition.steps.forEach((def, i) => {
      const compiled = this.compileStep(def, `${prefix}/steps/${i}`, variables);
      if (compiled) steps.push(compiled);
    });

    if (this.errors.length > failures) return undefined;

    const flow = capture(
      this.errors,
      prefix,
      () =>
        new Flow({
          id: definition.id,
          name: definition.name,
          description: definition.description,
          beginStep: definition.beginStep ?? definition.steps[0]?.name ?? "",
          steps,
          controlEdges: definition.controlEdges.map((edge) => ({
            source: edge.from,
            branch: edge.branch ?? "next",
            destination: edge.to,
          })),
          dataEdges: (definition.dataEdges ?? []).map((edge) => ({
            source: edge.from,
            output: edge.output,
            destination: edge.to,
            input: edge.input ?? edge.output,
          })),
          variables: [...variables.values()],
          contextProviders: providers,
          outputs: definition.outputs,
          maxIterations: definition.maxIterations ?? DEFAULT_MAX_ITERATIONS,
        }),
    );
    if (flow) {
      for (const warning of flow.warnings) {
        this.warnings.push({ ...warning, path: joinPath(prefix, warning.path) });
      }
    }
    return flow;
  }

  // ==========================================================================
  // Descriptors, Variables & Providers
  // ==========================================================================

  private descriptors(
    defs: readonly Descriptor[] | undefined,
    path: string,
  ): Descriptor[] | undefined {
    if (!defs) return undefined;
    let valid = true;
    const compiled = defs.map((def, i) => {
      if (def.default !== undefined) {
        const problems = checkValue(def.type, def.default);
        if (problems.length > 0) {
          valid = false;
          this.errors.push(
            issue(
              `${path}/${i}/default`,
              `Default of "${def.name}" is not a ${describeType(def.type)}: ${problems.join(", ")}`,
            ),
          );
        }
      }
      return descriptor(def.name, def.type, {
        default: def.default,
        description: def.description,
      });
    });
    return valid ? compiled : undefined;
  }

  private compileVariable(
    def: VariableDefinition,
    path: string,
  ): Variable | undefined {
    return capture(this.errors, path, () =>
      variable(def.name, def.type, {
        default: def.default,
        description: def.description,
      }),
    );
  }

  private compileProvider(
    def: ContextProviderDefinition,
    path: string,
  ): ContextProvider | undefined {
    switch (def.kind) {
      case "constant": {
        const output = this.require(def.output, path, "output", def.kind);
        if (!output) return undefined;
        const outputs = this.descriptors([output], `${path}/output`);
        if (!outputs) return undefined;
        return capture(
          this.errors,
          path,
          () =>
            new ConstantContextProvider({
              id: def.id,
              output: outputs[0],
              value: def.value,
            }),
        );
      }
      case "message_window":
        return capture(
          this.errors,
          path,
          () =>
            new MessageWindowContextProvider({
              id: def.id,
              outputName: def.outputName,
              windowSize: def.windowSize,
            }),
        );
    }
  }

  private require<T>(
    value: T | undefined,
    path: string,
    field: string,
    kind: string,
  ): T | undefined {
    if (value === undefined) {
      this.errors.push(
        issue(`${path}/${field}`, `Required for "${kind}" definitions`),
      );
    }
    return value;
  }

  // ==========================================================================
  // Steps
  // ==========================================================================

  private compileStep(
    def: StepDefinition,
    path: string,
    variables: ReadonlyMap<string, Variable>,
  ): Step | undefined {
    const { name, runtime } = def;
    const failures = this.errors.length;

    const lookupVariable = (): Variable | undefined => {
      const variableName = this.require(def.variable, path, "variable", def.kind);
      if (variableName === undefined) return undefined;
      const found = variables.get(variableName);
      if (!found) {
        this.errors.push(
          issue(`${path}/variable`, `Unknown variable "${variableName}"`),
        );
      }
      return found;
    };
    const nested = (): Flow | undefined => {
      const flow = this.require(def.flow, path, "flow", def.kind);
      return flow && this.compile(flow, `${path}/flow`);
    };
    const build = (create: () => Step): Step | undefined =>
      this.errors.length > failures
        ? undefined
        : capture(this.errors, path, create);

    switch (def.kind) {
      case "start": {
        const inputs = this.descriptors(def.inputs, `${path}/inputs`);
        return build(() => new StartStep({ name, inputs, runtime }));
      }

      case "end":
        return build(() => new EndStep({ name, branchName: def.branchName }));

      case "output": {
        const template = this.require(def.template, path, "template", def.kind);
        if (template === undefined) return undefined;
        return build(
          () =>
            new OutputMessageStep({
              name,
              template,
              outputName: def.outputName,
              runtime,
            }),
        );
      }

      case "input":
        return build(
          () =>
            new InputMessageStep({
              name,
              prompt: def.prompt,
              outputName: def.outputName,
              runtime,
            }),
        );

      case "branching": {
        const mapping = this.require(def.mapping, path, "mapping", def.kind);
        if (!mapping) return undefined;
        return build(
          () =>
            new BranchingStep({
              name,
              mapping,
              inputName: def.inputName,
              runtime,
            }),
        );
      }

      case "variable_read": {
        const read = lookupVariable();
        if (!read) return undefined;
        return build(
          () =>
            new VariableReadStep({
              name,
              variable: read,
              outputName: def.outputName,
              runtime,
            }),
        );
      }

      case "variable_write": {
        const written = lookupVariable();
        if (!written) return undefined;
        return build(
          () =>
            new VariableWriteStep({
              name,
              variable: written,
              operation: def.operation,
              inputName: def.inputName,
              runtime,
            }),
        );
      }

      case "function": {
        const functionId = this.require(
          def.functionId,
          path,
          "functionId",
          def.kind,
        );
        if (functionId === undefined) return undefined;
        const registered = this.registry.get(functionId);
        if (!registered) {
          this.errors.push(
            issue(`${path}/functionId`, `Function "${functionId}" is not registered`),
          );
          return undefined;
        }
        const { metadata } = registered;
        const inputs = this.descriptors(
          def.inputs ?? metadata.inputs,
          `${path}/inputs`,
        );
        const outputs = this.descriptors(
          def.outputs ?? metadata.outputs,
          `${path}/outputs`,
        );
        return build(
          () =>
            new FunctionStep({
              name,
              run: registered.execute,
              inputs,
              outputs,
              branches: def.branches ?? metadata.branches,
              functionId,
              runtime,
            }),
        );
      }

      case "tool": {
        const tool = this.resolveTool(def, path);
        if (!tool) return undefined;
        return build(
          () =>
            new ToolExecutionStep({
              name,
              tool,
              requiresConfirmation: def.requiresConfirmation,
              raiseOnRejection: def.raiseOnRejection,
              runtime,
            }),
        );
      }

      case "flow": {
        const flow = nested();
        if (!flow) return undefined;
        return build(() => new FlowExecutionStep({ name, flow, runtime }));
      }

      case "map": {
        const flow = nested();
        if (!flow) return undefined;
        return build(
          () =>
            new MapStep({
              name,
              flow,
              unpackInput: def.unpackInput,
              outputs: def.collect,
              parallel: def.parallel,
              sharedVariables: def.sharedVariables,
              iteratedType: def.iteratedType,
              runtime,
            }),
        );
      }

      case "retry": {
        const successCondition = this.require(
          def.successCondition,
          path,
          "successCondition",
          def.kind,
        );
        const flow = nested();
        if (!flow || successCondition === undefined) return undefined;
        return build(
          () =>
            new RetryStep({
              name,
              flow,
              successCondition,
              maxNumTrials: def.maxNumTrials,
              runtime,
            }),
        );
      }

      case "catch_exception": {
        const flow = nested();
        if (!flow) return undefined;
        return build(
          () =>
            new CatchExceptionStep({
              name,
              flow,
              exceptOn: def.exceptOn,
              catchAllExceptions: def.catchAllExceptions,
              runtime,
            }),
        );
      }
    }
  }

  private resolveTool(def: StepDefinition, path: string): Tool | undefined {
    if (def.toolId !== undefined && def.clientTool !== undefined) {
      this.errors.push(
        issue(path, "A tool step takes either toolId or clientTool, not both"),
      );
      return undefined;
    }
    if (def.toolId !== undefined) {
      const tool = this.registry.getTool(def.toolId);
      if (!tool) {
        this.errors.push(
          issue(`${path}/toolId`, `Tool "${def.toolId}" is not registered`),
        );
      }
      return tool;
    }
    if (def.clientTool !== undefined) {
      const parameters = this.descriptors(
        def.clientTool.parameters,
        `${path}/clientTool/parameters`,
      );
      const output = this.descriptors(
        [def.clientTool.output],
        `${path}/clientTool/output`,
      );
      if (!parameters || !output) return undefined;
      return clientTool({
        name: def.clientTool.name,
        description: def.clientTool.description,
        parameters,
        output: output[0],
      });
    }
    this.errors.push(issue(path, "A tool step needs toolId or clientTool"));
    return undefined;
  }
}

// ============================================================================
// Compiler
// ============================================================================

function toMessages(issues: readonly ValidationError[]): string[] {
  return issues.map((i) => `${i.path}: ${i.message}`);
}

/**
 * Compile a flow definition into a Flow
 */
export function compileFlow(
  definition: unknown,
  options: CompileOptions = {},
): CompilationResult {
  const validation = validateFlowDefinition(definition);
  if (!validation.valid || !validation.definition) {
    return {
      success: false,
      validation,
      errors: toMessages(validation.errors),
      warnings: toMessages(validation.warnings),
    };
  }

  const compiler = new FlowCompiler(options.registry ?? new StepRegistry());
  const flow = compiler.compile(validation.definition, "");
  const result: ValidationResult = {
    valid: compiler.errors.length === 0,
    errors: compiler.errors,
    warnings: compiler.warnings,
  };

  return {
    success: result.valid && flow !== undefined,
    flow: result.valid ? flow : undefined,
    validation: result,
    errors: toMessages(result.errors),
    warnings: toMessages(result.warnings),
  };
}

/**
 * Compile a flow definition from a JSON string
 */
export function compileFlowFromJson(
  json: string,
  options: CompileOptions = {},
): CompilationResult {
  let definition: unknown;
  try {
    definition = JSON.parse(json);
  } catch (e) {
    const message = `Invalid JSON: ${e instanceof Error ? e.message : "Unknown error"}`;
    return {
      success: false,
      validation: {
        valid: false,
        errors: [issue("/", message)],
        warnings: [],
      },
      errors: [message],
      warnings: [],
    };
  }
  return compileFlow(definition, options);
}

/**
 * Compile a flow definition; throws GraphError listing every problem
 */
export function compileFlowOrThrow(
  definition: unknown,
  options: CompileOptions = {},
): Flow {
  const result = compileFlow(definition, options);
  if (!result.success || !result.flow) {
    throw new GraphError(result.validation.errors);
  }
  return result.flow;
}
