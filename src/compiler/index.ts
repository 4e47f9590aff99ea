/**
 * Compiler Module
 *
 * JSON flow definitions → Flow. Step kinds map one-to-one onto the built-in
 * step classes; `function` steps and server tools are looked up in a
 * StepRegistry.
 */

export {
  compileFlow,
  compileFlowFromJson,
  compileFlowOrThrow,
  type CompilationResult,
  type CompileOptions,
} from "./compiler";
