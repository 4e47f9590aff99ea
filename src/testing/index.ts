/**
 * Testing Module
 * Export testing utilities
 */

export {
  testFlow,
  runScripted,
  StepSpy,
  deepEqual,
  assert,
  assertEqual,
  type Script,
  type ScriptedDecision,
  type ScriptedRun,
  type ScriptedRunOptions,
  type TestFlowOptions,
  type TestResult,
  type SpyCall,
} from "./harness";
