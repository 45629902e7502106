/**
 * @subfilter/scripting
 * Embedded script engine boundary plus the filter and sort evaluators
 */

// Types
export type {
  ScriptEngine,
  ScriptRuntime,
  ScriptContext,
  ScriptFunction,
  EvaluationOutcome,
} from "./types.js";

// node:vm engine
export { vmScriptEngine, VmScriptRuntime, VmScriptContext } from "./vm-runtime.js";

// Evaluators
export {
  applyFilter,
  FILTER_FUNCTION,
  type FilterResult,
  type FilterOptions,
} from "./filter.js";
export { applySort, SORT_FUNCTION, type SortResult, type SortOptions } from "./sort.js";
export { loadEntryFunction, expectBoolean, type StageOutcome } from "./stage.js";
export { describeThrown } from "./thrown.js";
