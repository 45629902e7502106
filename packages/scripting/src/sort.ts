/**
 * Sort Evaluator
 * Orders nodes with an operator script defining `compare(a, b)`,
 * which returns true when `a` belongs before `b`.
 */

import {
  logger,
  MissingSortFunctionError,
  type ChildLogger,
  type ScriptStageError,
} from "@subfilter/core";
import { expectBoolean, loadEntryFunction } from "./stage.js";
import type { ScriptContext } from "./types.js";

export const SORT_FUNCTION = "compare";

export type SortResult =
  | { success: true; failedCalls: number }
  | { success: false; error: ScriptStageError };

export interface SortOptions {
  log?: ChildLogger;
}

/**
 * Stable in-place sort. A failed call counts as "not before".
 */
export function applySort<T>(
  context: ScriptContext,
  nodes: T[],
  source: string,
  options: SortOptions = {}
): SortResult {
  const log = options.log ?? logger.child({ component: "sort" });

  const stage = loadEntryFunction(
    context,
    source,
    SORT_FUNCTION,
    () => new MissingSortFunctionError(SORT_FUNCTION),
    log
  );
  if (!stage.ok) {
    return { success: false, error: stage.error };
  }

  let failedCalls = 0;
  const before = (a: T, b: T): boolean => {
    try {
      return expectBoolean(context.call(stage.fn, [a, b]), SORT_FUNCTION);
    } catch (error) {
      failedCalls += 1;
      log.error("JavaScript eval call function error", error, { stage: "call" });
      return false;
    }
  };

  const sorted = [...nodes].sort((a, b) => {
    if (before(a, b)) return -1;
    if (before(b, a)) return 1;
    return 0;
  });
  sorted.forEach((node, index) => {
    nodes[index] = node;
  });

  log.info("Sort function evaluated successfully", { count: nodes.length, failedCalls });
  return { success: true, failedCalls };
}
