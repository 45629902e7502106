/**
 * Filter Evaluator
 * Runs an operator script and keeps the nodes its `filter` accepts
 */

import {
  logger,
  MissingFilterFunctionError,
  type ChildLogger,
  type LogContext,
  type ScriptStageError,
} from "@subfilter/core";
import { expectBoolean, loadEntryFunction } from "./stage.js";
import type { ScriptContext } from "./types.js";

export const FILTER_FUNCTION = "filter";

export type FilterResult =
  | { success: true; kept: number; dropped: number; failedCalls: number }
  | { success: false; error: ScriptStageError };

export interface FilterOptions<T> {
  log?: ChildLogger;

  /** Extra log context identifying a node whose call failed */
  describe?: (node: T, index: number) => LogContext;
}

/**
 * Filter `nodes` in place.
 *
 * On a stage failure (exception, eval error, missing `filter`) the array is
 * left untouched. A node whose call fails is dropped and the loop goes on.
 */
export function applyFilter<T>(
  context: ScriptContext,
  nodes: T[],
  source: string,
  options: FilterOptions<T> = {}
): FilterResult {
  const log = options.log ?? logger.child({ component: "filter" });

  const stage = loadEntryFunction(
    context,
    source,
    FILTER_FUNCTION,
    () => new MissingFilterFunctionError(FILTER_FUNCTION),
    log
  );
  if (!stage.ok) {
    return { success: false, error: stage.error };
  }

  const total = nodes.length;
  let kept = 0;
  let failedCalls = 0;

  for (const [index, node] of nodes.entries()) {
    let retain: boolean;
    try {
      retain = expectBoolean(context.call(stage.fn, [node]), FILTER_FUNCTION);
    } catch (error) {
      failedCalls += 1;
      retain = false;
      log.error("JavaScript eval call function error", error, {
        stage: "call",
        nodeIndex: index,
        ...options.describe?.(node, index),
      });
    }

    // kept <= index, so this only overwrites slots already visited
    if (retain) {
      nodes[kept] = node;
      kept += 1;
    }
  }
  nodes.length = kept;

  const dropped = total - kept;
  log.info("Filter function evaluated successfully", { kept, dropped, failedCalls });
  log.metric("filter.dropped", dropped);

  return { success: true, kept, dropped, failedCalls };
}
