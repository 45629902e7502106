/**
 * Script Stage
 * Evaluates an operator script and resolves its entry function
 */

import {
  ScriptCallError,
  ScriptEvalError,
  ScriptExceptionError,
  type ChildLogger,
  type ScriptStageError,
} from "@subfilter/core";
import type { ScriptContext, ScriptFunction } from "./types.js";

export type StageOutcome =
  | { ok: true; fn: ScriptFunction }
  | { ok: false; error: ScriptStageError };

/**
 * Run `source` and return the function it binds to `functionName`.
 * Every failure is logged here; callers only propagate it.
 */
export function loadEntryFunction(
  context: ScriptContext,
  source: string,
  functionName: string,
  missing: () => ScriptStageError,
  log: ChildLogger
): StageOutcome {
  if (source.trim() === "") {
    const error = new ScriptEvalError("Script source is empty");
    log.error("JavaScript eval error", error, { stage: "evaluate" });
    return { ok: false, error };
  }

  const outcome = context.evaluate(source, functionName);
  if (outcome.status === "exception") {
    const error = new ScriptExceptionError(outcome.exception);
    log.error("JavaScript eval threw exception", error, {
      stage: "evaluate",
      exception: outcome.exception,
    });
    return { ok: false, error };
  }
  if (outcome.status === "error") {
    const error = new ScriptEvalError(`Script evaluation failed: ${outcome.error.message}`, {
      cause: outcome.error,
    });
    log.error("JavaScript eval error", error, { stage: "evaluate" });
    return { ok: false, error };
  }

  const fn = outcome.entry;
  if (!fn) {
    const error = missing();
    log.error("JavaScript eval get function error", error, {
      stage: "lookup",
      functionName,
    });
    return { ok: false, error };
  }

  return { ok: true, fn };
}

/**
 * Read a script return value as a boolean; anything else is a call failure
 */
export function expectBoolean(value: unknown, functionName: string): boolean {
  if (typeof value !== "boolean") {
    throw new ScriptCallError(
      `${functionName} returned ${value === null ? "null" : typeof value}, expected boolean`,
      functionName
    );
  }
  return value;
}
