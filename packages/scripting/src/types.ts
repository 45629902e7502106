/**
 * Scripting Types
 * The narrow boundary between the host and an embedded script engine
 */

// ============================================
// ENGINE / RUNTIME / CONTEXT
// ============================================

/**
 * Engine interface - produces runtimes
 */
export interface ScriptEngine {
  /** Engine identifier, used in logs */
  readonly name: string;

  /**
   * Create a new runtime. Throws EngineInitError when the engine cannot start.
   */
  createRuntime(): ScriptRuntime;
}

/**
 * One interpreter instance; owns the contexts created from it
 */
export interface ScriptRuntime {
  /** Unique per process, for identity checks */
  readonly id: number;

  /**
   * Create an isolated global environment. Throws EngineInitError on failure.
   */
  createContext(): ScriptContext;
}

/**
 * An isolated global environment that scripts are evaluated in
 */
export interface ScriptContext {
  readonly runtime: ScriptRuntime;

  /**
   * Compile and run a program in its own function scope and return the
   * function it binds to `entryName`. Declarations never outlive the run,
   * so the same source can be evaluated any number of times.
   */
  evaluate(source: string, entryName: string, filename?: string): EvaluationOutcome;

  /**
   * Marshal the arguments into the context and call the function.
   * Throws ScriptCallError on marshal failure or when the script throws.
   */
  call(fn: ScriptFunction, args: readonly unknown[]): unknown;
}

/**
 * Opaque handle to a callable living inside a context
 */
export interface ScriptFunction {
  readonly name: string;
}

// ============================================
// OUTCOMES
// ============================================

/**
 * Result of evaluating a program
 */
export type EvaluationOutcome =
  /** The entry function, or undefined when absent or not callable */
  | { status: "ok"; entry: ScriptFunction | undefined }
  /** The script threw; the thrown value in string form */
  | { status: "exception"; exception: string }
  /** Compile or engine fault */
  | { status: "error"; error: Error };
