/**
 * node:vm Script Engine
 * Each context is its own vm context (separate globals and builtins).
 * Node has no separate interpreter per runtime, so a runtime here is the
 * numbered owner of the contexts created from it.
 */

import * as vm from "vm";
import {
  EngineInitError,
  ScriptCallError,
  ValidationError,
  wrapError,
} from "@subfilter/core";
import { describeThrown } from "./thrown.js";
import type {
  EvaluationOutcome,
  ScriptContext,
  ScriptEngine,
  ScriptFunction,
  ScriptRuntime,
} from "./types.js";

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

let nextRuntimeId = 1;

function assertIdentifier(name: string): void {
  if (!IDENTIFIER.test(name)) {
    throw new ValidationError(`Invalid global name: ${name}`, { field: "name" });
  }
}

class VmScriptFunction implements ScriptFunction {
  constructor(
    readonly name: string,
    readonly target: Function,
    readonly owner: VmScriptContext
  ) {}
}

/**
 * A vm context with a JSON bridge for arguments
 */
export class VmScriptContext implements ScriptContext {
  private readonly sandbox: vm.Context;
  private readonly parseJson: Function;

  constructor(
    readonly runtime: VmScriptRuntime,
    readonly name: string
  ) {
    // No prototype: a host Object.prototype on the sandbox would hand scripts
    // the host Function constructor through `this.constructor.constructor`
    this.sandbox = vm.createContext(Object.create(null), { name });

    // Captured before any script runs; reassigning JSON later does not affect marshalling
    const parse: unknown = vm.runInContext("JSON.parse", this.sandbox);
    if (typeof parse !== "function") {
      throw new EngineInitError(`Context ${name} has no JSON.parse`);
    }
    this.parseJson = parse;
  }

  evaluate(source: string, entryName: string, filename = "filter-script.js"): EvaluationOutcome {
    assertIdentifier(entryName);

    // The outer var catches sloppy `name = ...` assignments; the inner function
    // holds the script's own declarations. Both are fresh on every run.
    const wrapped =
      `(function () { var ${entryName}; return (function () {\n` +
      `${source}\n` +
      `;return typeof ${entryName} === "function" ? ${entryName} : undefined; })(); })()`;

    let script: vm.Script;
    try {
      script = new vm.Script(wrapped, { filename, lineOffset: -1 });
    } catch (error) {
      return {
        status: "error",
        error: error instanceof Error ? error : new Error(describeThrown(error)),
      };
    }

    let value: unknown;
    try {
      value = script.runInContext(this.sandbox);
    } catch (thrown) {
      return { status: "exception", exception: describeThrown(thrown) };
    }

    return {
      status: "ok",
      entry: typeof value === "function" ? new VmScriptFunction(entryName, value, this) : undefined,
    };
  }

  call(fn: ScriptFunction, args: readonly unknown[]): unknown {
    if (!(fn instanceof VmScriptFunction) || fn.owner !== this) {
      throw new ScriptCallError(`Function ${fn.name} does not belong to context ${this.name}`, fn.name);
    }

    const marshalled = args.map((arg, index) => this.marshal(arg, fn.name, index));

    try {
      return Reflect.apply(fn.target, undefined, marshalled);
    } catch (thrown) {
      throw new ScriptCallError(`${fn.name} threw: ${describeThrown(thrown)}`, fn.name, {
        cause: thrown instanceof Error ? thrown : undefined,
      });
    }
  }

  /**
   * Rebuild a host value as a plain JSON value owned by the context
   */
  private marshal(value: unknown, functionName: string, index: number): unknown {
    let text: string | undefined;
    try {
      text = JSON.stringify(value);
    } catch (error) {
      throw new ScriptCallError(
        `Argument ${index} of ${functionName} cannot be marshalled: ${describeThrown(error)}`,
        functionName,
        { cause: error instanceof Error ? error : undefined }
      );
    }

    if (text === undefined) {
      throw new ScriptCallError(
        `Argument ${index} of ${functionName} has no script representation`,
        functionName
      );
    }

    return Reflect.apply(this.parseJson, undefined, [text]);
  }
}

/**
 * Runtime handing out vm contexts
 */
export class VmScriptRuntime implements ScriptRuntime {
  readonly id = nextRuntimeId++;
  private contextCount = 0;

  createContext(): ScriptContext {
    this.contextCount += 1;
    const name = `subfilter-runtime-${this.id}-context-${this.contextCount}`;

    try {
      return new VmScriptContext(this, name);
    } catch (error) {
      if (error instanceof EngineInitError) {
        throw error;
      }
      throw new EngineInitError(`Failed to create script context ${name}`, wrapError(error));
    }
  }
}

export const vmScriptEngine: ScriptEngine = {
  name: "node:vm",
  createRuntime: () => new VmScriptRuntime(),
};
