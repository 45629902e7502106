import { describe, expect, it } from "vitest";
import { ScriptCallError, ValidationError } from "@subfilter/core";
import type { ScriptContext, ScriptFunction } from "./types.js";
import { VmScriptRuntime, vmScriptEngine } from "./vm-runtime.js";

function newContext() {
  return vmScriptEngine.createRuntime().createContext();
}

function entryOf(context: ScriptContext, source: string, name: string): ScriptFunction {
  const outcome = context.evaluate(source, name);
  if (outcome.status !== "ok" || !outcome.entry) {
    throw new Error(`no ${name} in: ${source}`);
  }
  return outcome.entry;
}

describe("VmScriptRuntime", () => {
  it("numbers runtimes uniquely", () => {
    const a = new VmScriptRuntime();
    const b = new VmScriptRuntime();

    expect(a.id).not.toBe(b.id);
  });

  it("creates contexts that do not share globals", () => {
    const runtime = vmScriptEngine.createRuntime();
    const first = runtime.createContext();
    const second = runtime.createContext();

    first.evaluate("globalThis.shared = 1;", "filter");
    const check = entryOf(second, "function check() { return typeof shared; }", "check");

    expect(first.runtime).toBe(runtime);
    expect(second.call(check, [])).toBe("undefined");
  });
});

describe("VmScriptContext.evaluate", () => {
  it("returns a function declaration as the entry", () => {
    const context = newContext();
    const entry = entryOf(context, "function filter(n) { return n.port > 0; }", "filter");

    expect(entry.name).toBe("filter");
    expect(context.call(entry, [{ port: 80 }])).toBe(true);
  });

  it("returns a const binding as the entry", () => {
    const context = newContext();
    const entry = entryOf(context, "const filter = (n) => n.port > 0;", "filter");

    expect(context.call(entry, [{ port: 0 }])).toBe(false);
  });

  it("returns an assigned binding as the entry", () => {
    const context = newContext();
    const entry = entryOf(context, "filter = (n) => n.port > 0;", "filter");

    expect(context.call(entry, [{ port: 443 }])).toBe(true);
  });

  it("does not leak an assigned binding onto the global object", () => {
    const context = newContext();
    context.evaluate("filter = (n) => true;", "filter");
    const check = entryOf(context, "function check() { return typeof globalThis.filter; }", "check");

    expect(context.call(check, [])).toBe("undefined");
  });

  it("evaluates the same const declaration twice", () => {
    const context = newContext();
    const source = "const filter = (n) => true;";

    const first = context.evaluate(source, "filter");
    const second = context.evaluate(source, "filter");

    expect(first.status).toBe("ok");
    expect(second.status).toBe("ok");
    if (second.status === "ok") {
      expect(second.entry?.name).toBe("filter");
    }
  });

  it("gives no entry when the binding is not callable", () => {
    expect(newContext().evaluate("var filter = 3;", "filter")).toEqual({
      status: "ok",
      entry: undefined,
    });
  });

  it("gives no entry when the binding is absent", () => {
    expect(newContext().evaluate("var count = 3;", "filter")).toEqual({
      status: "ok",
      entry: undefined,
    });
  });

  it("rejects entry names that are not identifiers", () => {
    expect(() => newContext().evaluate("function filter() {}", "filter; process")).toThrow(
      ValidationError
    );
  });

  it("reports a syntax error as an evaluation error", () => {
    const outcome = newContext().evaluate("function filter(n) { return n.port > ; }", "filter");

    expect(outcome.status).toBe("error");
    if (outcome.status === "error") {
      expect(outcome.error.name).toBe("SyntaxError");
    }
  });

  it("reports a thrown error as an exception", () => {
    expect(newContext().evaluate('throw new Error("boom")', "filter")).toEqual({
      status: "exception",
      exception: "Error: boom",
    });
  });

  it("reports a thrown non-error value as an exception", () => {
    expect(newContext().evaluate('throw "plain"', "filter")).toEqual({
      status: "exception",
      exception: "plain",
    });
  });
});

describe("VmScriptContext isolation", () => {
  it("keeps no host globals in the context", () => {
    const context = newContext();
    const check = entryOf(context, "function check() { return typeof process; }", "check");

    expect(context.call(check, [])).toBe("undefined");
  });

  it("does not reach the host through the global object's constructor", () => {
    const context = newContext();
    const check = entryOf(
      context,
      'function check() { return this.constructor.constructor("return typeof process")(); }',
      "check"
    );

    expect(context.call(check, [])).toBe("undefined");
  });

  it("does not reach the host through a top-level this", () => {
    const context = newContext();
    const check = entryOf(
      context,
      'const escaped = this.constructor.constructor("return typeof process")();\n' +
        "function check() { return escaped; }",
      "check"
    );

    expect(context.call(check, [])).toBe("undefined");
  });
});

describe("VmScriptContext.call", () => {
  it("passes a copy of the argument", () => {
    const context = newContext();
    const fn = entryOf(context, "function mutate(n) { n.port = 1; return n.port; }", "mutate");
    const node = { port: 80 };

    expect(context.call(fn, [node])).toBe(1);
    expect(node.port).toBe(80);
  });

  it("fails a call whose argument cannot be marshalled", () => {
    const context = newContext();
    const fn = entryOf(context, "function id(n) { return n; }", "id");

    expect(() => context.call(fn, [{ size: 1n }])).toThrow(ScriptCallError);
    expect(() => context.call(fn, [undefined])).toThrow("Argument 0 of id has no script representation");
  });

  it("wraps an exception thrown by the function", () => {
    const context = newContext();
    const fn = entryOf(context, 'function boom() { throw new Error("nope"); }', "boom");

    expect(() => context.call(fn, [])).toThrow("boom threw: Error: nope");
  });

  it("refuses a function from another context", () => {
    const fn = entryOf(newContext(), "function filter() { return true; }", "filter");

    expect(() => newContext().call(fn, [])).toThrow(ScriptCallError);
  });
});
