/**
 * Extra Settings
 * Per-job export settings plus the script runtime used by node filtering and sorting
 */

import { z } from "zod";
import {
  EngineInitError,
  getSettings,
  logger,
  ValidationError,
  wrapError,
  type Settings,
} from "@subfilter/core";
import {
  applyFilter,
  applySort,
  vmScriptEngine,
  type FilterResult,
  type ScriptContext,
  type ScriptEngine,
  type ScriptRuntime,
  type SortResult,
} from "@subfilter/scripting";
import { describeNode, type ProxyNode } from "./proxy.js";
import { RegexMatchConfigSchema } from "./regex-match.js";

const log = logger.child({ component: "extra-settings" });

const DEFAULT_CLASH_STYLE = "flow";

export const ExtraSettingsFieldsSchema = z.object({
  enableRuleGenerator: z.boolean(),
  overwriteOriginalRules: z.boolean(),
  renameArray: z.array(RegexMatchConfigSchema),
  emojiArray: z.array(RegexMatchConfigSchema),
  addEmoji: z.boolean(),
  removeEmoji: z.boolean(),
  appendProxyType: z.boolean(),
  nodelist: z.boolean(),
  sortFlag: z.boolean(),
  filterDeprecated: z.boolean(),
  clashNewFieldName: z.boolean(),
  clashScript: z.boolean(),
  surgeSsrPath: z.string(),
  managedConfigPrefix: z.string(),
  quanxDevId: z.string(),
  udp: z.boolean().optional(),
  tfo: z.boolean().optional(),
  skipCertVerify: z.boolean().optional(),
  tls13: z.boolean().optional(),
  clashClassicalRuleset: z.boolean(),
  sortScript: z.string(),
  clashProxiesStyle: z.string(),
  clashProxyGroupsStyle: z.string(),
  authorized: z.boolean(),
});

export type ExtraSettingsFields = z.infer<typeof ExtraSettingsFieldsSchema>;

/** Overrides accepted from request options; unknown keys are rejected */
export const ExtraSettingsOptionsSchema = ExtraSettingsFieldsSchema.partial().strict();
export type ExtraSettingsOptions = z.infer<typeof ExtraSettingsOptionsSchema>;

export interface ExtraSettingsInit {
  /** Snapshot to default from; the process-wide one when omitted */
  settings?: Settings;

  /** Script engine; node:vm when omitted */
  engine?: ScriptEngine;
}

interface ScriptingState {
  runtime: ScriptRuntime;
  context: ScriptContext;
}

/**
 * Settings for one subscription export.
 * Not safe to share between concurrent jobs: each job owns its instance and
 * with it its script context.
 */
export class ExtraSettings implements ExtraSettingsFields {
  enableRuleGenerator: boolean;
  overwriteOriginalRules: boolean;
  renameArray: ExtraSettingsFields["renameArray"] = [];
  emojiArray: ExtraSettingsFields["emojiArray"] = [];
  addEmoji = false;
  removeEmoji = false;
  appendProxyType = false;
  nodelist = false;
  sortFlag = false;
  filterDeprecated = false;
  clashNewFieldName = true;
  clashScript = false;
  surgeSsrPath: string;
  managedConfigPrefix = "";
  quanxDevId = "";
  udp: boolean | undefined = undefined;
  tfo: boolean | undefined = undefined;
  skipCertVerify: boolean | undefined = undefined;
  tls13: boolean | undefined = undefined;
  clashClassicalRuleset = false;
  sortScript = "";
  clashProxiesStyle: string;
  clashProxyGroupsStyle: string;
  authorized = false;

  private readonly engine: ScriptEngine;
  private scripting: ScriptingState | null = null;

  constructor(init: ExtraSettingsInit = {}) {
    const global = init.settings ?? getSettings();

    this.enableRuleGenerator = global.enableRuleGen;
    this.overwriteOriginalRules = global.overwriteOriginalRules;
    this.surgeSsrPath = global.surgeSsrPath;
    this.clashProxiesStyle = global.clashProxiesStyle || DEFAULT_CLASH_STYLE;
    this.clashProxyGroupsStyle = global.clashProxyGroupsStyle || DEFAULT_CLASH_STYLE;
    this.engine = init.engine ?? vmScriptEngine;
  }

  /**
   * Apply request option overrides. Throws ValidationError and changes
   * nothing when any override is invalid.
   */
  applyOptions(input: unknown): void {
    const result = ExtraSettingsOptionsSchema.safeParse(input);
    if (!result.success) {
      const issue = result.error.issues[0];
      const field = issue?.path.join(".") ?? "";
      throw new ValidationError(`Invalid option ${field || "<root>"}: ${issue?.message}`, {
        field,
      });
    }
    Object.assign(this, result.data);
  }

  get hasScriptContext(): boolean {
    return this.scripting !== null;
  }

  /** The live runtime, if one was created */
  get scriptRuntime(): ScriptRuntime | undefined {
    return this.scripting?.runtime;
  }

  /**
   * Create the runtime/context pair on first use; afterwards always return
   * the same context. Throws EngineInitError when the engine cannot start.
   */
  ensureScriptContext(): ScriptContext {
    if (this.scripting) {
      return this.scripting.context;
    }

    let runtime: ScriptRuntime;
    let context: ScriptContext;
    try {
      runtime = this.engine.createRuntime();
      context = runtime.createContext();
    } catch (error) {
      const initError =
        error instanceof EngineInitError
          ? error
          : new EngineInitError(
              `Failed to start the ${this.engine.name} script engine`,
              wrapError(error)
            );
      log.error("JavaScript engine initialization failed", initError, {
        engine: this.engine.name,
      });
      throw initError;
    }

    this.scripting = { runtime, context };
    log.debug("Script context created", { engine: this.engine.name, runtimeId: runtime.id });
    return context;
  }

  /**
   * Keep only the nodes the script's `filter(node)` returns true for
   */
  evalFilterFunction(nodes: ProxyNode[], source: string): FilterResult {
    const context = this.tryEnsureScriptContext();
    if (context instanceof EngineInitError) {
      return { success: false, error: context };
    }
    return applyFilter(context, nodes, source, { describe: describeNode });
  }

  /**
   * Sort nodes with the script's `compare(a, b)`; defaults to `sortScript`
   */
  evalSortFunction(nodes: ProxyNode[], source: string = this.sortScript): SortResult {
    const context = this.tryEnsureScriptContext();
    if (context instanceof EngineInitError) {
      return { success: false, error: context };
    }
    return applySort(context, nodes, source);
  }

  toJSON(): ExtraSettingsFields & { scriptContextActive: boolean } {
    return {
      ...ExtraSettingsFieldsSchema.parse(this),
      scriptContextActive: this.hasScriptContext,
    };
  }

  private tryEnsureScriptContext(): ScriptContext | EngineInitError {
    try {
      return this.ensureScriptContext();
    } catch (error) {
      if (error instanceof EngineInitError) {
        return error;
      }
      throw error;
    }
  }
}
