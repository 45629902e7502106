/**
 * Configuration Management
 * Loads and validates the process-wide settings snapshot from environment variables
 */

import { z } from "zod";
import "dotenv/config";
import { ConfigError } from "./errors.js";
import { logger, type LogLevel } from "./logger.js";

const booleanFlag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback)
    .transform((value) => value === "true" || value === "1");

const settingsEnvSchema = z.object({
  // Rule generation
  ENABLE_RULE_GEN: booleanFlag("true"),
  OVERWRITE_ORIGINAL_RULES: booleanFlag("false"),

  // Surge
  SURGE_SSR_PATH: z.string().default(""),

  // Clash output style
  CLASH_PROXIES_STYLE: z.string().default(""),
  CLASH_PROXY_GROUPS_STYLE: z.string().default(""),

  // General
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type SettingsEnv = z.infer<typeof settingsEnvSchema>;

/**
 * Process-wide settings snapshot
 */
export interface Settings {
  enableRuleGen: boolean;
  overwriteOriginalRules: boolean;
  surgeSsrPath: string;
  clashProxiesStyle: string;
  clashProxyGroupsStyle: string;

  env: {
    logLevel: LogLevel;
    nodeEnv: "development" | "production" | "test";
  };
}

let settingsInstance: Settings | null = null;

/**
 * Load and validate settings
 */
export function loadSettings(
  env: Record<string, string | undefined> = process.env
): Settings {
  const parseResult = settingsEnvSchema.safeParse(env);

  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Configuration validation failed:\n${errors}`, {
      fields: parseResult.error.issues.map((e) => e.path.join(".")),
    });
  }

  const parsed = parseResult.data;

  return {
    enableRuleGen: parsed.ENABLE_RULE_GEN,
    overwriteOriginalRules: parsed.OVERWRITE_ORIGINAL_RULES,
    surgeSsrPath: parsed.SURGE_SSR_PATH,
    clashProxiesStyle: parsed.CLASH_PROXIES_STYLE,
    clashProxyGroupsStyle: parsed.CLASH_PROXY_GROUPS_STYLE,

    env: {
      logLevel: parsed.LOG_LEVEL,
      nodeEnv: parsed.NODE_ENV,
    },
  };
}

/**
 * Get the current settings snapshot (lazy-loaded singleton)
 */
export function getSettings(): Settings {
  if (!settingsInstance) {
    const loaded = loadSettings();
    setSettings(loaded);
    return loaded;
  }
  return settingsInstance;
}

/**
 * Install a settings snapshot, e.g. one read from a config file by the host application
 */
export function setSettings(settings: Settings): void {
  settingsInstance = settings;
  logger.setLevel(settings.env.logLevel);
}

/**
 * Reset settings (for testing)
 */
export function resetSettings(): void {
  settingsInstance = null;
}
