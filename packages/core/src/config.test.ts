import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { getSettings, loadSettings, resetSettings, setSettings, type Settings } from "./config.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

describe("loadSettings", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadSettings({})).toEqual({
      enableRuleGen: true,
      overwriteOriginalRules: false,
      surgeSsrPath: "",
      clashProxiesStyle: "",
      clashProxyGroupsStyle: "",
      env: { logLevel: "info", nodeEnv: "development" },
    });
  });

  it("reads flags and strings from the environment", () => {
    const settings = loadSettings({
      ENABLE_RULE_GEN: "0",
      OVERWRITE_ORIGINAL_RULES: "true",
      SURGE_SSR_PATH: "/usr/local/bin/ssr-local",
      CLASH_PROXIES_STYLE: "block",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
    });

    expect(settings.enableRuleGen).toBe(false);
    expect(settings.overwriteOriginalRules).toBe(true);
    expect(settings.surgeSsrPath).toBe("/usr/local/bin/ssr-local");
    expect(settings.clashProxiesStyle).toBe("block");
    expect(settings.clashProxyGroupsStyle).toBe("");
    expect(settings.env).toEqual({ logLevel: "debug", nodeEnv: "production" });
  });

  it("rejects invalid values with a ConfigError", () => {
    expect(() => loadSettings({ LOG_LEVEL: "loud" })).toThrow(ConfigError);
    expect(() => loadSettings({ ENABLE_RULE_GEN: "yes" })).toThrow(/ENABLE_RULE_GEN/);
  });
});

describe("getSettings", () => {
  beforeEach(() => {
    resetSettings();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetSettings();
    logger.setLevel("info");
  });

  it("loads lazily from process.env and caches the snapshot", () => {
    vi.stubEnv("SURGE_SSR_PATH", "/opt/ssr/bin");

    const first = getSettings();
    vi.stubEnv("SURGE_SSR_PATH", "/somewhere/else");

    expect(first.surgeSsrPath).toBe("/opt/ssr/bin");
    expect(getSettings()).toBe(first);
  });

  it("returns an installed snapshot and applies its log level", () => {
    const custom: Settings = {
      enableRuleGen: false,
      overwriteOriginalRules: true,
      surgeSsrPath: "",
      clashProxiesStyle: "flow",
      clashProxyGroupsStyle: "block",
      env: { logLevel: "error", nodeEnv: "test" },
    };

    setSettings(custom);

    expect(getSettings()).toBe(custom);
    expect(logger.getLevel()).toBe("error");
  });
});
