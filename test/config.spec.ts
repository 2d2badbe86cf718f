import { afterEach, describe, expect, it, vi } from "vitest";
import {
  ConfigError,
  createLogger,
  DEFAULT_CONFIG,
  getConfig,
  resetConfig,
  resolveConfig,
  setConfig,
} from "../src";

describe("resolveConfig", () => {
  it("falls back to defaults for unset or empty variables", () => {
    expect(resolveConfig({})).toEqual(DEFAULT_CONFIG);
    expect(resolveConfig({ TABLEFLOW_ALIGNMENT: "" })).toEqual(DEFAULT_CONFIG);
  });

  it("reads every TABLEFLOW_ variable", () => {
    expect(
      resolveConfig({
        TABLEFLOW_ALIGNMENT: "64",
        TABLEFLOW_TRANSFER_POLICY: "STAGED",
        TABLEFLOW_MAX_HOST_MB: "2",
        TABLEFLOW_PROFILE: "1",
        TABLEFLOW_LOG: "debug",
        TABLEFLOW_BACKEND: " remote ",
      }),
    ).toEqual({
      alignment: 64,
      transferPolicy: "staged",
      maxHostBytes: 2 * 1024 * 1024,
      profile: true,
      logLevel: "debug",
      backend: "remote",
    });
    expect(resolveConfig({ TABLEFLOW_PROFILE: "false" }).profile).toBe(false);
  });

  it("rejects invalid values", () => {
    expect(() => resolveConfig({ TABLEFLOW_ALIGNMENT: "48" })).toThrow(
      "TABLEFLOW_ALIGNMENT must be a power of two, got 48",
    );
    expect(() => resolveConfig({ TABLEFLOW_MAX_HOST_MB: "-3" })).toThrow(ConfigError);
    expect(() => resolveConfig({ TABLEFLOW_TRANSFER_POLICY: "eager" })).toThrow(
      'TABLEFLOW_TRANSFER_POLICY must be one of batched, staged, got "eager"',
    );
  });
});

describe("process config", () => {
  afterEach(() => {
    resetConfig();
    vi.restoreAllMocks();
  });

  it("applies overrides until reset", () => {
    setConfig({ alignment: 128 });
    expect(getConfig().alignment).toBe(128);
    resetConfig();
    expect(getConfig().alignment).toBe(resolveConfig().alignment);
  });

  it("gates logger output by the configured level", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logger = createLogger("pipeline");

    setConfig({ logLevel: "warn" });
    logger.warn("slow transfer");
    logger.debug("plan");
    setConfig({ logLevel: "debug" });
    logger.debug("plan", 3);

    expect(warn).toHaveBeenCalledWith("[pipeline]", "slow transfer");
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("[pipeline]", "plan", 3);
  });

  it("lets an explicit level override config", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    createLogger("quiet", "silent").error("boom");

    expect(error).not.toHaveBeenCalled();
  });
});
