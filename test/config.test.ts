import { afterEach, describe, expect, it } from "vitest";
import { configure, defaults, getConfig, resetConfig } from "../src/config.js";

afterEach(() => {
  resetConfig();
});

describe("config", () => {
  it("starts from the defaults", () => {
    expect(getConfig()).toEqual(defaults);
    expect(getConfig().loader.defaultProcessors).toBe(1);
    expect(getConfig().report.decimals).toBe(2);
  });

  it("merges overrides per section", () => {
    configure({ loader: { defaultProcessors: 3 }, log: { level: "debug" } });
    expect(getConfig().loader).toEqual({ defaultProcessors: 3, encoding: "utf8" });
    expect(getConfig().log.level).toBe("debug");
    expect(getConfig().report.decimals).toBe(2);
  });

  it("restores the defaults on reset", () => {
    configure({ store: { historyLimit: 5 } });
    resetConfig();
    expect(getConfig().store.historyLimit).toBe(defaults.store.historyLimit);
  });

  it("keeps the defaults frozen", () => {
    expect(Object.isFrozen(defaults)).toBe(true);
  });
});
