import { afterEach, describe, expect, it } from "vitest";
import { createLogger, getLogLevel, setLogLevel, setLogSink } from "../src/utils/logger.js";

describe("logger", () => {
  const lines: string[] = [];
  const restore = setLogSink((line) => lines.push(line));

  afterEach(() => {
    lines.length = 0;
    setLogLevel("info");
  });

  it("filters below the current level", () => {
    const logger = createLogger();
    logger.debug("hidden");
    logger.info("shown");
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[INFO\] shown$/);
  });

  it("tags the scope and appends data as JSON", () => {
    setLogLevel("debug");
    expect(getLogLevel()).toBe("debug");
    createLogger("engine").debug("Task started", { task: "A", time: 0 });
    expect(lines[0]).toMatch(/\[DEBUG\] \(engine\) Task started \{"task":"A","time":0\}$/);
  });

  it("restores the previous sink", () => {
    const mine = setLogSink(restore);
    createLogger().warn("to original sink");
    expect(lines).toEqual([]);
    setLogSink(mine);
  });
});
