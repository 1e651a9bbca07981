import { describe, expect, it } from "vitest";
import {
  DeadlockError,
  InvalidConfigurationError,
  isSchedulerError,
  MalformedTreeError,
  ParseError,
  SchedulerError,
} from "../src/errors.js";

describe("DeadlockError", () => {
  it("carries the unfinished task names", () => {
    const err = new DeadlockError("scheduling stopped with 2 unfinished task(s): no task is ready or running", [
      "B",
      "C",
    ]);
    expect(err).toBeInstanceOf(SchedulerError);
    expect(err.name).toBe("DeadlockError");
    expect(err.code).toBe("DEADLOCK");
    expect(err.pending).toEqual(["B", "C"]);
    expect(err.message).toBe("scheduling stopped with 2 unfinished task(s): no task is ready or running");
  });
});

describe("location prefix", () => {
  it("prefixes the line number when one is given", () => {
    expect(new MalformedTreeError("bad edge", { line: 4, token: "A_1" }).message).toBe("line 4: bad edge");
    expect(new ParseError("bad token").message).toBe("bad token");
  });
});

describe("isSchedulerError", () => {
  it("accepts library errors only", () => {
    expect(isSchedulerError(new InvalidConfigurationError("nope"))).toBe(true);
    expect(isSchedulerError(new Error("nope"))).toBe(false);
    expect(isSchedulerError("nope")).toBe(false);
  });
});
