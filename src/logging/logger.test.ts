import { describe, it, expect } from "vitest";
import { makeNoopLogger, runLogFileName } from "./logger.js";

describe("runLogFileName", () => {
  it("should stamp the file with the UTC start time", () => {
    expect(runLogFileName(new Date("2026-01-02T03:04:05.678Z"))).toBe("agent_run_20260102_030405.log");
  });
});

describe("makeNoopLogger", () => {
  it("should produce a disabled logger that still accepts calls", () => {
    const logger = makeNoopLogger();

    expect(logger.isLevelEnabled("error")).toBe(false);
    expect(() => logger.child({ component: "test" }).info("ignored")).not.toThrow();
  });
});
