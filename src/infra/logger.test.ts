import { describe, it, expect, afterEach } from "vitest";
import { logger, createLogger, setLogLevel } from "./logger.js";

describe("setLogLevel", () => {
  afterEach(() => {
    setLogLevel("silent");
  });

  it("should update loggers created before the change", () => {
    const early = createLogger("early");
    setLogLevel("debug");

    expect(logger.level).toBe("debug");
    expect(early.isLevelEnabled("debug")).toBe(true);

    setLogLevel("silent");
    expect(early.isLevelEnabled("info")).toBe(false);
  });

  it("should apply to loggers created afterwards", () => {
    setLogLevel("warn");
    const late = createLogger("late");
    expect(late.isLevelEnabled("warn")).toBe(true);
    expect(late.isLevelEnabled("info")).toBe(false);
  });
});
