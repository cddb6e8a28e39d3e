import { describe, expect, it, vi } from "vitest";
import { createLogger, isLogLevel, type LogSink } from "./logger.js";

function fakeSink() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies LogSink;
}

describe("createLogger", () => {
  it("drops messages below the level", () => {
    const sink = fakeSink();
    const logger = createLogger("warn", "timeline", sink);
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e", { code: "X" });
    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith("[timeline]", "w");
    expect(sink.error).toHaveBeenCalledWith("[timeline]", "e", { code: "X" });
  });

  it("debug level writes everything", () => {
    const sink = fakeSink();
    const logger = createLogger("debug", "sched", sink);
    logger.debug("d", { n: 1 });
    logger.info("i");
    expect(sink.debug).toHaveBeenCalledWith("[sched]", "d", { n: 1 });
    expect(sink.info).toHaveBeenCalledWith("[sched]", "i");
  });

  it("silent writes nothing", () => {
    const sink = fakeSink();
    const logger = createLogger("silent", "timeline", sink);
    logger.error("e");
    expect(sink.error).not.toHaveBeenCalled();
  });
});

describe("Logger.isEnabled", () => {
  it("follows the threshold", () => {
    const logger = createLogger("info", "timeline", fakeSink());
    expect(logger.isEnabled("error")).toBe(true);
    expect(logger.isEnabled("info")).toBe(true);
    expect(logger.isEnabled("debug")).toBe(false);
    expect(createLogger("silent", "timeline", fakeSink()).isEnabled("error")).toBe(false);
  });
});

describe("isLogLevel", () => {
  it("known levels only", () => {
    expect(isLogLevel("info")).toBe(true);
    expect(isLogLevel("INFO")).toBe(false);
  });
});
