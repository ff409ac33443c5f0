import { afterEach, describe, expect, it, vi } from "vitest";

import {
  createLogger,
  type LogSink,
  noopLogger,
  passesLevel,
} from "../logger.ts";

const createSink = () => ({
  debug: vi.fn<LogSink["debug"]>(),
  info: vi.fn<LogSink["info"]>(),
  warn: vi.fn<LogSink["warn"]>(),
  error: vi.fn<LogSink["error"]>(),
});

describe("passesLevel", () => {
  it("lets equal and higher levels through", () => {
    expect(passesLevel("warn", "warn")).toBe(true);
    expect(passesLevel("error", "info")).toBe(true);
    expect(passesLevel("debug", "info")).toBe(false);
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops messages below the configured level", () => {
    const sink = createSink();
    const logger = createLogger({ level: "warn", sink });

    logger.debug("d");
    logger.info("i");
    logger.warn("w", 1);
    logger.error("e");

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith("w", 1);
    expect(sink.error).toHaveBeenCalledWith("e");
  });

  it("prefixes messages with the scope", () => {
    const sink = createSink();
    const logger = createLogger({ level: "debug", scope: "Arena", sink });

    logger.info("ready", { blocks: 2 });

    expect(sink.info).toHaveBeenCalledWith("[Arena]", "ready", { blocks: 2 });
  });

  it("writes to the console by default", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger({ level: "error" });

    logger.error("boom");

    expect(spy).toHaveBeenCalledWith("boom");
  });
});

describe("noopLogger", () => {
  it("accepts every level without output", () => {
    const spy = vi.spyOn(console, "debug").mockImplementation(() => {});

    noopLogger.debug("x");
    noopLogger.info("x");
    noopLogger.warn("x");
    noopLogger.error("x");

    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });
});
