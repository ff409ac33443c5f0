import { describe, expect, it } from "vitest";

import { resolveBufferOptions } from "../buffer_options.ts";
import { ByteBuffer } from "../byte_buffer.ts";
import { createLogger, noopLogger } from "../../logging/logger.ts";

describe("resolveBufferOptions", () => {
  it("rounds small capacities up to the default minimum block size", () => {
    const resolved = resolveBufferOptions(10);

    expect(resolved.unitSize).toBe(1024);
    expect(resolved.logger).toBe(noopLogger);
  });

  it("keeps capacities above the minimum", () => {
    expect(resolveBufferOptions(4096).unitSize).toBe(4096);
  });

  it("honours a custom minimum block size", () => {
    expect(resolveBufferOptions(4, { minimumBlockSize: 8 }).unitSize).toBe(8);
    expect(resolveBufferOptions(16, { minimumBlockSize: 8 }).unitSize).toBe(16);
  });

  it("passes the configured logger through", () => {
    const logger = createLogger({ level: "error" });
    expect(resolveBufferOptions(0, { logger }).logger).toBe(logger);
  });

  it("rejects invalid capacities", () => {
    expect(() => resolveBufferOptions(-1)).toThrow(RangeError);
    expect(() => resolveBufferOptions(1.5)).toThrow(RangeError);
    expect(() => resolveBufferOptions(Number.NaN)).toThrow(RangeError);
  });

  it("rejects invalid minimum block sizes", () => {
    expect(() => resolveBufferOptions(8, { minimumBlockSize: 0 })).toThrow(
      "minimumBlockSize must be a positive integer. Got 0",
    );
  });

  it("is applied by the ByteBuffer constructor", () => {
    expect(new ByteBuffer().unitSize()).toBe(1024);
    expect(new ByteBuffer(4, { minimumBlockSize: 1 }).unitSize()).toBe(4);
    expect(() => new ByteBuffer(-1)).toThrow(RangeError);
  });
});
