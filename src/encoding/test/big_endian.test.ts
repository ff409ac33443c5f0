import { describe, expect, it } from "vitest";

import {
  type ByteSink,
  type ByteSource,
  getFloat32,
  getFloat64,
  getInt16,
  getInt32,
  getInt64,
  getInt8,
  getUint16,
  getUint32,
  getUint64,
  putFloat32,
  putFloat64,
  putInt16,
  putInt32,
  putInt64,
} from "../big_endian.ts";

class ArraySink implements ByteSink {
  public readonly bytes: number[] = [];

  write(byte: number): void {
    this.bytes.push(byte & 0xff);
  }
}

class ArraySource implements ByteSource {
  readonly #bytes: number[];
  #index = 0;

  constructor(bytes: number[]) {
    this.#bytes = bytes;
  }

  read(): number {
    if (this.#index >= this.#bytes.length) {
      return -1;
    }
    return this.#bytes[this.#index++];
  }
}

const written = (put: (sink: ByteSink) => void): number[] => {
  const sink = new ArraySink();
  put(sink);
  return sink.bytes;
};

describe("big-endian writers", () => {
  it("writes 16-bit values high byte first", () => {
    expect(written((sink) => putInt16(sink, 0x1234))).toEqual([0x12, 0x34]);
    expect(written((sink) => putInt16(sink, -1))).toEqual([0xff, 0xff]);
  });

  it("writes 32-bit values high byte first", () => {
    expect(written((sink) => putInt32(sink, 0x12345678))).toEqual([
      0x12,
      0x34,
      0x56,
      0x78,
    ]);
  });

  it("writes 64-bit values in two's complement", () => {
    expect(written((sink) => putInt64(sink, 0x0102030405060708n))).toEqual([
      1,
      2,
      3,
      4,
      5,
      6,
      7,
      8,
    ]);
    expect(written((sink) => putInt64(sink, -2n))).toEqual([
      0xff,
      0xff,
      0xff,
      0xff,
      0xff,
      0xff,
      0xff,
      0xfe,
    ]);
  });

  it("writes IEEE-754 bit patterns", () => {
    expect(written((sink) => putFloat32(sink, 1))).toEqual([0x3f, 0x80, 0, 0]);
    expect(written((sink) => putFloat32(sink, -2.5))).toEqual([
      0xc0,
      0x20,
      0,
      0,
    ]);
    expect(written((sink) => putFloat64(sink, 1))).toEqual([
      0x3f,
      0xf0,
      0,
      0,
      0,
      0,
      0,
      0,
    ]);
  });
});

describe("big-endian readers", () => {
  it("sign-extends 8- and 16-bit values", () => {
    expect(getInt8(new ArraySource([0x80]))).toBe(-128);
    expect(getInt16(new ArraySource([0x80, 0x00]))).toBe(-32768);
    expect(getUint16(new ArraySource([0x80, 0x00]))).toBe(32768);
  });

  it("reads 32-bit values signed and unsigned", () => {
    expect(getInt32(new ArraySource([0xff, 0xff, 0xff, 0xfe]))).toBe(-2);
    expect(getUint32(new ArraySource([0xff, 0xff, 0xff, 0xfe]))).toBe(
      4294967294,
    );
  });

  it("reads 64-bit values signed and unsigned", () => {
    expect(getInt64(new ArraySource([0x80, 0, 0, 0, 0, 0, 0, 0]))).toBe(
      -(2n ** 63n),
    );
    expect(getUint64(new ArraySource(new Array<number>(8).fill(0xff)))).toBe(
      2n ** 64n - 1n,
    );
    expect(getInt64(new ArraySource([0, 0, 0, 1, 0, 0, 0, 2]))).toBe(
      0x100000002n,
    );
  });

  it("reads IEEE-754 bit patterns", () => {
    expect(getFloat32(new ArraySource([0x3f, 0x80, 0, 0]))).toBe(1);
    expect(
      getFloat64(
        new ArraySource([0x40, 0x09, 0x21, 0xfb, 0x54, 0x44, 0x2d, 0x18]),
      ),
    ).toBe(Math.PI);
  });
});
