import { BlockArena } from "./block_arena.ts";
import type {
  IClearable,
  ICompactable,
  IReadWriteBuffer,
} from "./buffer.ts";
import { DEFAULT_INITIAL_CAPACITY } from "./buffer_constants.ts";
import {
  assertLength,
  assertRange,
  OverflowError,
  UnderflowError,
} from "./buffer_errors.ts";
import {
  type ByteBufferOptions,
  resolveBufferOptions,
} from "./buffer_options.ts";
import { ByteSlice } from "./byte_slice.ts";
import { Cursor } from "./cursor.ts";
import { ReadableBufferBase } from "./readable_buffer_base.ts";
import {
  putFloat32,
  putFloat64,
  putInt16,
  putInt32,
  putInt64,
} from "../encoding/big_endian.ts";
import { encode, type TextEncodingName } from "../encoding/text_encoding.ts";
import type { Logger } from "../logging/logger.ts";
import { BufferOutputStream } from "../streams/buffer_output_stream.ts";
import type { IByteOutputStream } from "../streams/streams.ts";

/**
 * Growable in-memory byte buffer with independent read and write cursors.
 *
 * Storage is a list of equally sized blocks. Writes fill the last block and
 * append a new one only once it is full, so growth never copies existing data.
 * Reads consume from the front; `compact()` releases blocks the reader has
 * moved past.
 *
 * Key features:
 * - Unbounded writes: every write succeeds, allocating blocks as needed.
 * - Big-endian fixed-width encoders and decoders for integers, floats and
 *   UTF-16 code units, plus string encoding in several charsets.
 * - Zero-copy hand-off of a byte range through `slice()`.
 * - Single-level `mark()` / `reset()` of the read cursor.
 * - Direct block access (`writeBlock`/`wSkip`, `readBlock`/`rSkip`) for
 *   producers and consumers that copy bytes themselves.
 *
 * @example
 * ```typescript
 * const buffer = new ByteBuffer(4096);
 * buffer.writeShort(0x0102);
 * buffer.writeString("hello");
 *
 * buffer.readShort(); // 0x0102
 * buffer.readString(5); // "hello"
 * buffer.compact();
 * ```
 */
export class ByteBuffer extends ReadableBufferBase
  implements IReadWriteBuffer, ICompactable, IClearable {
  #writeCursor: Cursor = Cursor.START;
  readonly #logger: Logger;

  /**
   * @param initialCapacity Requested size of the first block, rounded up to
   * the minimum block size. Every later block has the same size.
   * @param options Minimum block size and logger.
   */
  public constructor(
    initialCapacity: number = DEFAULT_INITIAL_CAPACITY,
    options: ByteBufferOptions = {},
  ) {
    const resolved = resolveBufferOptions(initialCapacity, options);
    super(new BlockArena(resolved.unitSize), Cursor.START);
    this.#logger = resolved.logger;
  }

  /**
   * Capacity of every block of this buffer.
   */
  public unitSize(): number {
    return this.arena.unitSize;
  }

  /**
   * Number of blocks currently held, including consumed ones not yet
   * compacted.
   */
  public blockCount(): number {
    return this.arena.blockCount();
  }

  protected endCursor(): Cursor {
    return this.#writeCursor;
  }

  public writableBytes(): number {
    this.#allocateIfFull();
    return this.arena.unitSize - this.#writeCursor.offset;
  }

  public write(byte: number): void {
    this.#allocateIfFull();
    const cursor = this.#writeCursor;
    this.arena.blockAt(cursor.block)[cursor.offset] = byte & 0xff;
    this.#writeCursor = cursor.within(1);
  }

  public writeBytes(
    source: Uint8Array,
    offset = 0,
    length: number = source.length - offset,
  ): number {
    assertRange(offset, length, source.length);

    let written = 0;
    while (written < length) {
      this.#allocateIfFull();
      const cursor = this.#writeCursor;
      const count = Math.min(
        length - written,
        this.arena.unitSize - cursor.offset,
      );
      const from = offset + written;
      this.arena.blockAt(cursor.block).set(
        source.subarray(from, from + count),
        cursor.offset,
      );
      this.#writeCursor = cursor.within(count);
      written += count;
    }
    return written;
  }

  public writeByte(value: number): void {
    this.write(value);
  }

  public writeShort(value: number): void {
    putInt16(this, value);
  }

  public writeInt(value: number): void {
    putInt32(this, value);
  }

  public writeLong(value: bigint): void {
    putInt64(this, value);
  }

  public writeFloat(value: number): void {
    putFloat32(this, value);
  }

  public writeDouble(value: number): void {
    putFloat64(this, value);
  }

  /**
   * Writes a single UTF-16 code unit as a big-endian 16-bit value.
   * @throws TypeError if `value` is not exactly one code unit long.
   */
  public writeChar(value: string): void {
    if (value.length !== 1) {
      throw new TypeError(
        `writeChar expects a single UTF-16 code unit. Got a string of length ${value.length}`,
      );
    }
    putInt16(this, value.charCodeAt(0));
  }

  public writeString(
    text: string,
    encoding: TextEncodingName = "utf-8",
  ): number {
    return this.writeBytes(encode(text, encoding));
  }

  public wSkip(length: number): void {
    assertLength(length);
    const available = this.arena.unitSize - this.#writeCursor.offset;
    if (length > available) {
      throw new OverflowError(
        `Cannot skip ${length} bytes; only ${available} remain in the current block.`,
        length,
        available,
      );
    }
    this.#writeCursor = this.#writeCursor.within(length);
  }

  public writeBlock(): Uint8Array {
    this.#allocateIfFull();
    return this.arena.blockAt(this.#writeCursor.block);
  }

  public writeOffset(): number {
    this.#allocateIfFull();
    return this.#writeCursor.offset;
  }

  public outputStream(): IByteOutputStream {
    return new BufferOutputStream(this);
  }

  /**
   * Hands the next `length` readable bytes to a new ByteSlice without copying
   * and moves this buffer's read cursor past them.
   *
   * @throws UnderflowError when fewer than `length` bytes are readable.
   */
  public slice(length: number): ByteSlice {
    assertLength(length);
    const available = this.readableBytes();
    if (length > available) {
      throw new UnderflowError(
        `Cannot slice ${length} bytes; only ${available} are readable.`,
        length,
        available,
      );
    }
    const slice = new ByteSlice(this.arena, this.readCursor, length);
    this.readCursor = this.readCursor.advance(length, this.arena.unitSize);
    return slice;
  }

  /**
   * Releases every block before the one holding the read cursor. Readable
   * content is unchanged. The mark is discarded, and slices taken earlier
   * become unusable when at least one block is released.
   */
  public compact(): void {
    const released = this.readCursor.block;
    if (released > 0) {
      this.arena.dropLeading(released);
      this.readCursor = this.readCursor.shifted(released);
      this.#writeCursor = this.#writeCursor.shifted(released);
      this.#logger.debug(
        `Compacted ${released} block(s); ${this.arena.blockCount()} remain.`,
      );
    }
    this.markedCursor = undefined;
  }

  /**
   * Drops all content and returns to a single empty block. The mark is
   * discarded and every slice taken earlier becomes unusable.
   */
  public clear(): void {
    this.arena.reset();
    this.readCursor = Cursor.START;
    this.#writeCursor = Cursor.START;
    this.markedCursor = undefined;
    this.#logger.debug("Cleared buffer.");
  }

  #allocateIfFull(): void {
    if (this.#writeCursor.offset < this.arena.unitSize) {
      return;
    }
    const index = this.arena.append();
    this.#writeCursor = new Cursor(index, 0);
    this.#logger.debug(
      `Allocated block ${index} (${this.arena.unitSize} bytes).`,
    );
  }
}
