import type { BlockArena } from "./block_arena.ts";
import type { IReadBuffer, IWriteBuffer } from "./buffer.ts";
import { NO_DATA } from "./buffer_constants.ts";
import {
  assertLength,
  assertRange,
  UnderflowError,
} from "./buffer_errors.ts";
import { Cursor } from "./cursor.ts";
import {
  getFloat32,
  getFloat64,
  getInt16,
  getInt32,
  getInt64,
  getInt8,
  getUint16,
  getUint32,
  getUint64,
} from "../encoding/big_endian.ts";
import {
  resolveTextCodec,
  type TextEncodingName,
} from "../encoding/text_encoding.ts";
import { BufferInputStream } from "../streams/buffer_input_stream.ts";
import type { IByteInputStream } from "../streams/streams.ts";

/**
 * Read side shared by ByteBuffer and ByteSlice.
 *
 * Subclasses supply the end of the readable range through `endCursor()` and
 * may veto access through `assertUsable()`; everything else works on the read
 * cursor over the shared block arena.
 */
export abstract class ReadableBufferBase implements IReadBuffer {
  /** Block storage, possibly shared with other views. */
  protected readonly arena: BlockArena;
  /** Position of the next byte to read. */
  protected readCursor: Cursor;
  /** Saved read position, if any. */
  protected markedCursor: Cursor | undefined;

  protected constructor(arena: BlockArena, readCursor: Cursor) {
    this.arena = arena;
    this.readCursor = readCursor;
    this.markedCursor = undefined;
  }

  /**
   * Position just past the last readable byte.
   */
  protected abstract endCursor(): Cursor;

  /**
   * Called at the start of every public operation. Throws when the view can
   * no longer be used.
   */
  protected assertUsable(): void {}

  /**
   * Throws an UnderflowError unless at least `width` bytes are readable.
   */
  protected requireReadable(width: number): void {
    const available = this.readableBytes();
    if (available < width) {
      throw new UnderflowError(
        `Need ${width} readable bytes but only ${available} are available.`,
        width,
        available,
      );
    }
  }

  public isReadable(): boolean {
    return this.readableBytes() > 0;
  }

  public readableBytes(): number {
    this.assertUsable();
    return this.readCursor.distanceTo(this.endCursor(), this.arena.unitSize);
  }

  public read(): number {
    if (!this.isReadable()) {
      return NO_DATA;
    }
    const cursor = this.readCursor.rolled(this.arena.unitSize);
    const byte = this.arena.blockAt(cursor.block)[cursor.offset];
    this.readCursor = cursor.within(1);
    return byte;
  }

  public readInto(
    target: Uint8Array,
    offset = 0,
    length: number = target.length - offset,
  ): number {
    this.assertUsable();
    assertRange(offset, length, target.length);
    if (length === 0) {
      return 0;
    }
    if (!this.isReadable()) {
      return NO_DATA;
    }

    let copied = 0;
    while (copied < length && this.isReadable()) {
      const block = this.readBlock();
      const start = this.readOffset();
      const count = Math.min(
        length - copied,
        block.length - start,
        this.readableBytes(),
      );
      target.set(block.subarray(start, start + count), offset + copied);
      this.readCursor = this.readCursor.within(count);
      copied += count;
    }
    return copied;
  }

  public readByte(): number {
    this.requireReadable(1);
    return getInt8(this);
  }

  public readShort(): number {
    this.requireReadable(2);
    return getInt16(this);
  }

  public readInt(): number {
    this.requireReadable(4);
    return getInt32(this);
  }

  public readLong(): bigint {
    this.requireReadable(8);
    return getInt64(this);
  }

  public readFloat(): number {
    this.requireReadable(4);
    return getFloat32(this);
  }

  public readDouble(): number {
    this.requireReadable(8);
    return getFloat64(this);
  }

  public readChar(): string {
    this.requireReadable(2);
    return String.fromCharCode(getUint16(this));
  }

  public readUByte(): number {
    this.requireReadable(1);
    return this.read();
  }

  public readUShort(): number {
    this.requireReadable(2);
    return getUint16(this);
  }

  public readUInt(): number {
    this.requireReadable(4);
    return getUint32(this);
  }

  public readULong(): bigint {
    this.requireReadable(8);
    return getUint64(this);
  }

  public readString(
    length: number,
    encoding: TextEncodingName = "utf-8",
  ): string {
    assertLength(length);
    const codec = resolveTextCodec(encoding);
    this.requireReadable(length);

    const block = this.readBlock();
    const start = this.readOffset();
    if (length <= block.length - start) {
      const text = codec.decode(block.subarray(start, start + length));
      this.readCursor = this.readCursor.within(length);
      return text;
    }

    const bytes = new Uint8Array(length);
    this.readInto(bytes);
    return codec.decode(bytes);
  }

  public rSkip(length: number): void {
    assertLength(length);
    this.requireReadable(length);
    this.readCursor = this.readCursor.advance(length, this.arena.unitSize);
  }

  public readBlock(): Uint8Array {
    this.#rollIfExhausted();
    return this.arena.blockAt(this.readCursor.block);
  }

  public readOffset(): number {
    this.#rollIfExhausted();
    return this.readCursor.offset;
  }

  public mark(): void {
    this.assertUsable();
    this.markedCursor = this.readCursor;
  }

  public reset(): void {
    this.assertUsable();
    if (this.markedCursor !== undefined) {
      this.readCursor = this.markedCursor;
    }
  }

  /**
   * Moves the bytes readable at the time of the call into `sink`, copying
   * block to block through the direct access methods on both sides.
   *
   * @returns The number of bytes moved.
   */
  public transferTo(sink: IWriteBuffer): number {
    let remaining = this.readableBytes();
    let total = 0;
    while (remaining > 0) {
      const source = this.readBlock();
      const start = this.readOffset();
      const target = sink.writeBlock();
      const at = sink.writeOffset();
      const count = Math.min(
        remaining,
        source.length - start,
        target.length - at,
      );
      target.set(source.subarray(start, start + count), at);
      sink.wSkip(count);
      this.readCursor = this.readCursor.within(count);
      remaining -= count;
      total += count;
    }
    return total;
  }

  public inputStream(): IByteInputStream {
    return new BufferInputStream(this);
  }

  /**
   * Moves a read cursor parked at the end of a block onto the next block when
   * there is more data to read there.
   */
  #rollIfExhausted(): void {
    this.assertUsable();
    if (
      this.readCursor.offset === this.arena.unitSize && this.isReadable()
    ) {
      this.readCursor = this.readCursor.rolled(this.arena.unitSize);
    }
  }
}
