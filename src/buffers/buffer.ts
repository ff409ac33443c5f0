/**
 * Interfaces for sequential readable and writable byte buffers.
 */
import type { TextEncodingName } from "../encoding/text_encoding.ts";
import type {
  IByteInputStream,
  IByteOutputStream,
} from "../streams/streams.ts";

/**
 * Interface describing a buffer read sequentially through a read cursor.
 */
export interface IReadBuffer {
  /** Returns whether `read()` would return a byte. */
  isReadable(): boolean;

  /** Number of bytes between the read cursor and the end of the data. */
  readableBytes(): number;

  /**
   * Reads one byte (0-255) and advances the read cursor.
   * Returns `NO_DATA` (-1) when nothing is readable.
   */
  read(): number;

  /**
   * Copies up to `length` bytes into `target` starting at `offset` and
   * returns how many were copied. Returns 0 when `length` is 0 and `NO_DATA`
   * when nothing is readable. May copy fewer bytes than requested.
   *
   * @throws IndexError when the range does not fit inside `target`.
   */
  readInto(target: Uint8Array, offset?: number, length?: number): number;

  /** Reads a signed 8-bit integer. @throws UnderflowError */
  readByte(): number;
  /** Reads a signed big-endian 16-bit integer. @throws UnderflowError */
  readShort(): number;
  /** Reads a signed big-endian 32-bit integer. @throws UnderflowError */
  readInt(): number;
  /** Reads a signed big-endian 64-bit integer. @throws UnderflowError */
  readLong(): bigint;
  /** Reads a big-endian IEEE-754 binary32 value. @throws UnderflowError */
  readFloat(): number;
  /** Reads a big-endian IEEE-754 binary64 value. @throws UnderflowError */
  readDouble(): number;
  /** Reads one UTF-16 code unit stored as 16 bits. @throws UnderflowError */
  readChar(): string;
  /** Reads an unsigned 8-bit integer. @throws UnderflowError */
  readUByte(): number;
  /** Reads an unsigned big-endian 16-bit integer. @throws UnderflowError */
  readUShort(): number;
  /** Reads an unsigned big-endian 32-bit integer. @throws UnderflowError */
  readUInt(): number;
  /** Reads an unsigned big-endian 64-bit integer. @throws UnderflowError */
  readULong(): bigint;

  /**
   * Consumes exactly `length` bytes and decodes them.
   * @throws UnderflowError when fewer than `length` bytes are readable.
   */
  readString(length: number, encoding?: TextEncodingName): string;

  /**
   * Advances the read cursor by `length` bytes.
   * @throws UnderflowError when fewer than `length` bytes are readable.
   */
  rSkip(length: number): void;

  /**
   * Block holding the next readable byte. Readable data starts at
   * `readOffset()`. Valid until the next read or skip.
   */
  readBlock(): Uint8Array;

  /** Offset of the next readable byte inside `readBlock()`. */
  readOffset(): number;

  /** Remembers the read cursor, replacing any earlier mark. */
  mark(): void;

  /** Returns the read cursor to the mark. Does nothing without a mark. */
  reset(): void;

  /**
   * Moves every readable byte into `sink` and returns the number moved.
   */
  transferTo(sink: IWriteBuffer): number;

  /** Returns a single-byte input stream reading through this buffer. */
  inputStream(): IByteInputStream;
}

/**
 * Interface describing an append-only buffer written through a write cursor.
 */
export interface IWriteBuffer {
  /**
   * Space left in the current block. Allocates a new block first when the
   * current one is full, so the result is never 0.
   */
  writableBytes(): number;

  /** Writes the low 8 bits of `byte`. */
  write(byte: number): void;

  /**
   * Writes `length` bytes of `source` starting at `offset` and returns
   * `length`.
   *
   * @throws IndexError when the range does not fit inside `source`.
   */
  writeBytes(source: Uint8Array, offset?: number, length?: number): number;

  writeByte(value: number): void;
  writeShort(value: number): void;
  writeInt(value: number): void;
  writeLong(value: bigint): void;
  writeFloat(value: number): void;
  writeDouble(value: number): void;
  writeChar(value: string): void;

  /**
   * Encodes `text` and writes the bytes without a length prefix. Returns the
   * number of bytes written.
   */
  writeString(text: string, encoding?: TextEncodingName): number;

  /**
   * Advances the write cursor inside the current block without allocating.
   * @throws OverflowError when `length` exceeds the space left in the block.
   */
  wSkip(length: number): void;

  /**
   * Block the next byte will be written to, starting at `writeOffset()`.
   * Allocates first when the current block is full.
   */
  writeBlock(): Uint8Array;

  /** Offset of the write cursor inside `writeBlock()`. */
  writeOffset(): number;

  /** Returns a single-byte output stream writing through this buffer. */
  outputStream(): IByteOutputStream;
}

/**
 * Buffers that can release storage already consumed by the reader.
 */
export interface ICompactable {
  compact(): void;
}

/**
 * Buffers that can drop all content and return to their initial state.
 */
export interface IClearable {
  clear(): void;
}

/**
 * Convenience type for buffers capable of both read and write operations.
 */
export type IReadWriteBuffer = IReadBuffer & IWriteBuffer;
