/**
 * Interfaces describing synchronous single-byte streams.
 */

/**
 * Byte-at-a-time input stream.
 */
export interface IByteInputStream {
  /**
   * Reads the next byte (0-255), or -1 when no data is available.
   */
  read(): number;

  /**
   * Reads up to `length` bytes into `target` at `offset`. Returns the number
   * of bytes read, or -1 when no data is available.
   */
  readInto(target: Uint8Array, offset?: number, length?: number): number;
}

/**
 * Byte-at-a-time output stream.
 */
export interface IByteOutputStream {
  /**
   * Writes the low 8 bits of `byte`.
   */
  write(byte: number): void;

  /**
   * Writes `length` bytes of `source` starting at `offset`.
   */
  writeBytes(source: Uint8Array, offset?: number, length?: number): number;
}
