import type { IReadBuffer } from "../buffers/buffer.ts";
import type { IByteInputStream } from "./streams.ts";

/**
 * Input stream reading through a buffer or slice.
 * Holds no state: every call moves the source's read cursor exactly as calling
 * the source directly would.
 */
export class BufferInputStream implements IByteInputStream {
  readonly #source: IReadBuffer;

  /**
   * @param source The buffer or slice to read from. It is referenced, not owned.
   */
  public constructor(source: IReadBuffer) {
    this.#source = source;
  }

  public read(): number {
    return this.#source.read();
  }

  public readInto(target: Uint8Array, offset?: number, length?: number): number {
    return this.#source.readInto(target, offset, length);
  }
}
