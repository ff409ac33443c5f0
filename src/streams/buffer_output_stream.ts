import type { IWriteBuffer } from "../buffers/buffer.ts";
import type { IByteOutputStream } from "./streams.ts";

/**
 * Output stream writing through a buffer. Writes are passed straight to the
 * underlying buffer.
 */
export class BufferOutputStream implements IByteOutputStream {
  readonly #sink: IWriteBuffer;

  /**
   * @param sink The buffer to write to. It is referenced, not owned.
   */
  public constructor(sink: IWriteBuffer) {
    this.#sink = sink;
  }

  public write(byte: number): void {
    this.#sink.write(byte);
  }

  public writeBytes(source: Uint8Array, offset?: number, length?: number): number {
    return this.#sink.writeBytes(source, offset, length);
  }
}
