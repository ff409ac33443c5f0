import type { BlockArena } from "./block_arena.ts";
import {
  assertLength,
  UnderflowError,
  ViewInvalidatedError,
} from "./buffer_errors.ts";
import type { Cursor } from "./cursor.ts";
import { ReadableBufferBase } from "./readable_buffer_base.ts";

/**
 * Bounded, read-only view over bytes that belonged to a ByteBuffer.
 *
 * A slice shares the parent's block arena without copying and keeps its own
 * read cursor and mark. It stays valid while the parent only appends; once the
 * parent compacts away blocks or clears, every further call throws
 * ViewInvalidatedError.
 *
 * Slices are created with `ByteBuffer.slice(length)`.
 *
 * @example
 * ```typescript
 * const buffer = new ByteBuffer();
 * buffer.writeInt(7);
 * buffer.writeString("payload");
 *
 * const header = buffer.slice(4);
 * header.readInt(); // 7
 * buffer.readString(7); // "payload"
 * ```
 */
export class ByteSlice extends ReadableBufferBase {
  readonly #end: Cursor;
  readonly #length: number;
  readonly #generation: number;

  /**
   * @param arena The parent's block arena.
   * @param start Position of the first byte of the slice.
   * @param length Number of bytes covered by the slice.
   * @throws UnderflowError if the range runs past the blocks the arena holds.
   */
  public constructor(arena: BlockArena, start: Cursor, length: number) {
    assertLength(length);
    const stored = arena.blockCount() * arena.unitSize;
    const end = start.advance(length, arena.unitSize);
    if (end.position(arena.unitSize) > stored) {
      const available = Math.max(0, stored - start.position(arena.unitSize));
      throw new UnderflowError(
        `Cannot slice ${length} bytes from ${start}; the arena holds only ${available} bytes from there.`,
        length,
        available,
      );
    }
    super(arena, start);
    this.#end = end;
    this.#length = length;
    this.#generation = arena.generation();
  }

  /**
   * Total number of bytes covered by the slice, independent of how many have
   * been read.
   */
  public length(): number {
    return this.#length;
  }

  protected endCursor(): Cursor {
    return this.#end;
  }

  protected override assertUsable(): void {
    const current = this.arena.generation();
    if (current !== this.#generation) {
      throw new ViewInvalidatedError(this.#generation, current);
    }
  }
}
