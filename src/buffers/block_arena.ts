/**
 * Ordered list of equally sized storage blocks shared between a buffer and the
 * slices carved out of it.
 *
 * The list is only ever appended to, trimmed at the front, or reset. The
 * generation counter changes whenever existing blocks move to a different
 * index, so holders of block indices can tell that their indices are stale.
 */
export class BlockArena {
  /** Capacity of every block in this arena. */
  public readonly unitSize: number;
  readonly #blocks: Uint8Array[];
  #generation = 0;

  /**
   * Creates an arena holding one empty block.
   * @param unitSize Capacity of every block.
   */
  constructor(unitSize: number) {
    if (!Number.isSafeInteger(unitSize) || unitSize < 1) {
      throw new RangeError(`unitSize must be a positive integer. Got ${unitSize}`);
    }
    this.unitSize = unitSize;
    this.#blocks = [new Uint8Array(unitSize)];
  }

  /**
   * Layout generation. Starts at 0 and increases each time blocks are dropped
   * or the arena is reset.
   */
  public generation(): number {
    return this.#generation;
  }

  public blockCount(): number {
    return this.#blocks.length;
  }

  /**
   * Returns the block at `index`.
   * @throws RangeError if the index is outside the arena.
   */
  public blockAt(index: number): Uint8Array {
    const block = this.#blocks[index];
    if (block === undefined) {
      throw new RangeError(
        `Block index ${index} is outside the arena (blockCount=${this.#blocks.length}).`,
      );
    }
    return block;
  }

  /**
   * Appends a fresh block and returns its index.
   */
  public append(): number {
    this.#blocks.push(new Uint8Array(this.unitSize));
    return this.#blocks.length - 1;
  }

  /**
   * Removes the first `count` blocks. At least one block always remains.
   */
  public dropLeading(count: number): void {
    if (!Number.isInteger(count) || count < 0 || count >= this.#blocks.length) {
      throw new RangeError(
        `Cannot drop ${count} of ${this.#blocks.length} blocks.`,
      );
    }
    if (count === 0) {
      return;
    }
    this.#blocks.splice(0, count);
    this.#generation++;
  }

  /**
   * Discards every block and starts over with one fresh block. The old blocks
   * are not reused, so slices still holding them never see new data.
   */
  public reset(): void {
    this.#blocks.length = 0;
    this.#blocks.push(new Uint8Array(this.unitSize));
    this.#generation++;
  }
}
