/**
 * Position inside a list of equally sized blocks.
 *
 * `offset` ranges over `0..unitSize` inclusive. An offset equal to the unit
 * size means "at the end of `block`"; the position is the same as
 * `(block + 1, 0)` but does not require that next block to exist yet, which is
 * how a cursor can sit at the end of the last, completely filled block.
 *
 * Cursors are immutable. Every operation returns a new cursor (or the same
 * instance when nothing moves).
 */
export class Cursor {
  /** The first byte of the first block. */
  public static readonly START: Cursor = new Cursor(0, 0);

  /** Index of the block in the owning block list. */
  public readonly block: number;
  /** Byte offset inside the block. */
  public readonly offset: number;

  constructor(block: number, offset: number) {
    this.block = block;
    this.offset = offset;
  }

  /**
   * Absolute byte position of this cursor from the start of block 0.
   */
  public position(unitSize: number): number {
    return this.block * unitSize + this.offset;
  }

  /**
   * Returns the cursor `length` bytes further on. A result that lands exactly
   * on a block boundary stays at the end of the earlier block.
   */
  public advance(length: number, unitSize: number): Cursor {
    if (length === 0) {
      return this;
    }
    const end = this.position(unitSize) + length;
    const block = Math.floor((end - 1) / unitSize);
    return new Cursor(block, end - block * unitSize);
  }

  /**
   * Number of bytes from this cursor to `other`. Negative when `other` lies
   * before this cursor.
   */
  public distanceTo(other: Cursor, unitSize: number): number {
    return other.position(unitSize) - this.position(unitSize);
  }

  /**
   * Moves a cursor that sits at the end of its block to the start of the
   * next one.
   */
  public rolled(unitSize: number): Cursor {
    return this.offset === unitSize ? new Cursor(this.block + 1, 0) : this;
  }

  /**
   * Returns the same position after `count` leading blocks were removed.
   */
  public shifted(count: number): Cursor {
    if (count > this.block) {
      throw new RangeError(
        `Cannot shift cursor at block ${this.block} down by ${count} blocks.`,
      );
    }
    return count === 0 ? this : new Cursor(this.block - count, this.offset);
  }

  /**
   * Returns a cursor moved forward by `count` bytes inside its own block.
   */
  public within(count: number): Cursor {
    return count === 0 ? this : new Cursor(this.block, this.offset + count);
  }

  public toString(): string {
    return `Cursor(${this.block}, ${this.offset})`;
  }
}
