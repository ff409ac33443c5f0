/**
 * Error classes for buffer, slice and cursor operations.
 *
 * Every error is raised before the failing operation changes any state, so a
 * caller that catches one can keep using the buffer.
 */

/**
 * Error thrown when the offset/length arguments of a bulk operation do not
 * describe a range inside the caller's array, or when a length is negative.
 */
export class IndexError extends RangeError {
  /** The offset passed by the caller. */
  public readonly offset: number;
  /** The length passed by the caller. */
  public readonly length: number;
  /** The length of the caller's array, or -1 when no array is involved. */
  public readonly arrayLength: number;

  /**
   * Creates a new IndexError.
   * @param message The error message.
   * @param offset The offset passed by the caller.
   * @param length The length passed by the caller.
   * @param arrayLength The length of the caller's array.
   */
  constructor(
    message: string,
    offset: number,
    length: number,
    arrayLength: number,
  ) {
    super(message);
    this.name = "IndexError";
    this.offset = offset;
    this.length = length;
    this.arrayLength = arrayLength;
  }
}

/**
 * Error thrown when a fixed-size read, a string read, a skip or a slice asks
 * for more bytes than are currently readable. Callers decoding from a live
 * source can catch it, wait for more data and retry.
 */
export class UnderflowError extends RangeError {
  /** Number of bytes the operation needed. */
  public readonly requested: number;
  /** Number of bytes that were readable. */
  public readonly available: number;

  constructor(message: string, requested: number, available: number) {
    super(message);
    this.name = "UnderflowError";
    this.requested = requested;
    this.available = available;
  }
}

/**
 * Error thrown when a write skip would move past the space allocated in the
 * current block.
 */
export class OverflowError extends RangeError {
  /** Number of bytes the skip asked for. */
  public readonly requested: number;
  /** Number of bytes left in the current block. */
  public readonly available: number;

  constructor(message: string, requested: number, available: number) {
    super(message);
    this.name = "OverflowError";
    this.requested = requested;
    this.available = available;
  }
}

/**
 * Error thrown when a slice is used after its parent buffer compacted or
 * cleared the block list the slice was reading from.
 */
export class ViewInvalidatedError extends Error {
  /** Arena generation recorded when the slice was created. */
  public readonly createdGeneration: number;
  /** Arena generation at the time of the failed access. */
  public readonly currentGeneration: number;

  constructor(createdGeneration: number, currentGeneration: number) {
    super(
      `Slice was created at block generation ${createdGeneration} but the parent buffer is now at generation ${currentGeneration}.`,
    );
    this.name = "ViewInvalidatedError";
    this.createdGeneration = createdGeneration;
    this.currentGeneration = currentGeneration;
  }
}

/**
 * Throws an IndexError unless `offset`/`length` describe a range inside an
 * array of `arrayLength` elements.
 */
export function assertRange(
  offset: number,
  length: number,
  arrayLength: number,
): void {
  if (
    !Number.isInteger(offset) || !Number.isInteger(length) || offset < 0 ||
    length < 0 || offset + length > arrayLength
  ) {
    throw new IndexError(
      `Range out of bounds. offset=${offset}, length=${length}, arrayLength=${arrayLength}`,
      offset,
      length,
      arrayLength,
    );
  }
}

/**
 * Throws an IndexError unless `length` is a non-negative integer.
 */
export function assertLength(length: number): void {
  if (!Number.isInteger(length) || length < 0) {
    throw new IndexError(
      `Length must be a non-negative integer. Got length=${length}`,
      0,
      length,
      -1,
    );
  }
}
