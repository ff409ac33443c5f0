import { DEFAULT_MINIMUM_BLOCK_SIZE } from "./buffer_constants.ts";
import { type Logger, noopLogger } from "../logging/logger.ts";

/**
 * Options accepted by the ByteBuffer constructor.
 */
export interface ByteBufferOptions {
  /**
   * Smallest block the buffer will allocate. The requested initial capacity is
   * rounded up to this value. Defaults to `DEFAULT_MINIMUM_BLOCK_SIZE`.
   */
  minimumBlockSize?: number;
  /** Receives debug output about block allocation, compaction and clearing. */
  logger?: Logger;
}

/**
 * Fully resolved buffer configuration.
 */
export interface ResolvedBufferOptions {
  /** Capacity of every block the buffer allocates. */
  unitSize: number;
  logger: Logger;
}

/**
 * Validates the constructor arguments of a ByteBuffer and computes its unit
 * size.
 *
 * @throws RangeError if `initialCapacity` is not a non-negative safe integer or
 * `minimumBlockSize` is not a positive safe integer.
 */
export function resolveBufferOptions(
  initialCapacity: number,
  options: ByteBufferOptions = {},
): ResolvedBufferOptions {
  if (!Number.isSafeInteger(initialCapacity) || initialCapacity < 0) {
    throw new RangeError(
      `initialCapacity must be a non-negative integer. Got ${initialCapacity}`,
    );
  }
  const minimumBlockSize = options.minimumBlockSize ??
    DEFAULT_MINIMUM_BLOCK_SIZE;
  if (!Number.isSafeInteger(minimumBlockSize) || minimumBlockSize < 1) {
    throw new RangeError(
      `minimumBlockSize must be a positive integer. Got ${minimumBlockSize}`,
    );
  }
  return {
    unitSize: Math.max(initialCapacity, minimumBlockSize),
    logger: options.logger ?? noopLogger,
  };
}
