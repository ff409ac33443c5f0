/**
 * Capacity requested for the first block when a buffer is created without one.
 */
export const DEFAULT_INITIAL_CAPACITY = 1024;

/**
 * Smallest block a buffer will allocate. Requested capacities below this are
 * rounded up to it.
 */
export const DEFAULT_MINIMUM_BLOCK_SIZE = 1024;

/**
 * Value returned by single-byte and bulk reads when no data is available.
 */
export const NO_DATA = -1;
