// Buffers
export { ByteBuffer } from "./buffers/byte_buffer.ts";
export { ByteSlice } from "./buffers/byte_slice.ts";
export { ReadableBufferBase } from "./buffers/readable_buffer_base.ts";
export { BlockArena } from "./buffers/block_arena.ts";
export { Cursor } from "./buffers/cursor.ts";
export type {
  IClearable,
  ICompactable,
  IReadBuffer,
  IReadWriteBuffer,
  IWriteBuffer,
} from "./buffers/buffer.ts";
export type {
  ByteBufferOptions,
  ResolvedBufferOptions,
} from "./buffers/buffer_options.ts";
export { resolveBufferOptions } from "./buffers/buffer_options.ts";
export {
  DEFAULT_INITIAL_CAPACITY,
  DEFAULT_MINIMUM_BLOCK_SIZE,
  NO_DATA,
} from "./buffers/buffer_constants.ts";

// Errors
export {
  IndexError,
  OverflowError,
  UnderflowError,
  ViewInvalidatedError,
} from "./buffers/buffer_errors.ts";

// Streams
export type { IByteInputStream, IByteOutputStream } from "./streams/streams.ts";
export { BufferInputStream } from "./streams/buffer_input_stream.ts";
export { BufferOutputStream } from "./streams/buffer_output_stream.ts";

// Encoding
export type { TextCodec, TextEncodingName } from "./encoding/text_encoding.ts";
export { decode, encode, resolveTextCodec } from "./encoding/text_encoding.ts";
export type { ByteSink, ByteSource } from "./encoding/big_endian.ts";

// Logging
export type { Logger, LoggerConfig, LogLevel, LogSink } from "./logging/logger.ts";
export { createLogger, noopLogger } from "./logging/logger.ts";
