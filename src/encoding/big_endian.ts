/**
 * Big-endian fixed-width codecs built on single-byte reads and writes.
 *
 * Writers truncate values to their width (two's complement). Readers do not
 * check availability; callers make sure enough bytes are readable first.
 */

/** Anything that accepts one byte at a time. Only the low 8 bits are kept. */
export interface ByteSink {
  write(byte: number): void;
}

/** Anything that yields one byte (0-255) at a time. */
export interface ByteSource {
  read(): number;
}

// Reinterprets float bits; DataView defaults to big-endian.
const scratch = new DataView(new ArrayBuffer(8));

export function putInt16(sink: ByteSink, value: number): void {
  sink.write(value >>> 8);
  sink.write(value);
}

export function putInt32(sink: ByteSink, value: number): void {
  sink.write(value >>> 24);
  sink.write(value >>> 16);
  sink.write(value >>> 8);
  sink.write(value);
}

export function putInt64(sink: ByteSink, value: bigint): void {
  const bits = BigInt.asUintN(64, value);
  putInt32(sink, Number(bits >> 32n));
  putInt32(sink, Number(bits & 0xffffffffn));
}

/** Writes the IEEE-754 binary32 bit pattern of `value`. */
export function putFloat32(sink: ByteSink, value: number): void {
  scratch.setFloat32(0, value);
  putInt32(sink, scratch.getUint32(0));
}

/** Writes the IEEE-754 binary64 bit pattern of `value`. */
export function putFloat64(sink: ByteSink, value: number): void {
  scratch.setFloat64(0, value);
  const high = scratch.getUint32(0);
  const low = scratch.getUint32(4);
  putInt32(sink, high);
  putInt32(sink, low);
}

export function getInt8(source: ByteSource): number {
  return (source.read() << 24) >> 24;
}

export function getUint16(source: ByteSource): number {
  const high = source.read();
  const low = source.read();
  return (high << 8) | low;
}

export function getInt16(source: ByteSource): number {
  return (getUint16(source) << 16) >> 16;
}

export function getInt32(source: ByteSource): number {
  const b0 = source.read();
  const b1 = source.read();
  const b2 = source.read();
  const b3 = source.read();
  return (b0 << 24) | (b1 << 16) | (b2 << 8) | b3;
}

export function getUint32(source: ByteSource): number {
  return getInt32(source) >>> 0;
}

export function getInt64(source: ByteSource): bigint {
  const high = getInt32(source);
  const low = getUint32(source);
  return (BigInt(high) << 32n) | BigInt(low);
}

export function getUint64(source: ByteSource): bigint {
  return BigInt.asUintN(64, getInt64(source));
}

export function getFloat32(source: ByteSource): number {
  scratch.setUint32(0, getUint32(source));
  return scratch.getFloat32(0);
}

export function getFloat64(source: ByteSource): number {
  const high = getUint32(source);
  const low = getUint32(source);
  scratch.setUint32(0, high);
  scratch.setUint32(4, low);
  return scratch.getFloat64(0);
}
