/**
 * Text encodings available to `writeString` and `readString`.
 *
 * UTF-8 goes through the platform TextEncoder/TextDecoder. The remaining
 * encodings are single- or double-byte mappings handled here so they behave
 * the same on every runtime.
 */
export type TextEncodingName =
  | "utf-8"
  | "utf-16be"
  | "utf-16le"
  | "latin1"
  | "ascii";

/** A pair of functions converting between strings and bytes. */
export interface TextCodec {
  encode(text: string): Uint8Array;
  decode(bytes: Uint8Array): string;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const REPLACEMENT_CHARACTER = "\uFFFD";
const QUESTION_MARK = 0x3f;
// Keeps String.fromCharCode argument lists well under engine limits.
const CHUNK_SIZE = 8192;

function fromCodeUnits(units: ArrayLike<number>): string {
  let result = "";
  for (let start = 0; start < units.length; start += CHUNK_SIZE) {
    const end = Math.min(start + CHUNK_SIZE, units.length);
    const chunk: number[] = [];
    for (let index = start; index < end; index++) {
      chunk.push(units[index]);
    }
    result += String.fromCharCode(...chunk);
  }
  return result;
}

function singleByteCodec(maxCode: number): TextCodec {
  return {
    encode(text: string): Uint8Array {
      const bytes = new Uint8Array(text.length);
      for (let index = 0; index < text.length; index++) {
        const code = text.charCodeAt(index);
        bytes[index] = code <= maxCode ? code : QUESTION_MARK;
      }
      return bytes;
    },
    decode(bytes: Uint8Array): string {
      if (maxCode === 0xff) {
        return fromCodeUnits(bytes);
      }
      let result = "";
      let pending: number[] = [];
      for (const byte of bytes) {
        if (byte <= maxCode) {
          pending.push(byte);
          continue;
        }
        result += fromCodeUnits(pending) + REPLACEMENT_CHARACTER;
        pending = [];
      }
      return result + fromCodeUnits(pending);
    },
  };
}

function utf16Codec(bigEndian: boolean): TextCodec {
  return {
    encode(text: string): Uint8Array {
      const bytes = new Uint8Array(text.length * 2);
      const view = new DataView(bytes.buffer);
      for (let index = 0; index < text.length; index++) {
        view.setUint16(index * 2, text.charCodeAt(index), !bigEndian);
      }
      return bytes;
    },
    decode(bytes: Uint8Array): string {
      const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
      const unitCount = Math.floor(bytes.length / 2);
      const units = new Uint16Array(unitCount);
      for (let index = 0; index < unitCount; index++) {
        units[index] = view.getUint16(index * 2, !bigEndian);
      }
      const text = fromCodeUnits(units);
      return bytes.length % 2 === 0 ? text : text + REPLACEMENT_CHARACTER;
    },
  };
}

const CODECS: Record<TextEncodingName, TextCodec> = {
  "utf-8": {
    encode: (text) => encoder.encode(text),
    decode: (bytes) => decoder.decode(bytes),
  },
  "utf-16be": utf16Codec(true),
  "utf-16le": utf16Codec(false),
  "latin1": singleByteCodec(0xff),
  "ascii": singleByteCodec(0x7f),
};

function isTextEncodingName(name: string): name is TextEncodingName {
  return Object.hasOwn(CODECS, name);
}

/**
 * Looks up the codec for an encoding name.
 * @throws TypeError if the encoding is not supported.
 */
export function resolveTextCodec(encoding: string): TextCodec {
  if (!isTextEncodingName(encoding)) {
    throw new TypeError(
      `Unsupported text encoding "${encoding}". Expected one of: ${
        Object.keys(CODECS).join(", ")
      }.`,
    );
  }
  return CODECS[encoding];
}

/**
 * Encodes a string. Characters the encoding cannot represent become `?`.
 */
export const encode = (
  text: string,
  encoding: TextEncodingName = "utf-8",
): Uint8Array => resolveTextCodec(encoding).encode(text);

/**
 * Decodes bytes. Malformed input decodes to U+FFFD.
 */
export const decode = (
  bytes: Uint8Array,
  encoding: TextEncodingName = "utf-8",
): string => resolveTextCodec(encoding).decode(bytes);
