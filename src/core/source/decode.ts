// src/core/source/decode.ts
// Byte → text boundary for `Compiler.load`. Decoding is done by the platform
// TextDecoder; this module only keeps enough bookkeeping to report columns
// against the original bytes.

export const SOURCE_ENCODINGS = ["utf-8", "windows-1252"] as const;

export type SourceEncoding = (typeof SOURCE_ENCODINGS)[number];

const ENCODING_SET: ReadonlySet<string> = new Set<string>(SOURCE_ENCODINGS);

export function isSourceEncoding(value: string): value is SourceEncoding {
  return ENCODING_SET.has(value);
}

/**
 * Decoded text plus, for every UTF-16 code unit of `text`, the offset of the
 * byte it was decoded from. `byteOffsets.length === text.length + 1`; the
 * last entry is the total byte length.
 */
export type DecodedSource = {
  text: string;
  byteOffsets: Uint32Array;
};

export function decodeSource(bytes: Uint8Array, encoding: SourceEncoding): DecodedSource {
  const decoder = new TextDecoder(encoding, { fatal: encoding === "utf-8", ignoreBOM: false });
  const text = decoder.decode(bytes);
  const bomLength = encoding === "utf-8" && hasUtf8Bom(bytes) ? 3 : 0;
  return {
    text,
    byteOffsets: encoding === "utf-8" ? utf8Offsets(text, bomLength) : singleByteOffsets(text),
  };
}

function hasUtf8Bom(bytes: Uint8Array): boolean {
  return bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf;
}

function singleByteOffsets(text: string): Uint32Array {
  const offsets = new Uint32Array(text.length + 1);
  for (let i = 0; i <= text.length; i++) offsets[i] = i;
  return offsets;
}

function utf8Offsets(text: string, start: number): Uint32Array {
  const offsets = new Uint32Array(text.length + 1);
  let byte = start;
  for (let i = 0; i < text.length; i++) {
    offsets[i] = byte;
    const unit = text.charCodeAt(i);
    if (unit < 0x80) {
      byte += 1;
    } else if (unit < 0x800) {
      byte += 2;
    } else if (unit >= 0xd800 && unit <= 0xdbff) {
      // surrogate pair: both halves map to the start of one 4-byte sequence
      if (i + 1 < text.length) {
        offsets[i + 1] = byte;
        i++;
      }
      byte += 4;
    } else {
      byte += 3;
    }
  }
  offsets[text.length] = byte;
  return offsets;
}
