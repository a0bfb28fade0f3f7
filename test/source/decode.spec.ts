import { describe, expect, it } from "vitest";
import { decodeSource, isSourceEncoding } from "../../src/core/source/decode";
import { formatSpan, span } from "../../src/core/source/span";

describe("decodeSource", () => {
  it("maps every code unit to the byte it starts at", () => {
    const decoded = decodeSource(new TextEncoder().encode("aé€"), "utf-8");
    expect(decoded.text).toBe("aé€");
    expect(Array.from(decoded.byteOffsets)).toEqual([0, 1, 3, 6]);
  });

  it("maps both halves of a surrogate pair to the same byte", () => {
    const decoded = decodeSource(new TextEncoder().encode("😀a"), "utf-8");
    expect(decoded.text.length).toBe(3);
    expect(Array.from(decoded.byteOffsets)).toEqual([0, 0, 4, 5]);
  });

  it("drops a UTF-8 byte order mark but counts its bytes", () => {
    const decoded = decodeSource(new Uint8Array([0xef, 0xbb, 0xbf, 0x61]), "utf-8");
    expect(decoded.text).toBe("a");
    expect(Array.from(decoded.byteOffsets)).toEqual([3, 4]);
  });

  it("decodes windows-1252 one byte per character", () => {
    const decoded = decodeSource(new Uint8Array([0x63, 0x61, 0x66, 0xe9]), "windows-1252");
    expect(decoded.text).toBe("café");
    expect(Array.from(decoded.byteOffsets)).toEqual([0, 1, 2, 3, 4]);
  });

  it("rejects malformed UTF-8", () => {
    expect(() => decodeSource(new Uint8Array([0x61, 0xff]), "utf-8")).toThrow();
  });

  it("recognizes supported encodings", () => {
    expect(isSourceEncoding("utf-8")).toBe(true);
    expect(isSourceEncoding("windows-1252")).toBe(true);
    expect(isSourceEncoding("latin-2")).toBe(false);
  });
});

describe("span", () => {
  it("formats as file:line:column", () => {
    expect(formatSpan(span("a.hsc", 12, 4))).toBe("a.hsc:12:4");
  });
});
