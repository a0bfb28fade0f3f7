import { describe, expect, it } from "vitest";
import { tokenize } from "../../src/core/reader/tokenize";
import { decodeSource } from "../../src/core/source/decode";
import { thrownDiagnostic } from "../helpers/diagnostics";

const kinds = (src: string) => tokenize(src, "t.hsc").toArray().map(t => t.kind);
const lexError = (src: string) => thrownDiagnostic(() => tokenize(src, "t.hsc").toArray());

describe("tokenize", () => {
  it("splits parens and atoms with 1-based positions", () => {
    const tokens = tokenize("(global real x 2)", "t.hsc").toArray();
    expect(tokens.map(t => [t.kind, t.text, t.span.line, t.span.column])).toEqual([
      ["LParen", "(", 1, 1],
      ["Atom", "global", 1, 2],
      ["Atom", "real", 1, 9],
      ["Atom", "x", 1, 14],
      ["Atom", "2", 1, 16],
      ["RParen", ")", 1, 17],
      ["EOF", "", 1, 18],
    ]);
    expect(tokens[1].span.file).toBe("t.hsc");
  });

  it("skips line and block comments", () => {
    const tokens = tokenize("; header\n(a) ;* block\n more *; b", "t.hsc").toArray();
    expect(tokens.map(t => [t.kind, t.text, t.span.line, t.span.column])).toEqual([
      ["LParen", "(", 2, 1],
      ["Atom", "a", 2, 2],
      ["RParen", ")", 2, 3],
      ["Atom", "b", 3, 10],
      ["EOF", "", 3, 11],
    ]);
  });

  it("reads string literals without their quotes", () => {
    const tokens = tokenize('(print "Hello World")', "t.hsc").toArray();
    expect(tokens[2]).toEqual({ kind: "Str", text: "Hello World", span: { file: "t.hsc", line: 1, column: 8 } });
  });

  it("ends atoms at semicolons but runs them through quotes", () => {
    expect(tokenize('a"b"c;d', "t.hsc").toArray().map(t => [t.kind, t.text])).toEqual([
      ["Atom", 'a"b"c'],
      ["EOF", ""],
    ]);
  });

  it("starts a string only where a token begins with a quote", () => {
    const tokens = tokenize('(print it"s "x")', "t.hsc").toArray();
    expect(tokens.map(t => [t.kind, t.text, t.span.column])).toEqual([
      ["LParen", "(", 1],
      ["Atom", "print", 2],
      ["Atom", 'it"s', 8],
      ["Str", "x", 13],
      ["RParen", ")", 16],
      ["EOF", "", 17],
    ]);
  });

  it("reports an unterminated string at its opening quote", () => {
    const diag = lexError('(print "abc');
    expect(diag.code).toBe("E0001");
    expect(diag.category).toBe("lexical");
    expect(diag.span).toEqual({ file: "t.hsc", line: 1, column: 8 });
  });

  it("rejects a newline inside a string", () => {
    const diag = lexError('\n  "ab\ncd"');
    expect(diag.code).toBe("E0003");
    expect(diag.span).toEqual({ file: "t.hsc", line: 2, column: 3 });
  });

  it("reports a stray right parenthesis at its own position", () => {
    const diag = lexError("(a) b)");
    expect(diag.code).toBe("E0002");
    expect(diag.span).toEqual({ file: "t.hsc", line: 1, column: 6 });
  });

  it("ignores a trailing NUL but rejects one anywhere else", () => {
    expect(kinds("a\0")).toEqual(["Atom", "EOF"]);
    const diag = lexError("a\0b");
    expect(diag.code).toBe("E0004");
    expect(diag.span?.column).toBe(2);
  });

  it("reports an unterminated block comment where it starts", () => {
    const diag = lexError("a ;* never closed");
    expect(diag.code).toBe("E0005");
    expect(diag.span?.column).toBe(3);
  });

  it("restarts from the beginning on every iteration", () => {
    const stream = tokenize("(a b)", "t.hsc");
    const first = [...stream];
    const second = [...stream];
    expect(second).toEqual(first);
    expect(first).toHaveLength(5);
  });

  it("counts columns in bytes when given byte offsets", () => {
    const decoded = decodeSource(new TextEncoder().encode("é x"), "utf-8");
    const withBytes = tokenize(decoded.text, "t.hsc", { byteOffsets: decoded.byteOffsets }).toArray();
    const withChars = tokenize(decoded.text, "t.hsc").toArray();
    expect(withBytes[1].span.column).toBe(4);
    expect(withChars[1].span.column).toBe(3);
  });
});
