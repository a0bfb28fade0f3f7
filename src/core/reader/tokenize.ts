import type { Span } from "../source/span";
import { CompileError } from "../../outcome/diagnostic";
import { makeDiagnostic } from "../../outcome/codes";

export type TokenKind = "LParen" | "RParen" | "Atom" | "Str" | "EOF";

export interface Token {
  readonly kind: TokenKind;
  /** Atom text, or string contents without the quotes. */
  readonly text: string;
  readonly span: Span;
}

export type TokenizeOptions = {
  /**
   * Byte offset of every UTF-16 code unit of the source (see decodeSource).
   * When given, columns count bytes of the original input instead of
   * characters.
   */
  byteOffsets?: Uint32Array;
};

const isWS = (c: string) => c === " " || c === "\t" || c === "\n" || c === "\r" || c === "\f" || c === "\v";

const ATOM_BREAK = new Set(["(", ")", ";"]);

/**
 * Lazy, restartable token sequence over one file. Every iteration starts from
 * the beginning of the text and ends with exactly one EOF token. Lexical
 * errors are thrown as CompileError when the iteration reaches them.
 */
export class TokenStream implements Iterable<Token> {
  constructor(
    readonly text: string,
    readonly file: string,
    private readonly options: TokenizeOptions = {}
  ) {}

  [Symbol.iterator](): Iterator<Token> {
    return lex(this.text, this.file, this.options);
  }

  toArray(): Token[] {
    return Array.from(this);
  }
}

export function tokenize(text: string, file: string, options?: TokenizeOptions): TokenStream {
  return new TokenStream(text, file, options);
}

function* lex(src: string, file: string, options: TokenizeOptions): Generator<Token, void, undefined> {
  const offsets = options.byteOffsets;
  let i = 0;
  let line = 1;
  let lineStart = 0;
  let depth = 0;

  const here = (at: number): Span => {
    const column = offsets ? offsets[at] - offsets[lineStart] + 1 : at - lineStart + 1;
    return { file, line, column };
  };

  const fatal = (code: "E0001" | "E0002" | "E0003" | "E0004" | "E0005", at: Span): CompileError =>
    new CompileError(makeDiagnostic(code, undefined, at));

  while (i < src.length) {
    const c = src[i];

    if (c === "\n") {
      i++;
      line++;
      lineStart = i;
      continue;
    }

    if (isWS(c)) { i++; continue; }

    if (c === "\0") {
      if (i + 1 === src.length) break;
      throw fatal("E0004", here(i));
    }

    // comments: `;` to end of line, `;*` to the next `*;`
    if (c === ";") {
      if (src[i + 1] === "*") {
        const start = here(i);
        i += 2;
        while (i < src.length && !(src[i] === "*" && src[i + 1] === ";")) {
          if (src[i] === "\n") {
            line++;
            lineStart = i + 1;
          }
          i++;
        }
        if (i >= src.length) throw fatal("E0005", start);
        i += 2;
        continue;
      }
      while (i < src.length && src[i] !== "\n") i++;
      continue;
    }

    if (c === "(") {
      depth++;
      yield { kind: "LParen", text: c, span: here(i) };
      i++;
      continue;
    }

    if (c === ")") {
      if (depth === 0) throw fatal("E0002", here(i));
      depth--;
      yield { kind: "RParen", text: c, span: here(i) };
      i++;
      continue;
    }

    if (c === "\"") {
      const start = here(i);
      const end = findClosingQuote(src, i + 1);
      if (end.newlineAt !== undefined) throw fatal("E0003", start);
      if (end.index === undefined) throw fatal("E0001", start);
      yield { kind: "Str", text: src.slice(i + 1, end.index), span: start };
      i = end.index + 1;
      continue;
    }

    const start = i;
    while (i < src.length && !isWS(src[i]) && !ATOM_BREAK.has(src[i]) && src[i] !== "\0") i++;
    yield { kind: "Atom", text: src.slice(start, i), span: here(start) };
  }

  yield { kind: "EOF", text: "", span: here(i) };
}

function findClosingQuote(src: string, from: number): { index?: number; newlineAt?: number } {
  for (let j = from; j < src.length; j++) {
    if (src[j] === "\"") return { index: j };
    if (src[j] === "\n") return { newlineAt: j };
  }
  return {};
}
