import type { Token } from "./tokenize";
import type { Expr, List } from "./expr";
import { atom, list } from "./expr";
import type { Span } from "../source/span";
import { CompileError } from "../../outcome/diagnostic";
import { makeDiagnostic } from "../../outcome/codes";

type Frame = { span: Span; items: Expr[] };

/**
 * Build the top-level expressions of one file from its tokens.
 * Throws CompileError on unbalanced parentheses.
 */
export function readExprs(tokens: Iterable<Token>): Expr[] {
  const top: Expr[] = [];
  const stack: Frame[] = [];

  const append = (e: Expr) => {
    const parent = stack[stack.length - 1];
    if (parent) parent.items.push(e);
    else top.push(e);
  };

  for (const tok of tokens) {
    switch (tok.kind) {
      case "LParen":
        stack.push({ span: tok.span, items: [] });
        break;

      case "RParen": {
        const frame = stack.pop();
        if (!frame) {
          throw new CompileError(makeDiagnostic("E0002", undefined, tok.span));
        }
        const done: List = list(frame.items, frame.span);
        append(done);
        break;
      }

      case "Atom":
        append(atom(tok.text, tok.span));
        break;

      case "Str":
        append(atom(tok.text, tok.span, true));
        break;

      case "EOF": {
        const unclosed = stack[0];
        if (unclosed) {
          throw new CompileError(makeDiagnostic("E0100", undefined, unclosed.span));
        }
        return top;
      }
    }
  }

  // token sources without an EOF token end here
  const unclosed = stack[0];
  if (unclosed) {
    throw new CompileError(makeDiagnostic("E0100", undefined, unclosed.span));
  }
  return top;
}
