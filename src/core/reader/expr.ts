import type { Span } from "../source/span";

export type Atom = {
  readonly tag: "Atom";
  readonly text: string;
  /** True for string literals read from `"..."`. */
  readonly quoted: boolean;
  readonly span: Span;
};

export type List = {
  readonly tag: "List";
  readonly items: readonly Expr[];
  /** Position of the opening paren. */
  readonly span: Span;
};

export type Expr = Atom | List;

export const isAtom = (e: Expr): e is Atom => e.tag === "Atom";
export const isList = (e: Expr): e is List => e.tag === "List";

export function atom(text: string, span: Span, quoted = false): Atom {
  return { tag: "Atom", text, quoted, span };
}

export function list(items: readonly Expr[], span: Span): List {
  return { tag: "List", items, span };
}

/** Short rendering for messages: atoms verbatim, lists as `(head ...)`. */
export function describeExpr(e: Expr): string {
  if (e.tag === "Atom") return e.quoted ? `"${e.text}"` : e.text;
  const head = e.items[0];
  if (!head) return "()";
  return head.tag === "Atom" ? `(${head.text} ...)` : "(...)";
}

/** Identifiers are case-insensitive; only ASCII letters are folded. */
export function normalizeName(text: string): string {
  return text.replace(/[A-Z]/g, c => c.toLowerCase());
}
