import type { Span } from "../core/source/span";
import { formatSpan } from "../core/source/span";

export type DiagnosticSeverity = "error" | "warning";

export type DiagnosticCategory =
  | "lexical"
  | "syntax"
  | "declaration"
  | "resolution"
  | "type"
  | "construction"
  | "limit"
  | "style";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  category: DiagnosticCategory;
  message: string;
  span?: Span;
  data?: Record<string, string | number>;
  related?: Diagnostic[];
}

type DiagnosticOpts = Partial<Omit<Diagnostic, "code" | "message" | "severity" | "category">>;

export function errorDiag(
  code: string,
  category: DiagnosticCategory,
  message: string,
  opts?: DiagnosticOpts
): Diagnostic {
  return { code, category, message, severity: "error", ...opts };
}

/**
 * Render as `file:line:column: severity: message`.
 */
export function formatDiagnostic(d: Diagnostic): string {
  const where = d.span ? `${formatSpan(d.span)}: ` : "";
  return `${where}${d.severity}: ${d.message}`;
}

/**
 * Thrown by the compiler passes to abort on the first fatal diagnostic.
 * The facade turns it back into a `Fail` outcome.
 */
export class CompileError extends Error {
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(formatDiagnostic(diagnostic));
    this.name = "CompileError";
    this.diagnostic = diagnostic;
  }
}

export function isCompileError(e: unknown): e is CompileError {
  return e instanceof CompileError;
}
