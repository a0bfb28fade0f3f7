import type { Span } from "../core/source/span";
import type { Diagnostic, DiagnosticCategory, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: DiagnosticCategory;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "lexical", template: "unterminated string literal" },
  E0002: { code: "E0002", severity: "error", category: "lexical", template: "unexpected right parenthesis" },
  E0003: { code: "E0003", severity: "error", category: "lexical", template: "newline inside string literal" },
  E0004: { code: "E0004", severity: "error", category: "lexical", template: "unexpected null character" },
  E0005: { code: "E0005", severity: "error", category: "lexical", template: "unterminated block comment" },

  E0100: { code: "E0100", severity: "error", category: "syntax", template: "unbalanced parentheses: '(' is never closed" },
  E0101: { code: "E0101", severity: "error", category: "syntax", template: "expected script or global declaration, got {got} instead" },
  E0102: { code: "E0102", severity: "error", category: "syntax", template: "{detail}" },
  E0103: { code: "E0103", severity: "error", category: "syntax", template: "empty expression '()'" },

  E0200: { code: "E0200", severity: "error", category: "declaration", template: "'{name}' is already declared at {first}" },
  E0201: { code: "E0201", severity: "error", category: "declaration", template: "name '{name}' exceeds {max} characters in length" },
  E0202: { code: "E0202", severity: "error", category: "declaration", template: "cannot replace stub script '{name}': {detail}" },
  E0203: { code: "E0203", severity: "error", category: "declaration", template: "'{name}' cannot be overridden by a {what}" },
  E0204: { code: "E0204", severity: "error", category: "declaration", template: "{detail}" },

  E0300: { code: "E0300", severity: "error", category: "resolution", template: "unknown symbol '{name}'{hint}" },
  E0301: { code: "E0301", severity: "error", category: "resolution", template: "unknown function '{name}'" },
  E0302: { code: "E0302", severity: "error", category: "resolution", template: "'{name}' is not a global or script parameter and cannot be assigned" },
  E0303: { code: "E0303", severity: "error", category: "resolution", template: "no script '{name}' is declared" },
  E0304: { code: "E0304", severity: "error", category: "resolution", template: "'{name}' is a {type} script and cannot be called" },

  E0400: { code: "E0400", severity: "error", category: "type", template: "type mismatch: expected {expected}, got {actual}{detail}" },
  E0401: { code: "E0401", severity: "error", category: "type", template: "cannot parse '{token}' as {expected} (expected {allowed})" },
  E0402: { code: "E0402", severity: "error", category: "type", template: "'{name}' takes {expected} argument(s), got {actual}" },
  E0403: { code: "E0403", severity: "error", category: "type", template: "{kind} '{name}' is declared {expected} but its body yields {actual}" },
  E0404: { code: "E0404", severity: "error", category: "type", template: "arguments of '{name}' resolve to {actual}, but '{name}' {requirement}" },

  E0500: { code: "E0500", severity: "error", category: "construction", template: "unknown compile target '{target}'" },
  E0501: { code: "E0501", severity: "error", category: "construction", template: "invalid target definitions: {detail}" },
  E0502: { code: "E0502", severity: "error", category: "construction", template: "unsupported source encoding '{encoding}'" },
  E0503: { code: "E0503", severity: "error", category: "construction", template: "cannot decode '{file}': {detail}" },

  E0600: { code: "E0600", severity: "error", category: "limit", template: "maximum {what} limit of {max} exceeded ({count} / {max})" },

  W0001: { code: "W0001", severity: "warning", category: "type", template: "implicit conversion of {what} from {from} to {to}" },
  W0002: { code: "W0002", severity: "warning", category: "type", template: "implicit narrowing conversion of {what} from {from} to {to}" },
  W0003: { code: "W0003", severity: "warning", category: "style", template: "stub script '{name}' is never replaced or called" },
  W0004: { code: "W0004", severity: "warning", category: "style", template: "'{name}' shadows the engine {what} of the same name" },
  W0005: { code: "W0005", severity: "warning", category: "style", template: "use of uninitialized global '{name}'" },
  W0006: { code: "W0006", severity: "warning", category: "limit", template: "{count} nodes exceed the {max} node limit of {target}" },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span,
  related?: Diagnostic[]
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replaceAll(`{${key}}`, String(value));
    }
  }

  const diag: Diagnostic = {
    code: def.code,
    severity: def.severity,
    category: def.category,
    message,
  };
  if (span) diag.span = span;
  if (params) diag.data = params;
  if (related && related.length > 0) diag.related = related;
  return diag;
}
