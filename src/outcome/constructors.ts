import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure } from "./failure";
import { failure, reasonForCategory } from "./failure";
import type { Diagnostic } from "./diagnostic";
import { isCompileError } from "./diagnostic";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

/**
 * Fail outcome for a fatal compile diagnostic. The position is copied into
 * the failure context so callers need not dig into the diagnostic.
 */
export function compileFailed(diag: Diagnostic, meta: OutcomeMeta = {}): Fail {
  return fail(
    failure(reasonForCategory(diag.category), diag.message, {
      diagnostics: [diag],
      recoverable: true,
      context: diag.span
        ? { file: diag.span.file, line: diag.span.line, column: diag.span.column }
        : undefined,
    }),
    meta
  );
}

export function constructionFailed(diag: Diagnostic, meta: OutcomeMeta = {}): Fail {
  return fail(
    failure("construction-error", diag.message, {
      diagnostics: [diag],
      recoverable: false,
    }),
    meta
  );
}

/**
 * Convert something caught at an API boundary into a Fail. Anything that is
 * not a CompileError is rethrown: it is a bug, not a user error.
 */
export function failFromThrown(e: unknown, meta: OutcomeMeta = {}): Fail {
  if (isCompileError(e)) {
    return e.diagnostic.category === "construction"
      ? constructionFailed(e.diagnostic, meta)
      : compileFailed(e.diagnostic, meta);
  }
  throw e;
}
