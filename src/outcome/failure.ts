import type { Diagnostic, DiagnosticCategory } from "./diagnostic";

export type FailureReason =
  | "lexical-error"
  | "syntax-error"
  | "declaration-error"
  | "resolution-error"
  | "type-error"
  | "construction-error"
  | "limit-exceeded"
  | "internal-error";

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  recoverable: boolean;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    recoverable: opts?.recoverable ?? false,
    context: opts?.context,
  };
}

const REASON_BY_CATEGORY: Record<DiagnosticCategory, FailureReason> = {
  lexical: "lexical-error",
  syntax: "syntax-error",
  declaration: "declaration-error",
  resolution: "resolution-error",
  type: "type-error",
  construction: "construction-error",
  limit: "limit-exceeded",
  style: "internal-error",
};

export function reasonForCategory(category: DiagnosticCategory): FailureReason {
  return REASON_BY_CATEGORY[category];
}
