/**
 * Position of the first character of a token, expression or declaration.
 * Lines and columns are 1-based.
 */
export interface Span {
  file: string;
  line: number;
  column: number;
}

export function span(file: string, line: number, column: number): Span {
  return { file, line, column };
}

export function formatSpan(s: Span): string {
  return `${s.file}:${s.line}:${s.column}`;
}
