import type { ValueType } from "../types/valueType";
import type { ScalarData } from "./types";

const INTEGER = /^[+-]?\d+$/;
const REAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const TRUE_WORDS = new Set(["true", "on", "1"]);
const FALSE_WORDS = new Set(["false", "off", "0"]);

export const GAME_DIFFICULTIES = ["easy", "normal", "hard", "impossible"] as const;

export const TEAMS = [
  "default",
  "player",
  "human",
  "covenant",
  "flood",
  "sentinel",
  "unused6",
  "unused7",
  "unused8",
  "unused9",
] as const;

const SHORT_MIN = -32768;
const SHORT_MAX = 32767;
const LONG_MIN = -2147483648;
const LONG_MAX = 2147483647;

/** Whether the token reads as a number of some kind, fitting or not. */
export function looksNumeric(text: string): boolean {
  return REAL.test(text);
}

export function isBooleanWord(text: string): boolean {
  const t = text.toLowerCase();
  return TRUE_WORDS.has(t) || FALSE_WORDS.has(t);
}

function parseInteger(text: string, min: number, max: number): number | undefined {
  if (!INTEGER.test(text)) return undefined;
  const n = Number(text);
  if (n < min || n > max) return undefined;
  return n === 0 ? 0 : n;
}

/**
 * Parse `text` as a literal of `type`. Only boolean, numeric and the two
 * enumerated types have literal forms; every other type yields undefined.
 */
export function parseLiteral(text: string, type: ValueType): ScalarData | undefined {
  switch (type) {
    case "boolean": {
      const t = text.toLowerCase();
      if (TRUE_WORDS.has(t)) return { tag: "boolean", value: true };
      if (FALSE_WORDS.has(t)) return { tag: "boolean", value: false };
      return undefined;
    }
    case "short": {
      const n = parseInteger(text, SHORT_MIN, SHORT_MAX);
      return n === undefined ? undefined : { tag: "short", value: n };
    }
    case "long": {
      const n = parseInteger(text, LONG_MIN, LONG_MAX);
      return n === undefined ? undefined : { tag: "long", value: n };
    }
    case "real": {
      if (!REAL.test(text)) return undefined;
      const n = Math.fround(Number(text));
      return Number.isFinite(n) ? { tag: "real", value: n } : undefined;
    }
    case "game_difficulty":
      return enumLiteral(GAME_DIFFICULTIES, text);
    case "team":
      return enumLiteral(TEAMS, text);
    default:
      return undefined;
  }
}

function enumLiteral(names: readonly string[], text: string): ScalarData | undefined {
  const i = names.indexOf(text.toLowerCase());
  return i === -1 ? undefined : { tag: "short", value: i };
}

/** Types whose bare atoms are parsed by parseLiteral. */
export function hasLiteralSyntax(type: ValueType): boolean {
  return (
    type === "boolean" ||
    type === "short" ||
    type === "long" ||
    type === "real" ||
    type === "game_difficulty" ||
    type === "team"
  );
}

/** Human-readable list of what parseLiteral accepts, for error messages. */
export function literalSyntax(type: ValueType): string {
  switch (type) {
    case "boolean":
      return "true, false, on, off, 1 or 0";
    case "short":
      return `an integer from ${SHORT_MIN} to ${SHORT_MAX}`;
    case "long":
      return `an integer from ${LONG_MIN} to ${LONG_MAX}`;
    case "real":
      return "a real number";
    case "game_difficulty":
      return GAME_DIFFICULTIES.join(", ");
    case "team":
      return TEAMS.join(", ");
    default:
      return "a name";
  }
}

/** Value a stub script without a body returns. */
export function defaultValue(type: ValueType): ScalarData | null {
  switch (type) {
    case "boolean":
      return { tag: "boolean", value: false };
    case "short":
    case "game_difficulty":
    case "team":
      return { tag: "short", value: 0 };
    case "long":
      return { tag: "long", value: 0 };
    case "real":
      return { tag: "real", value: 0 };
    default:
      return null;
  }
}
