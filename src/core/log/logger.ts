// src/core/log/logger.ts
// Logging port. The compiler never writes to the console directly.

export const LOG_LEVELS = ["debug", "info", "warn", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, string | number | boolean>;

/**
 * Logger port interface.
 */
export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
}

export type LogEntry = {
  level: Exclude<LogLevel, "silent">;
  message: string;
  fields?: LogFields;
};

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, silent: 3 };

const LOG_LEVEL_SET: ReadonlySet<string> = new Set<string>(LOG_LEVELS);

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_SET.has(value);
}

export function enabled(threshold: LogLevel, level: LogEntry["level"]): boolean {
  return RANK[level] >= RANK[threshold];
}

function render(message: string, fields?: LogFields): string {
  if (!fields) return message;
  const pairs = Object.entries(fields).map(([k, v]) => `${k}=${v}`);
  return pairs.length > 0 ? `${message} ${pairs.join(" ")}` : message;
}

/** Writes through `console`, dropping entries below `level`. */
export function consoleLogger(level: LogLevel = "info"): Logger {
  return {
    debug: (message, fields) => {
      if (enabled(level, "debug")) console.debug(`[hsc] ${render(message, fields)}`);
    },
    info: (message, fields) => {
      if (enabled(level, "info")) console.info(`[hsc] ${render(message, fields)}`);
    },
    warn: (message, fields) => {
      if (enabled(level, "warn")) console.warn(`[hsc] ${render(message, fields)}`);
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
};

/** Keeps entries in memory; for tests and tooling that inspect the log. */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  constructor(private readonly level: LogLevel = "debug") {}

  debug(message: string, fields?: LogFields): void {
    this.record("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.record("info", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.record("warn", message, fields);
  }

  messages(): string[] {
    return this.entries.map(e => e.message);
  }

  private record(level: LogEntry["level"], message: string, fields?: LogFields): void {
    if (!enabled(this.level, level)) return;
    this.entries.push(fields ? { level, message, fields } : { level, message });
  }
}
