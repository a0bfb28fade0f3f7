// src/core/log/index.ts
// Logging exports

export {
  type LogLevel,
  type LogFields,
  type LogEntry,
  type Logger,
  LOG_LEVELS,
  isLogLevel,
  consoleLogger,
  silentLogger,
  MemoryLogger,
} from "./logger";
