// src/core/config/config.ts
// Compiler configuration: defaults, environment, config files, overrides.

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { TARGET_IDS, isTargetId } from "../catalog/schema";
import { SOURCE_ENCODINGS, isSourceEncoding } from "../source/decode";
import type { LogLevel } from "../log/logger";
import { LOG_LEVELS, isLogLevel } from "../log/logger";

// =========================================================================
// Configuration Types
// =========================================================================

export type LogConfig = {
  /** Lowest level written: debug, info, warn or silent */
  level: string;
};

export type CompilerConfig = {
  /** Engine target the scripts are compiled for */
  target: string;
  /** Encoding of source files handed over as bytes */
  encoding: string;
  log: LogConfig;
};

/** What a single source (env, file, overrides) contributes. */
export type PartialConfig = {
  target?: string;
  encoding?: string;
  log?: Partial<LogConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: "warn",
};

export const DEFAULT_CONFIG: CompilerConfig = {
  target: "mcc-cea",
  encoding: "utf-8",
  log: DEFAULT_LOG_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["hsc.config.json", "hsc.config.yaml", "hsc.config.yml"];

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Read `<prefix>_TARGET`, `<prefix>_ENCODING` and `<prefix>_LOG_LEVEL`.
 * Unset variables contribute nothing.
 */
export function configFromEnv(prefix = "HSC", env: NodeJS.ProcessEnv = process.env): PartialConfig {
  const config: PartialConfig = {};
  const target = env[`${prefix}_TARGET`];
  const encoding = env[`${prefix}_ENCODING`];
  const level = env[`${prefix}_LOG_LEVEL`];

  if (target) config.target = target;
  if (encoding) config.encoding = encoding;
  if (level) config.log = { level };
  return config;
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): PartialConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;
  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  if (data === null || data === undefined) return {};
  if (!isRecord(data)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return configFromObject(data);
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 * Accepts `log: { level }` or a top-level `log_level`/`logLevel`.
 */
export function configFromObject(data: Record<string, unknown>): PartialConfig {
  const config: PartialConfig = {};
  const logData: Record<string, unknown> = isRecord(data.log) ? data.log : {};

  const target = stringField(data.target);
  const encoding = stringField(data.encoding);
  const level = stringField(logData.level) ?? stringField(data.log_level) ?? stringField(data.logLevel);

  if (target !== undefined) config.target = target;
  if (encoding !== undefined) config.encoding = encoding;
  if (level !== undefined) config.log = { level };
  return config;
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialConfig[]): CompilerConfig {
  const result: CompilerConfig = { ...DEFAULT_CONFIG, log: { ...DEFAULT_CONFIG.log } };

  for (const cfg of configs) {
    if (cfg.target !== undefined) result.target = cfg.target;
    if (cfg.encoding !== undefined) result.encoding = cfg.encoding;
    if (cfg.log) {
      result.log = { ...result.log, ...cfg.log };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialConfig;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): CompilerConfig {
  const layers: PartialConfig[] = [configFromEnv("HSC", options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    const found = DEFAULT_CONFIG_FILES.map(f => path.join(cwd, f)).find(p => fs.existsSync(p));
    if (found) layers.push(configFromFile(found));
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: CompilerConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isTargetId(config.target)) {
    errors.push(`Unknown target: ${config.target}. Expected one of ${TARGET_IDS.join(", ")}`);
  }
  if (!isSourceEncoding(config.encoding)) {
    errors.push(`Unsupported encoding: ${config.encoding}. Expected one of ${SOURCE_ENCODINGS.join(", ")}`);
  }
  if (!isLogLevel(config.log.level)) {
    warnings.push(`Unknown log level: ${config.log.level}. Expected one of ${LOG_LEVELS.join(", ")}; using warn`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/** Configured log level, or `warn` when the configured one is unknown. */
export function logLevelOf(config: CompilerConfig): LogLevel {
  return isLogLevel(config.log.level) ? config.log.level : "warn";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}
