// src/index.ts
// Scenario script compiler - Public API

// ═══════════════════════════════════════════════════════════════════════════════
// COMPILER
// ═══════════════════════════════════════════════════════════════════════════════

export { Compiler, createCompiler, type CompilerOptions, type LoadedFile } from "./compiler";
export { CompiledOutput } from "./core/compile/output";
export type {
  CompiledGlobal,
  CompiledNode,
  CompiledParameter,
  CompiledScript,
  NodeData,
  NodeKind,
  ScalarData,
} from "./core/compile/types";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export { VALUE_TYPES, valueTypeId, valueTypeLabel, parseValueType, type ValueType } from "./core/types/valueType";
export { SCRIPT_TYPES, scriptTypeId, parseScriptType, type ScriptType } from "./core/types/scriptType";

// ═══════════════════════════════════════════════════════════════════════════════
// TARGET CATALOG
// ═══════════════════════════════════════════════════════════════════════════════

export {
  TargetCatalog,
  catalogFor,
  parseDefinitions,
  type CatalogFunction,
  type CatalogGlobal,
  type ConversionKind,
} from "./core/catalog/catalog";
export { TARGET_IDS, isTargetId, type TargetId, type Limits, type DefinitionsInput } from "./core/catalog/schema";

// ═══════════════════════════════════════════════════════════════════════════════
// SOURCE & READER
// ═══════════════════════════════════════════════════════════════════════════════

export { decodeSource, SOURCE_ENCODINGS, type SourceEncoding, type DecodedSource } from "./core/source/decode";
export { formatSpan, type Span } from "./core/source/span";
export { tokenize, TokenStream, type Token, type TokenKind } from "./core/reader/tokenize";
export { readExprs } from "./core/reader/read";
export type { Expr, Atom, List } from "./core/reader/expr";

// ═══════════════════════════════════════════════════════════════════════════════
// DIAGNOSTICS & OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════════

export {
  CompileError,
  isCompileError,
  formatDiagnostic,
  type Diagnostic,
  type DiagnosticCategory,
  type DiagnosticSeverity,
} from "./outcome/diagnostic";
export { DIAGNOSTIC_CODES, type DiagnosticCode } from "./outcome/codes";
export type { Failure, FailureReason } from "./outcome/failure";
export { isDone, isFail, type Outcome, type Done, type Fail } from "./outcome/outcome";
export { match, mapOutcome, flatMapOutcome, unwrap, unwrapOr } from "./outcome/matchers";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION & LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

export {
  loadConfig,
  validateConfig,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  DEFAULT_CONFIG,
  type CompilerConfig,
  type PartialConfig,
} from "./core/config";
export { consoleLogger, silentLogger, MemoryLogger, type Logger, type LogLevel } from "./core/log";
