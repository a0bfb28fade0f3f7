// src/compiler.ts
// Compiler facade: load source files one at a time, then compile everything
// loaded so far into one CompiledOutput.

import type { Expr } from "./core/reader/expr";
import { tokenize } from "./core/reader/tokenize";
import { readExprs } from "./core/reader/read";
import type { DecodedSource, SourceEncoding } from "./core/source/decode";
import { decodeSource, isSourceEncoding } from "./core/source/decode";
import type { TargetId } from "./core/catalog/schema";
import { TargetCatalog, catalogFor } from "./core/catalog/catalog";
import { collectDeclarations } from "./core/compile/declarations";
import { resolveProgram } from "./core/compile/resolver";
import { CompiledOutput } from "./core/compile/output";
import type { CompilerConfig } from "./core/config/config";
import { logLevelOf } from "./core/config/config";
import type { Logger } from "./core/log/logger";
import { consoleLogger, silentLogger } from "./core/log/logger";
import { CompileError, formatDiagnostic } from "./outcome/diagnostic";
import { makeDiagnostic } from "./outcome/codes";
import type { Outcome } from "./outcome/outcome";
import { done, failFromThrown } from "./outcome/constructors";

export type CompilerOptions = {
  /** Engine target; one of mcc-cea, xbox, gbx-retail, gbx-demo, gbx-custom */
  target: string;
  /** How byte sources passed to `load` are decoded. Defaults to utf-8. */
  encoding?: string;
  /** Definition data replacing the bundled function and global tables */
  definitions?: unknown;
  logger?: Logger;
};

export type LoadedFile = {
  file: string;
  expressions: readonly Expr[];
};

export class Compiler {
  readonly target: TargetId;
  readonly encoding: SourceEncoding;
  readonly catalog: TargetCatalog;
  private readonly logger: Logger;
  private pending: LoadedFile[] = [];

  /**
   * @throws CompileError on an unknown target or encoding, or invalid
   * definition data. `createCompiler` returns these as a Fail instead.
   */
  constructor(options: CompilerOptions) {
    const encoding = options.encoding ?? "utf-8";
    if (!isSourceEncoding(encoding)) {
      throw new CompileError(makeDiagnostic("E0502", { encoding }));
    }

    this.catalog =
      options.definitions === undefined
        ? catalogFor(options.target)
        : TargetCatalog.load(options.target, options.definitions);
    this.target = this.catalog.target;
    this.encoding = encoding;
    this.logger = options.logger ?? silentLogger;
  }

  static fromConfig(config: CompilerConfig, options: { definitions?: unknown; logger?: Logger } = {}): Compiler {
    return new Compiler({
      target: config.target,
      encoding: config.encoding,
      definitions: options.definitions,
      logger: options.logger ?? consoleLogger(logLevelOf(config)),
    });
  }

  /**
   * Lex and read one file and add it to the pending set. Nothing is added
   * when the file fails to read.
   */
  load(fileName: string, source: string | Uint8Array): Outcome<LoadedFile> {
    try {
      const { text, byteOffsets } =
        typeof source === "string" ? { text: source, byteOffsets: undefined } : this.decode(fileName, source);
      const tokens = tokenize(text, fileName, { byteOffsets });
      const loaded: LoadedFile = { file: fileName, expressions: readExprs(tokens) };
      this.pending.push(loaded);
      this.logger.debug("loaded", { file: fileName, expressions: loaded.expressions.length });
      return done(loaded);
    } catch (e) {
      return failFromThrown(e);
    }
  }

  /**
   * Compile every pending file. On success the pending set is cleared; on
   * failure it is left as it was so the caller can load more and retry.
   */
  compile(): Outcome<CompiledOutput> {
    const started = performance.now();
    try {
      const forest = this.pending.flatMap(f => f.expressions);
      const { declarations, warnings } = collectDeclarations(forest, this.catalog);
      const program = resolveProgram(declarations, this.catalog);

      const output = new CompiledOutput({
        scripts: program.scripts,
        globals: program.globals,
        nodes: program.nodes,
        warnings: [...warnings, ...program.warnings],
        files: this.pending.map(f => f.file),
      });
      this.pending = [];

      const durationMs = performance.now() - started;
      this.logger.info("compiled", {
        target: this.target,
        scripts: output.scripts.length,
        globals: output.globals.length,
        nodes: output.nodes.length,
        warnings: output.warnings.length,
      });
      for (const w of output.warnings) this.logger.warn(formatDiagnostic(w));
      return done(output, { durationMs });
    } catch (e) {
      const failed = failFromThrown(e, { durationMs: performance.now() - started });
      this.logger.debug("compile failed", { message: failed.failure.message });
      return failed;
    }
  }

  /** Names of loaded files not yet compiled, in load order. */
  pendingFiles(): string[] {
    return this.pending.map(f => f.file);
  }

  private decode(fileName: string, bytes: Uint8Array): DecodedSource {
    try {
      return decodeSource(bytes, this.encoding);
    } catch (e) {
      const detail = e instanceof Error ? e.message : String(e);
      throw new CompileError(makeDiagnostic("E0503", { file: fileName, detail }));
    }
  }
}

export function createCompiler(options: CompilerOptions): Outcome<Compiler> {
  try {
    return done(new Compiler(options));
  } catch (e) {
    return failFromThrown(e);
  }
}
