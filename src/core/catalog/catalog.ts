// src/core/catalog/catalog.ts
// Per-target table of engine functions, engine globals, limits and type
// conversions. Built once from validated definition data and never mutated.

import type { ValueType } from "../types/valueType";
import { isNumericType } from "../types/valueType";
import { CompileError } from "../../outcome/diagnostic";
import { makeDiagnostic } from "../../outcome/codes";
import defaultDefinitions from "../../../data/definitions.json";
import {
  DefinitionsSchema,
  isTargetId,
  type Definitions,
  type EngineDef,
  type FormKind,
  type FunctionDef,
  type Limits,
  type ParameterDef,
  type TargetId,
} from "./schema";

export type ConversionKind = "exact" | "widening" | "narrowing" | "upcast" | "discard" | "none";

/**
 * A function callable on the target. `index` is its position in the target's
 * function table, which is what the host runtime dispatches on.
 */
export interface CatalogFunction {
  readonly name: string;
  readonly description: string;
  readonly returnType: ValueType;
  readonly parameters: readonly ParameterDef[];
  readonly form?: FormKind;
  readonly numberPassthrough: boolean;
  readonly inequality: boolean;
  readonly passthroughLast: boolean;
  readonly index: number;
}

export interface CatalogGlobal {
  readonly name: string;
  readonly type: ValueType;
  readonly index: number;
}

export class TargetCatalog {
  readonly target: TargetId;
  readonly engine: EngineDef;
  private readonly functions: ReadonlyMap<string, CatalogFunction>;
  private readonly globals: ReadonlyMap<string, CatalogGlobal>;
  private readonly conversions: ReadonlyMap<string, ConversionKind>;

  private constructor(definitions: Definitions, engine: EngineDef) {
    this.target = engine.id;
    this.engine = engine;

    const functions = new Map<string, CatalogFunction>();
    for (const def of definitions.functions) {
      if (!def.engines.includes(engine.id)) continue;
      functions.set(def.name, toCatalogFunction(def, functions.size));
    }

    const globals = new Map<string, CatalogGlobal>();
    for (const def of definitions.globals) {
      if (!def.engines.includes(engine.id)) continue;
      globals.set(def.name, { name: def.name, type: def.type, index: globals.size });
    }

    const conversions = new Map<string, ConversionKind>();
    for (const c of definitions.conversions) {
      conversions.set(conversionKey(c.from, c.to), c.kind);
    }

    this.functions = functions;
    this.globals = globals;
    this.conversions = conversions;
    Object.freeze(this);
  }

  /**
   * Build the catalog for `target` from definition data (the bundled
   * definitions when omitted). Throws CompileError on an unknown target or
   * invalid data.
   */
  static load(target: string, definitions: unknown = defaultDefinitions): TargetCatalog {
    if (!isTargetId(target)) {
      throw new CompileError(makeDiagnostic("E0500", { target }));
    }

    const parsed = parseDefinitions(definitions);
    const engine = parsed.engines.find(e => e.id === target);
    if (!engine) {
      throw new CompileError(makeDiagnostic("E0501", { detail: `no engine entry for '${target}'` }));
    }
    return new TargetCatalog(parsed, engine);
  }

  get limits(): Limits {
    return this.engine.limits;
  }

  getFunction(name: string): CatalogFunction | undefined {
    return this.functions.get(name);
  }

  hasFunction(name: string): boolean {
    return this.functions.has(name);
  }

  getGlobal(name: string): CatalogGlobal | undefined {
    return this.globals.get(name);
  }

  specialForm(name: string): FormKind | undefined {
    return this.functions.get(name)?.form;
  }

  allFunctions(): CatalogFunction[] {
    return Array.from(this.functions.values());
  }

  allGlobals(): CatalogGlobal[] {
    return Array.from(this.globals.values());
  }

  /**
   * How a value of type `from` reaches a position expecting `to`.
   * Anything may be discarded into void; everything else comes from the
   * definition data.
   */
  conversionOf(from: ValueType, to: ValueType): ConversionKind {
    if (from === to) return "exact";
    if (to === "void") return "discard";
    return this.conversions.get(conversionKey(from, to)) ?? "none";
  }

  canConvert(from: ValueType, to: ValueType): boolean {
    return this.conversionOf(from, to) !== "none";
  }
}

const cache = new Map<TargetId, TargetCatalog>();

/**
 * Shared catalog over the bundled definitions. Catalogs are immutable, so one
 * instance per target serves every compiler.
 */
export function catalogFor(target: string): TargetCatalog {
  if (isTargetId(target)) {
    const cached = cache.get(target);
    if (cached) return cached;
  }
  const catalog = TargetCatalog.load(target);
  cache.set(catalog.target, catalog);
  return catalog;
}

export function parseDefinitions(data: unknown): Definitions {
  const result = DefinitionsSchema.safeParse(data);
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new CompileError(makeDiagnostic("E0501", { detail }));
  }

  const duplicates = findDuplicates([
    ...result.data.functions.map(f => f.name),
    ...result.data.globals.map(g => g.name),
  ]);
  if (duplicates.length > 0) {
    throw new CompileError(makeDiagnostic("E0501", { detail: `duplicate names: ${duplicates.join(", ")}` }));
  }

  for (const fn of result.data.functions) {
    const problem = checkParameters(fn);
    if (problem) {
      throw new CompileError(makeDiagnostic("E0501", { detail: `function '${fn.name}': ${problem}` }));
    }
  }

  return result.data;
}

function checkParameters(fn: FunctionDef): string | undefined {
  const params = fn.parameters;
  for (let i = 0; i < params.length; i++) {
    const p = params[i];
    if (p.many && i !== params.length - 1) return "only the last parameter may repeat";
    if (!p.optional && i > 0 && params[i - 1].optional) return "required parameter after optional one";
  }
  if (fn.numberPassthrough && !params.some(p => p.type === "passthrough")) {
    return "numberPassthrough without passthrough parameters";
  }
  return undefined;
}

function toCatalogFunction(def: FunctionDef, index: number): CatalogFunction {
  const fn: CatalogFunction = {
    name: def.name,
    description: def.description,
    returnType: def.type,
    parameters: def.parameters,
    numberPassthrough: def.numberPassthrough,
    inequality: def.inequality,
    passthroughLast: def.passthroughLast,
    index,
    ...(def.form ? { form: def.form } : {}),
  };
  return fn;
}

function conversionKey(from: ValueType, to: ValueType): string {
  return `${from}>${to}`;
}

function findDuplicates(names: string[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const n of names) {
    if (seen.has(n)) dupes.add(n);
    seen.add(n);
  }
  return Array.from(dupes);
}

// ─────────────────────────────────────────────────────────────────
// Signature helpers
// ─────────────────────────────────────────────────────────────────

/** Number of arguments a call needs at minimum. A repeating parameter counts once. */
export function minimumArguments(fn: CatalogFunction): number {
  const firstOptional = fn.parameters.findIndex(p => p.optional);
  return firstOptional === -1 ? fn.parameters.length : firstOptional;
}

export function isVariadic(fn: CatalogFunction): boolean {
  const last = fn.parameters[fn.parameters.length - 1];
  return last?.many ?? false;
}

/** Declared maximum, or undefined when the last parameter repeats. */
export function maximumArguments(fn: CatalogFunction): number | undefined {
  return isVariadic(fn) ? undefined : fn.parameters.length;
}

/** Parameter at `index`, repeating the last one for variadic functions. */
export function parameterAt(fn: CatalogFunction, index: number): ParameterDef | undefined {
  if (index < fn.parameters.length) return fn.parameters[index];
  return isVariadic(fn) ? fn.parameters[fn.parameters.length - 1] : undefined;
}

/** Types a passthrough argument may resolve to for this function. */
export function acceptsPassthroughType(fn: CatalogFunction, t: ValueType): boolean {
  if (fn.inequality) return isNumericType(t) || t === "game_difficulty" || t === "team";
  if (fn.numberPassthrough) return isNumericType(t);
  return true;
}
