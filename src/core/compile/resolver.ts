// src/core/compile/resolver.ts
// Second pass: compile every declaration body against its declared type and
// lay the result out in the node arena.
//
// The expected type flows top-down. The same atom compiles to a short, a real
// or a boolean depending on where it appears; `passthrough` accepts anything.

import type { Atom, Expr, List } from "../reader/expr";
import { atom, describeExpr, isAtom, list, normalizeName } from "../reader/expr";
import type { Span } from "../source/span";
import type { ValueType } from "../types/valueType";
import { valueTypeLabel } from "../types/valueType";
import type { CatalogFunction, TargetCatalog } from "../catalog/catalog";
import { acceptsPassthroughType, parameterAt } from "../catalog/catalog";
import type { Diagnostic } from "../../outcome/diagnostic";
import { CompileError } from "../../outcome/diagnostic";
import { makeDiagnostic } from "../../outcome/codes";
import { defaultValue, hasLiteralSyntax, isBooleanWord, literalSyntax, looksNumeric, parseLiteral } from "./literals";
import { NodeArena } from "./arena";
import type { FormHost, Scope, Site } from "./specialForms";
import { argumentSite, callNode, checkArity, compileSpecialForm } from "./specialForms";
import type {
  CompiledGlobal,
  CompiledNode,
  CompiledScript,
  Declarations,
  GlobalDecl,
  ScalarData,
  ScriptDecl,
  TypedNode,
} from "./types";

export type ResolvedProgram = {
  scripts: CompiledScript[];
  globals: CompiledGlobal[];
  nodes: readonly CompiledNode[];
  warnings: Diagnostic[];
};

export function resolveProgram(declarations: Declarations, catalog: TargetCatalog): ResolvedProgram {
  return new Resolver(declarations, catalog).run();
}

const SCALAR_TYPES: ReadonlySet<ValueType> = new Set<ValueType>(["boolean", "short", "long", "real"]);

function primitive(span: Span, valueType: ValueType, value: ScalarData | null, stringData?: string): TypedNode {
  const node: TypedNode = {
    kind: "primitive",
    valueType,
    span,
    value,
    index: null,
    external: false,
    literal: true,
    args: [],
  };
  if (stringData !== undefined) node.stringData = stringData;
  return node;
}

function reference(
  kind: "global" | "local",
  span: Span,
  name: string,
  valueType: ValueType,
  index: number,
  external = false
): TypedNode {
  return { kind, valueType, span, stringData: name, value: null, index, external, literal: false, args: [] };
}

/** Domain types written as bare names: object names, AI squads, sounds... */
function isNameLiteralType(t: ValueType): boolean {
  return (
    !SCALAR_TYPES.has(t) &&
    t !== "void" &&
    t !== "script" &&
    t !== "passthrough" &&
    t !== "function_name" &&
    t !== "special_form" &&
    t !== "unparsed"
  );
}

class Resolver implements FormHost {
  private readonly arena = new NodeArena();
  private readonly warnings: Diagnostic[] = [];
  private readonly referencedScripts = new Set<string>();

  constructor(
    private readonly decls: Declarations,
    readonly catalog: TargetCatalog
  ) {}

  run(): ResolvedProgram {
    const scriptRoots: number[] = [];
    const globalRoots: number[] = [];

    for (const entry of this.decls.order) {
      if (entry.kind === "script") {
        scriptRoots[entry.decl.index] = this.arena.emit(this.compileScript(entry.decl));
      } else {
        globalRoots[entry.decl.index] = this.arena.emit(this.compileGlobal(entry.decl));
      }
    }

    for (const s of this.decls.scripts) {
      if (s.scriptType === "stub" && !this.referencedScripts.has(s.name)) {
        this.warnings.push(makeDiagnostic("W0003", { name: s.name }, s.span));
      }
    }

    const { maxNodes } = this.catalog.limits;
    if (this.arena.size > maxNodes) {
      this.warnings.push(makeDiagnostic("W0006", { count: this.arena.size, max: maxNodes, target: this.catalog.target }));
    }

    return {
      scripts: this.decls.scripts.map(s => ({
        name: s.name,
        span: s.span,
        scriptType: s.scriptType,
        returnType: s.returnType,
        parameters: s.parameters.map(p => ({ name: p.name, type: p.type, span: p.span })),
        root: scriptRoots[s.index],
      })),
      globals: this.decls.globals.map(g => ({
        name: g.name,
        span: g.span,
        type: g.type,
        root: globalRoots[g.index],
      })),
      nodes: this.arena.freeze(),
      warnings: this.warnings,
    };
  }

  // ─────────────────────────────────────────────────────────────────
  // Declarations
  // ─────────────────────────────────────────────────────────────────

  private compileScript(decl: ScriptDecl): TypedNode {
    const scope: Scope = { params: decl.parameters };
    const site: Site = { kind: "body", owner: "script", name: decl.name };
    if (decl.body.length === 0) return this.defaultNode(decl.returnType, decl.span);
    return this.compileBody(decl.body, decl.returnType, scope, site);
  }

  private compileGlobal(decl: GlobalDecl): TypedNode {
    const scope: Scope = { params: [], globalIndex: decl.index };
    return this.compile(decl.init, decl.type, scope, { kind: "body", owner: "global", name: decl.name });
  }

  /** Several body expressions behave as one `begin`. */
  private compileBody(exprs: readonly Expr[], expected: ValueType, scope: Scope, site: Site): TypedNode {
    if (exprs.length === 1) return this.compile(exprs[0], expected, scope, site);
    const span = exprs[0].span;
    return this.compile(list([atom("begin", span), ...exprs], span), expected, scope, site);
  }

  private defaultNode(type: ValueType, span: Span): TypedNode {
    const begin = this.catalog.getFunction("begin");
    if (type === "void" && begin) return callNode(begin, span, "void", []);
    return primitive(span, type, defaultValue(type));
  }

  // ─────────────────────────────────────────────────────────────────
  // Expressions
  // ─────────────────────────────────────────────────────────────────

  compile(expr: Expr, expected: ValueType, scope: Scope, site: Site): TypedNode {
    if (isAtom(expr)) return this.coerce(this.compileAtom(expr, expected, scope, site), expected, site);
    return this.compileList(expr, expected, scope, site);
  }

  private compileList(expr: List, expected: ValueType, scope: Scope, site: Site): TypedNode {
    const head = expr.items[0];
    if (!head) throw new CompileError(makeDiagnostic("E0103", undefined, expr.span));
    if (!isAtom(head) || head.quoted) {
      throw new CompileError(
        makeDiagnostic("E0102", { detail: `expected a function name, got ${describeExpr(head)}` }, head.span)
      );
    }

    const name = normalizeName(head.text);
    const fn = this.catalog.getFunction(name);
    if (fn?.form) return compileSpecialForm(this, fn, fn.form, expr, expected, scope, site);

    const declared = this.decls.byName.get(name);
    if (declared?.kind === "script") {
      return this.coerce(this.compileScriptCall(declared.decl, expr, scope), expected, site);
    }
    if (fn) return this.coerce(this.compileCall(fn, expr, expected, scope), expected, site);

    throw new CompileError(makeDiagnostic("E0301", { name }, head.span));
  }

  private compileScriptCall(script: ScriptDecl, call: List, scope: Scope): TypedNode {
    if (script.scriptType !== "static" && script.scriptType !== "stub") {
      throw new CompileError(makeDiagnostic("E0304", { name: script.name, type: script.scriptType }, call.span));
    }
    const args = call.items.slice(1);
    if (args.length !== script.parameters.length) {
      throw new CompileError(
        makeDiagnostic(
          "E0402",
          { name: script.name, expected: script.parameters.length, actual: args.length },
          call.span
        )
      );
    }

    this.referencedScripts.add(script.name);
    return {
      kind: "script-call",
      valueType: script.returnType,
      span: call.span,
      stringData: script.name,
      value: null,
      index: script.index,
      external: false,
      literal: false,
      args: args.map((a, i) =>
        this.compile(a, script.parameters[i].type, scope, argumentSite(script.name, i + 1))
      ),
    };
  }

  /**
   * Ordinary built-in call. Passthrough parameters share one type: the
   * expected type when the function returns its passthrough type, otherwise
   * the type of the first argument that has one of its own. Bare literals in
   * passthrough positions wait until that type is known and default to real.
   */
  private compileCall(fn: CatalogFunction, call: List, expected: ValueType, scope: Scope): TypedNode {
    const argExprs = call.items.slice(1);
    checkArity(fn, argExprs.length, call.span);

    const adoptsExpected =
      fn.returnType === "passthrough" &&
      expected !== "passthrough" &&
      expected !== "void" &&
      acceptsPassthroughType(fn, expected);
    let shared: ValueType | undefined = adoptsExpected ? expected : undefined;

    const compiled = new Map<number, TypedNode>();
    const deferred: number[] = [];
    const last = argExprs.length - 1;

    argExprs.forEach((arg, i) => {
      const param = parameterAt(fn, i);
      const site = argumentSite(fn.name, i + 1, param?.allowUppercase ?? false);
      let type = param?.type ?? "passthrough";
      if (fn.passthroughLast && i < last && type === "passthrough") type = "void";

      if (type !== "passthrough") {
        compiled.set(i, this.compile(arg, type, scope, site));
      } else if (shared !== undefined) {
        compiled.set(i, this.compile(arg, shared, scope, site));
      } else if (this.isDeferrable(arg, scope)) {
        deferred.push(i);
      } else {
        const node = this.compile(arg, "passthrough", scope, site);
        shared = node.valueType;
        compiled.set(i, node);
      }
    });

    if (deferred.length > 0) {
      const type = shared ?? "real";
      shared = type;
      for (const i of deferred) {
        const param = parameterAt(fn, i);
        compiled.set(i, this.compile(argExprs[i], type, scope, argumentSite(fn.name, i + 1, param?.allowUppercase ?? false)));
      }
    }

    if (shared !== undefined && !acceptsPassthroughType(fn, shared)) {
      const requirement = fn.inequality
        ? "requires numbers, game difficulties or teams"
        : "requires numbers";
      throw new CompileError(
        makeDiagnostic("E0404", { name: fn.name, actual: valueTypeLabel(shared), requirement }, call.span)
      );
    }

    const args: TypedNode[] = [];
    for (let i = 0; i < argExprs.length; i++) {
      const node = compiled.get(i);
      if (!node) throw new Error(`argument ${i + 1} of '${fn.name}' was never compiled`);
      args.push(node);
    }

    const returnType = fn.returnType === "passthrough" ? (shared ?? "void") : fn.returnType;
    return callNode(fn, call.span, returnType, args);
  }

  /** A bare atom that names nothing in scope; its type comes from its neighbours. */
  private isDeferrable(expr: Expr, scope: Scope): boolean {
    if (!isAtom(expr) || expr.quoted) return false;
    const name = normalizeName(expr.text);
    return (
      !scope.params.some(p => p.name === name) &&
      this.decls.byName.get(name)?.kind !== "global" &&
      !this.catalog.getGlobal(name) &&
      !this.catalog.hasFunction(name)
    );
  }

  // ─────────────────────────────────────────────────────────────────
  // Atoms
  // ─────────────────────────────────────────────────────────────────

  private compileAtom(a: Atom, expected: ValueType, scope: Scope, site: Site): TypedNode {
    if (a.quoted) return this.quotedLiteral(a, expected);

    const name = normalizeName(a.text);

    const param = scope.params.findIndex(p => p.name === name);
    if (param !== -1) return reference("local", a.span, name, scope.params[param].type, param);

    const scalar = this.scalarLiteral(a, expected);
    if (scalar) return scalar;

    const declared = this.decls.byName.get(name);
    if (declared?.kind === "global") {
      const g = declared.decl;
      if (scope.globalIndex !== undefined && g.index >= scope.globalIndex) {
        this.warnings.push(makeDiagnostic("W0005", { name }, a.span));
      }
      return reference("global", a.span, name, g.type, g.index);
    }
    const engineGlobal = this.catalog.getGlobal(name);
    if (engineGlobal) return reference("global", a.span, name, engineGlobal.type, engineGlobal.index, true);

    if (expected === "script") return this.scriptLiteral(name, a.span);

    const fn = this.catalog.getFunction(name);
    if (fn) {
      if (expected === "passthrough" || expected === "function_name") {
        const node = primitive(a.span, "function_name", null, name);
        node.index = fn.index;
        return node;
      }
      throw new CompileError(
        makeDiagnostic(
          "E0400",
          { expected: valueTypeLabel(expected), actual: "function name", detail: ` (did you mean '(${name})'?)` },
          a.span
        )
      );
    }

    if (isNameLiteralType(expected)) {
      if (hasLiteralSyntax(expected)) {
        const value = parseLiteral(a.text, expected);
        if (!value) throw this.unparsable(a, expected);
        return primitive(a.span, expected, value, name);
      }
      const keepCase = site.kind === "argument" && site.keepCase;
      return primitive(a.span, expected, null, keepCase ? a.text : name);
    }

    const hint = declared?.kind === "script" ? ` (scripts are called as '(${name})')` : "";
    throw new CompileError(makeDiagnostic("E0300", { name, hint }, a.span));
  }

  /**
   * Boolean and numeric literals in a position of that type. In a
   * passthrough position numbers read as real and on/off words as boolean.
   */
  private scalarLiteral(a: Atom, expected: ValueType): TypedNode | undefined {
    if (expected === "passthrough") {
      if (looksNumeric(a.text)) return this.literalOf(a, "real");
      if (isBooleanWord(a.text)) return this.literalOf(a, "boolean");
      return undefined;
    }
    if (!SCALAR_TYPES.has(expected)) return undefined;
    const value = parseLiteral(a.text, expected);
    if (value) return primitive(a.span, expected, value);
    if (looksNumeric(a.text) || isBooleanWord(a.text)) throw this.unparsable(a, expected);
    return undefined;
  }

  private literalOf(a: Atom, type: ValueType): TypedNode {
    const value = parseLiteral(a.text, type);
    if (!value) throw this.unparsable(a, type);
    return primitive(a.span, type, value);
  }

  private quotedLiteral(a: Atom, expected: ValueType): TypedNode {
    if (hasLiteralSyntax(expected)) return this.literalOf(a, expected);
    if (expected === "script") return this.scriptLiteral(normalizeName(a.text), a.span);
    if (isNameLiteralType(expected)) return primitive(a.span, expected, null, a.text);
    return primitive(a.span, "string", null, a.text);
  }

  private scriptLiteral(name: string, span: Span): TypedNode {
    const declared = this.decls.byName.get(name);
    if (declared?.kind !== "script") throw new CompileError(makeDiagnostic("E0303", { name }, span));
    this.referencedScripts.add(name);
    const node = primitive(span, "script", { tag: "short", value: declared.decl.index }, name);
    node.index = declared.decl.index;
    return node;
  }

  private unparsable(a: Atom, expected: ValueType): CompileError {
    return new CompileError(
      makeDiagnostic(
        "E0401",
        { token: a.text, expected: valueTypeLabel(expected), allowed: literalSyntax(expected) },
        a.span
      )
    );
  }

  variable(expr: Expr, scope: Scope): TypedNode {
    if (!isAtom(expr) || expr.quoted) {
      throw new CompileError(makeDiagnostic("E0302", { name: describeExpr(expr) }, expr.span));
    }
    const name = normalizeName(expr.text);
    const param = scope.params.findIndex(p => p.name === name);
    if (param !== -1) return reference("local", expr.span, name, scope.params[param].type, param);

    const declared = this.decls.byName.get(name);
    if (declared?.kind === "global") return reference("global", expr.span, name, declared.decl.type, declared.decl.index);

    const engineGlobal = this.catalog.getGlobal(name);
    if (engineGlobal) return reference("global", expr.span, name, engineGlobal.type, engineGlobal.index, true);

    throw new CompileError(makeDiagnostic("E0302", { name }, expr.span));
  }

  // ─────────────────────────────────────────────────────────────────
  // Conversions
  // ─────────────────────────────────────────────────────────────────

  coerce(node: TypedNode, expected: ValueType, site: Site): TypedNode {
    if (expected === "passthrough" || node.valueType === expected) return node;
    if (node.valueType === "function_name" || expected === "function_name") {
      throw this.mismatch(node, expected, site);
    }

    // a converted node takes the type of its position; the runtime converts by it
    switch (this.catalog.conversionOf(node.valueType, expected)) {
      case "exact":
        return node;
      case "upcast":
      case "discard":
        return { ...node, valueType: expected };
      case "widening":
        if (!node.literal) this.warnConversion("W0001", node, expected);
        return { ...node, valueType: expected };
      case "narrowing":
        if (!node.literal) this.warnConversion("W0002", node, expected);
        return { ...node, valueType: expected };
      case "none":
        throw this.mismatch(node, expected, site);
    }
  }

  private warnConversion(code: "W0001" | "W0002", node: TypedNode, to: ValueType): void {
    const what =
      node.kind === "function-call" || node.kind === "script-call"
        ? `the result of '${node.stringData ?? "?"}'`
        : `'${node.stringData ?? "?"}'`;
    this.warnings.push(
      makeDiagnostic(code, { what, from: valueTypeLabel(node.valueType), to: valueTypeLabel(to) }, node.span)
    );
  }

  private mismatch(node: TypedNode, expected: ValueType, site: Site): CompileError {
    const actual = node.valueType === "function_name" ? "function name" : valueTypeLabel(node.valueType);
    if (site.kind === "body") {
      return new CompileError(
        makeDiagnostic(
          "E0403",
          { kind: site.owner, name: site.name, expected: valueTypeLabel(expected), actual },
          node.span
        )
      );
    }
    const detail = site.kind === "argument" ? ` in argument ${site.position} of '${site.fn}'` : "";
    return new CompileError(
      makeDiagnostic("E0400", { expected: valueTypeLabel(expected), actual, detail }, node.span)
    );
  }
}
