// src/core/compile/declarations.ts
// First pass: find every script and global before any body is compiled, so
// bodies may refer to declarations in any file and in any order.

import type { Expr, List } from "../reader/expr";
import { describeExpr, isAtom, isList, normalizeName } from "../reader/expr";
import type { Span } from "../source/span";
import { formatSpan } from "../source/span";
import type { ValueType } from "../types/valueType";
import { parseValueType, valueTypeLabel } from "../types/valueType";
import type { ScriptType } from "../types/scriptType";
import { hasReturnType, parseScriptType, takesParameters } from "../types/scriptType";
import type { TargetCatalog } from "../catalog/catalog";
import type { Diagnostic } from "../../outcome/diagnostic";
import { CompileError, errorDiag } from "../../outcome/diagnostic";
import { makeDiagnostic } from "../../outcome/codes";
import type { Declarations, Declared, GlobalDecl, ParameterDecl, ScriptDecl } from "./types";

export type CollectResult = {
  declarations: Declarations;
  warnings: Diagnostic[];
};

const syntaxError = (detail: string, at: Span) => new CompileError(makeDiagnostic("E0102", { detail }, at));

export function collectDeclarations(forest: readonly Expr[], catalog: TargetCatalog): CollectResult {
  const collector = new Collector(catalog);
  for (const expr of forest) collector.add(expr);
  return collector.finish();
}

class Collector {
  private readonly scripts: ScriptDecl[] = [];
  private readonly globals: GlobalDecl[] = [];
  private readonly byName = new Map<string, Declared>();
  private readonly order: Declared[] = [];
  private readonly replacedStubs = new Set<string>();
  private readonly warnings: Diagnostic[] = [];

  constructor(private readonly catalog: TargetCatalog) {}

  add(expr: Expr): void {
    const head = isList(expr) ? expr.items[0] : undefined;
    const keyword = head && isAtom(head) && !head.quoted ? normalizeName(head.text) : undefined;

    if (isList(expr) && keyword === "global") {
      this.declare({ kind: "global", decl: this.readGlobal(expr) });
    } else if (isList(expr) && keyword === "script") {
      this.declare({ kind: "script", decl: this.readScript(expr) });
    } else {
      throw new CompileError(makeDiagnostic("E0101", { got: describeExpr(expr) }, expr.span));
    }
  }

  finish(): CollectResult {
    const limits = this.catalog.limits;
    this.checkCount("script", this.scripts, limits.maxScripts);
    this.checkCount("global", this.globals, limits.maxGlobals);

    return {
      declarations: {
        scripts: this.scripts,
        globals: this.globals,
        byName: this.byName,
        order: this.order,
        replacedStubs: this.replacedStubs,
      },
      warnings: this.warnings,
    };
  }

  // ─────────────────────────────────────────────────────────────────
  // Forms
  // ─────────────────────────────────────────────────────────────────

  /** `(global <type> <name> <expression>)` */
  private readGlobal(form: List): GlobalDecl {
    if (form.items.length !== 4) {
      throw syntaxError(
        `global declaration takes a type, a name and a value, got ${form.items.length - 1} item(s)`,
        form.span
      );
    }
    const [, typeExpr, nameExpr, init] = form.items;
    const name = this.readName(nameExpr, "global");
    const type = this.readType(typeExpr, `global '${name}'`);
    if (type === "void") {
      throw syntaxError(`global '${name}' cannot be of type void`, typeExpr.span);
    }
    if (this.catalog.specialForm(name) !== undefined) {
      throw new CompileError(makeDiagnostic("E0203", { name, what: "global" }, nameExpr.span));
    }
    return { name, span: form.span, type, init, index: this.globals.length };
  }

  /** `(script <type> [<return type>] <name [(<type> <param>)...] | (<name> (<type> <param>)...)> <expression>...)` */
  private readScript(form: List): ScriptDecl {
    const typeExpr = form.items[1];
    if (!typeExpr) throw syntaxError("script declaration is missing its script type", form.span);

    const scriptType = this.readScriptType(typeExpr);
    let cursor = 2;

    let returnType: ValueType = "void";
    if (hasReturnType(scriptType)) {
      const retExpr = form.items[cursor];
      if (!retExpr) throw syntaxError(`${scriptType} script is missing its return type`, form.span);
      returnType = this.readType(retExpr, `${scriptType} script`);
      cursor++;
    }

    const signature = form.items[cursor];
    if (!signature) throw syntaxError("script declaration is missing its name", form.span);
    cursor++;

    let name: string;
    let parameters: ParameterDecl[] = [];
    if (isList(signature)) {
      const [nameExpr, ...paramExprs] = signature.items;
      if (!nameExpr) throw syntaxError("script declaration is missing its name", signature.span);
      name = this.readName(nameExpr, "script");
      parameters = this.readParameters(name, scriptType, paramExprs, signature.span);
    } else {
      name = this.readName(signature, "script");
      const first = cursor;
      while (cursor < form.items.length && this.isParameterForm(form.items[cursor])) cursor++;
      const paramExprs = form.items.slice(first, cursor);
      if (paramExprs.length > 0) {
        parameters = this.readParameters(name, scriptType, paramExprs, paramExprs[0].span);
      }
    }

    if (this.catalog.specialForm(name) !== undefined) {
      throw new CompileError(makeDiagnostic("E0203", { name, what: "script" }, signature.span));
    }

    const body = form.items.slice(cursor);
    if (body.length === 0 && scriptType !== "stub") {
      throw syntaxError(`script '${name}' has no body`, form.span);
    }

    return { name, span: form.span, scriptType, returnType, parameters, body, index: this.scripts.length };
  }

  /**
   * `(<value type> <name>)` after a bare script name. Type names are never
   * engine functions, so such a list cannot start the body.
   */
  private isParameterForm(e: Expr): boolean {
    if (!isList(e) || e.items.length !== 2) return false;
    const [typeExpr, nameExpr] = e.items;
    if (!isAtom(typeExpr) || typeExpr.quoted || !isAtom(nameExpr) || nameExpr.quoted) return false;
    return parseValueType(typeExpr.text) !== undefined && !this.catalog.hasFunction(normalizeName(typeExpr.text));
  }

  private readParameters(
    script: string,
    scriptType: ScriptType,
    exprs: readonly Expr[],
    at: Span
  ): ParameterDecl[] {
    if (exprs.length === 0) return [];

    const max = this.catalog.limits.maxScriptParameters;
    if (!takesParameters(scriptType)) {
      throw syntaxError(`${scriptType} script '${script}' cannot take parameters`, at);
    }
    if (max === 0) {
      throw syntaxError(`scripts cannot take parameters on target ${this.catalog.target}`, at);
    }
    if (exprs.length > max) {
      throw new CompileError(
        makeDiagnostic("E0600", { what: "script parameter", max, count: exprs.length }, exprs[max].span)
      );
    }

    const params: ParameterDecl[] = [];
    for (const e of exprs) {
      if (!isList(e) || e.items.length !== 2) {
        throw syntaxError(`expected a parameter of the form (<type> <name>), got ${describeExpr(e)}`, e.span);
      }
      const [typeExpr, nameExpr] = e.items;
      const name = this.readName(nameExpr, "parameter");
      const type = this.readType(typeExpr, `parameter '${name}'`);
      if (type === "void") throw syntaxError(`parameter '${name}' cannot be of type void`, typeExpr.span);
      if (params.some(p => p.name === name)) {
        throw new CompileError(
          makeDiagnostic("E0204", { detail: `duplicate parameter '${name}' in script '${script}'` }, e.span)
        );
      }
      params.push({ name, type, span: e.span });
    }
    return params;
  }

  // ─────────────────────────────────────────────────────────────────
  // Atoms
  // ─────────────────────────────────────────────────────────────────

  private readName(e: Expr, what: string): string {
    if (!isAtom(e) || e.quoted) {
      throw syntaxError(`expected a ${what} name, got ${describeExpr(e)}`, e.span);
    }
    const name = normalizeName(e.text);
    const max = this.catalog.limits.maxNameLength;
    if (name.length > max) {
      throw new CompileError(makeDiagnostic("E0201", { name, max }, e.span));
    }
    return name;
  }

  private readType(e: Expr, owner: string): ValueType {
    const type = isAtom(e) && !e.quoted ? parseValueType(e.text) : undefined;
    if (!type) {
      throw syntaxError(`expected a value type for ${owner}, got ${describeExpr(e)}`, e.span);
    }
    if (type === "passthrough") {
      throw syntaxError(`${owner} cannot be of type ${valueTypeLabel(type)}`, e.span);
    }
    return type;
  }

  private readScriptType(e: Expr): ScriptType {
    const type = isAtom(e) && !e.quoted ? parseScriptType(e.text) : undefined;
    if (!type) {
      throw syntaxError(
        `expected a script type (startup, dormant, continuous, static or stub), got ${describeExpr(e)}`,
        e.span
      );
    }
    return type;
  }

  // ─────────────────────────────────────────────────────────────────
  // Namespace
  // ─────────────────────────────────────────────────────────────────

  private declare(entry: Declared): void {
    const { name, span } = entry.decl;
    const existing = this.byName.get(name);

    if (existing) {
      this.redeclare(existing, entry);
      return;
    }

    this.warnIfShadowing(name, span);
    this.byName.set(name, entry);
    this.order.push(entry);
    if (entry.kind === "script") this.scripts.push(entry.decl);
    else this.globals.push(entry.decl);
  }

  /** A stub and one static script of the same name merge; anything else is a duplicate. */
  private redeclare(existing: Declared, entry: Declared): void {
    const name = entry.decl.name;
    if (existing.kind === "script" && entry.kind === "script" && !this.replacedStubs.has(name)) {
      const pair = stubPair(existing.decl, entry.decl);
      if (pair) {
        const mismatch = signatureMismatch(pair.stub, pair.replacement);
        if (mismatch) {
          throw new CompileError(makeDiagnostic("E0202", { name, detail: mismatch }, entry.decl.span));
        }
        this.replacedStubs.add(name);
        if (pair.replacement === entry.decl) {
          const replacement: ScriptDecl = { ...entry.decl, index: existing.decl.index };
          const merged: Declared = { kind: "script", decl: replacement };
          this.scripts[replacement.index] = replacement;
          this.order[this.order.indexOf(existing)] = merged;
          this.byName.set(name, merged);
        }
        return;
      }
    }

    const first = existing.decl.span;
    const note = errorDiag("E0200", "declaration", `'${name}' is first declared here`, { span: first });
    throw new CompileError(
      makeDiagnostic("E0200", { name, first: formatSpan(first) }, entry.decl.span, [note])
    );
  }

  private warnIfShadowing(name: string, at: Span): void {
    if (this.catalog.hasFunction(name)) {
      this.warnings.push(makeDiagnostic("W0004", { name, what: "function" }, at));
    } else if (this.catalog.getGlobal(name)) {
      this.warnings.push(makeDiagnostic("W0004", { name, what: "global" }, at));
    }
  }

  private checkCount(what: string, decls: readonly { span: Span }[], max: number): void {
    if (decls.length > max) {
      throw new CompileError(makeDiagnostic("E0600", { what, max, count: decls.length }, decls[max].span));
    }
  }
}

function stubPair(a: ScriptDecl, b: ScriptDecl): { stub: ScriptDecl; replacement: ScriptDecl } | undefined {
  if (a.scriptType === "stub" && b.scriptType === "static") return { stub: a, replacement: b };
  if (a.scriptType === "static" && b.scriptType === "stub") return { stub: b, replacement: a };
  return undefined;
}

function signatureMismatch(stub: ScriptDecl, replacement: ScriptDecl): string | undefined {
  if (stub.returnType !== replacement.returnType) {
    return `return type ${valueTypeLabel(replacement.returnType)} differs from ${valueTypeLabel(stub.returnType)}`;
  }
  if (stub.parameters.length !== replacement.parameters.length) {
    return `takes ${replacement.parameters.length} parameter(s) instead of ${stub.parameters.length}`;
  }
  const differing = stub.parameters.findIndex((p, i) => p.type !== replacement.parameters[i].type);
  if (differing !== -1) {
    return `parameter ${differing + 1} is ${valueTypeLabel(replacement.parameters[differing].type)} instead of ${valueTypeLabel(stub.parameters[differing].type)}`;
  }
  return undefined;
}

