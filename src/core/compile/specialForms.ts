// src/core/compile/specialForms.ts
// Forms with structural typing rules. `begin`, `begin_random`, `if` and
// `cond` pass the expected type through to the members that produce their
// value; `and`, `or` and `set` have a type of their own.

import type { Expr, List } from "../reader/expr";
import { atom, describeExpr, list } from "../reader/expr";
import type { Span } from "../source/span";
import type { ValueType } from "../types/valueType";
import type { CatalogFunction, TargetCatalog } from "../catalog/catalog";
import { maximumArguments, minimumArguments } from "../catalog/catalog";
import type { FormKind } from "../catalog/schema";
import type { ParameterDecl, TypedNode } from "./types";
import { CompileError } from "../../outcome/diagnostic";
import { makeDiagnostic } from "../../outcome/codes";

export type Scope = {
  params: readonly ParameterDecl[];
  /** Index of the global whose initializer is being compiled. */
  globalIndex?: number;
};

/** Where a value ends up; decides which error a type mismatch raises. */
export type Site =
  | { kind: "body"; owner: "script" | "global"; name: string }
  | { kind: "argument"; fn: string; position: number; keepCase: boolean }
  | { kind: "value" };

export interface FormHost {
  readonly catalog: TargetCatalog;
  compile(expr: Expr, expected: ValueType, scope: Scope, site: Site): TypedNode;
  coerce(node: TypedNode, expected: ValueType, site: Site): TypedNode;
  /** Assignable reference: a script parameter or a global. */
  variable(expr: Expr, scope: Scope): TypedNode;
}

export const argumentSite = (fn: string, position: number, keepCase = false): Site => ({
  kind: "argument",
  fn,
  position,
  keepCase,
});

export function callNode(fn: CatalogFunction, span: Span, valueType: ValueType, args: TypedNode[]): TypedNode {
  return {
    kind: "function-call",
    valueType,
    span,
    stringData: fn.name,
    value: null,
    index: fn.index,
    external: false,
    literal: false,
    args,
  };
}

export function describeArity(min: number, max: number | undefined): string {
  if (max === undefined) return `at least ${min}`;
  return min === max ? `${min}` : `${min} to ${max}`;
}

export function checkArity(fn: CatalogFunction, count: number, span: Span): void {
  const min = minimumArguments(fn);
  const max = maximumArguments(fn);
  if (count < min || (max !== undefined && count > max)) {
    throw new CompileError(
      makeDiagnostic("E0402", { name: fn.name, expected: describeArity(min, max), actual: count }, span)
    );
  }
}

export function compileSpecialForm(
  host: FormHost,
  fn: CatalogFunction,
  form: FormKind,
  call: List,
  expected: ValueType,
  scope: Scope,
  site: Site
): TypedNode {
  const members = call.items.slice(1);
  checkArity(fn, members.length, call.span);

  switch (form) {
    case "sequence":
      return sequence(host, fn, call, members, expected, scope, site);
    case "random":
      return random(host, fn, call, members, expected, scope, site);
    case "conditional":
      return conditional(host, fn, call, members, expected, scope, site);
    case "cond":
      return host.compile(desugarCond(members, call.span), expected, scope, site);
    case "logical": {
      const args = members.map((m, i) => host.compile(m, "boolean", scope, argumentSite(fn.name, i + 1)));
      return host.coerce(callNode(fn, call.span, "boolean", args), expected, site);
    }
    case "assignment": {
      const target = host.variable(members[0], scope);
      const value = host.compile(members[1], target.valueType, scope, argumentSite(fn.name, 2));
      return host.coerce(callNode(fn, call.span, target.valueType, [target, value]), expected, site);
    }
  }
}

const settle = (expected: ValueType, produced: ValueType): ValueType =>
  expected === "passthrough" ? produced : expected;

function sequence(
  host: FormHost,
  fn: CatalogFunction,
  call: List,
  members: readonly Expr[],
  expected: ValueType,
  scope: Scope,
  site: Site
): TypedNode {
  if (members.length === 0) {
    return host.coerce(callNode(fn, call.span, "void", []), expected, site);
  }
  const last = members.length - 1;
  const args = members.map((m, i) =>
    i < last ? host.compile(m, "void", scope, { kind: "value" }) : host.compile(m, expected, scope, site)
  );
  return callNode(fn, call.span, settle(expected, args[last].valueType), args);
}

function random(
  host: FormHost,
  fn: CatalogFunction,
  call: List,
  members: readonly Expr[],
  expected: ValueType,
  scope: Scope,
  site: Site
): TypedNode {
  const first = host.compile(members[0], expected, scope, site);
  const type = settle(expected, first.valueType);
  const rest = members.slice(1).map(m => host.compile(m, type, scope, site));
  return callNode(fn, call.span, type, [first, ...rest]);
}

function conditional(
  host: FormHost,
  fn: CatalogFunction,
  call: List,
  members: readonly Expr[],
  expected: ValueType,
  scope: Scope,
  site: Site
): TypedNode {
  const condition = host.compile(members[0], "boolean", scope, argumentSite(fn.name, 1));
  const consequent = host.compile(members[1], expected, scope, site);
  const type = settle(expected, consequent.valueType);
  const args = [condition, consequent];
  if (members.length > 2) args.push(host.compile(members[2], type, scope, site));
  return callNode(fn, call.span, type, args);
}

/**
 * `(cond (c1 a b) (c2 d))` → `(if c1 (begin a b) (if c2 d))`. A clause with a
 * single expression is not wrapped in `begin`.
 */
export function desugarCond(clauses: readonly Expr[], span: Span): List {
  let chain: List | undefined;
  for (let i = clauses.length - 1; i >= 0; i--) {
    const clause = clauses[i];
    if (clause.tag !== "List" || clause.items.length < 2) {
      throw new CompileError(
        makeDiagnostic(
          "E0102",
          { detail: `cond clause must be a condition followed by expressions, got ${describeExpr(clause)}` },
          clause.span
        )
      );
    }
    const [condition, ...body] = clause.items;
    const value = body.length === 1 ? body[0] : list([atom("begin", clause.span), ...body], clause.span);
    const items: Expr[] = [atom("if", i === 0 ? span : clause.span), condition, value];
    if (chain) items.push(chain);
    chain = list(items, i === 0 ? span : clause.span);
  }
  if (!chain) {
    throw new CompileError(makeDiagnostic("E0402", { name: "cond", expected: "at least 1", actual: 0 }, span));
  }
  return chain;
}
