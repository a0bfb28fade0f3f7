// src/core/compile/types.ts
// Shapes shared by the declaration collector, the resolver and the node arena.

import type { Span } from "../source/span";
import type { Expr } from "../reader/expr";
import type { ValueType } from "../types/valueType";
import type { ScriptType } from "../types/scriptType";

// ─────────────────────────────────────────────────────────────────
// Declarations
// ─────────────────────────────────────────────────────────────────

export type ParameterDecl = {
  name: string;
  type: ValueType;
  span: Span;
};

export type ScriptDecl = {
  name: string;
  span: Span;
  scriptType: ScriptType;
  /** `void` for startup, dormant and continuous scripts. */
  returnType: ValueType;
  parameters: ParameterDecl[];
  /** Empty only for a stub declared without a body. */
  body: Expr[];
  /** Position in the compiled script list. */
  index: number;
};

export type GlobalDecl = {
  name: string;
  span: Span;
  type: ValueType;
  init: Expr;
  index: number;
};

export type Declared =
  | { kind: "script"; decl: ScriptDecl }
  | { kind: "global"; decl: GlobalDecl };

export type Declarations = {
  scripts: ScriptDecl[];
  globals: GlobalDecl[];
  /** Shared namespace of scripts and globals. */
  byName: ReadonlyMap<string, Declared>;
  /** Declarations in collection order; bodies are compiled in this order. */
  order: Declared[];
  /** Stub names whose stub was replaced by a static script. */
  replacedStubs: ReadonlySet<string>;
};

// ─────────────────────────────────────────────────────────────────
// Nodes
// ─────────────────────────────────────────────────────────────────

export type NodeKind = "primitive" | "global" | "local" | "function-call" | "script-call";

export type ScalarData =
  | { tag: "boolean"; value: boolean }
  | { tag: "short"; value: number }
  | { tag: "long"; value: number }
  | { tag: "real"; value: number };

/** Scalar payload of a primitive, or the arena index of a call's first argument. */
export type NodeData = ScalarData | { tag: "node"; index: number };

/**
 * One entry of the flat node arena. Arguments of a call are reached through
 * `data` and chained through `next`; `null` ends a chain.
 */
export interface CompiledNode {
  readonly span: Span;
  readonly kind: NodeKind;
  readonly valueType: ValueType;
  /** Function, script, global or parameter name; text of an opaque literal. */
  readonly stringData?: string;
  readonly data: NodeData | null;
  /**
   * Function index on the target for function calls and function names,
   * script index for script calls, global index for global references,
   * parameter position for locals.
   */
  readonly index: number | null;
  /** Set on references to engine globals, whose index is the catalog's. */
  readonly external: boolean;
  readonly next: number | null;
}

/**
 * Resolver output before it is laid out in the arena: a tree whose calls own
 * their argument subtrees.
 */
export type TypedNode = {
  kind: NodeKind;
  valueType: ValueType;
  span: Span;
  stringData?: string;
  value: ScalarData | null;
  index: number | null;
  external: boolean;
  /** Literal values convert without a warning. */
  literal: boolean;
  args: TypedNode[];
};

// ─────────────────────────────────────────────────────────────────
// Compiled declarations
// ─────────────────────────────────────────────────────────────────

export interface CompiledParameter {
  readonly name: string;
  readonly type: ValueType;
  readonly span: Span;
}

export interface CompiledScript {
  readonly name: string;
  readonly span: Span;
  readonly scriptType: ScriptType;
  readonly returnType: ValueType;
  readonly parameters: readonly CompiledParameter[];
  /** Arena index of the body's root node. */
  readonly root: number;
}

export interface CompiledGlobal {
  readonly name: string;
  readonly span: Span;
  readonly type: ValueType;
  /** Arena index of the initializer's root node. */
  readonly root: number;
}
