// src/core/compile/output.ts
// Result of one successful compile. Every collection is frozen and every
// index is stable for the lifetime of the value.

import type { Diagnostic } from "../../outcome/diagnostic";
import type { CompiledGlobal, CompiledNode, CompiledScript } from "./types";

export type CompiledOutputInit = {
  scripts: readonly CompiledScript[];
  globals: readonly CompiledGlobal[];
  nodes: readonly CompiledNode[];
  warnings: readonly Diagnostic[];
  files: readonly string[];
};

export class CompiledOutput {
  readonly scripts: readonly CompiledScript[];
  readonly globals: readonly CompiledGlobal[];
  readonly nodes: readonly CompiledNode[];
  readonly warnings: readonly Diagnostic[];
  /** Files compiled into this output, in load order. */
  readonly files: readonly string[];

  constructor(init: CompiledOutputInit) {
    this.scripts = Object.freeze(init.scripts.map(s => Object.freeze({ ...s, parameters: Object.freeze([...s.parameters]) })));
    this.globals = Object.freeze(init.globals.map(g => Object.freeze({ ...g })));
    this.nodes = Object.freeze([...init.nodes]);
    this.warnings = Object.freeze([...init.warnings]);
    this.files = Object.freeze([...init.files]);
    Object.freeze(this);
  }

  node(index: number): CompiledNode | undefined {
    return this.nodes[index];
  }

  /** Arguments of the call at `index`, in source order. Empty for non-calls. */
  argumentsOf(index: number): CompiledNode[] {
    const call = this.nodes[index];
    if (!call || (call.kind !== "function-call" && call.kind !== "script-call")) return [];

    const args: CompiledNode[] = [];
    let cursor = call.data?.tag === "node" ? call.data.index : null;
    while (cursor !== null) {
      const arg = this.nodes[cursor];
      args.push(arg);
      cursor = arg.next;
    }
    return args;
  }

  findScript(name: string): CompiledScript | undefined {
    return this.scripts.find(s => s.name === name);
  }

  findGlobal(name: string): CompiledGlobal | undefined {
    return this.globals.find(g => g.name === name);
  }
}
