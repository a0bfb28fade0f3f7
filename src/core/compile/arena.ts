import type { CompiledNode, NodeData, TypedNode } from "./types";

type MutableNode = {
  -readonly [K in keyof CompiledNode]: CompiledNode[K];
};

/**
 * Append-only node table. A call is laid out before its arguments; the
 * call's `data` points at the first argument and each argument points at the
 * next through `next`.
 */
export class NodeArena {
  private readonly nodes: MutableNode[] = [];

  get size(): number {
    return this.nodes.length;
  }

  /** Lay out a resolved tree and return the index of its root. */
  emit(tree: TypedNode): number {
    const index = this.nodes.length;
    const data: NodeData | null = tree.value;
    const node: MutableNode = {
      span: tree.span,
      kind: tree.kind,
      valueType: tree.valueType,
      data,
      index: tree.index,
      external: tree.external,
      next: null,
    };
    if (tree.stringData !== undefined) node.stringData = tree.stringData;
    this.nodes.push(node);

    let previous: number | null = null;
    for (const arg of tree.args) {
      const argIndex = this.emit(arg);
      if (previous === null) node.data = { tag: "node", index: argIndex };
      else this.nodes[previous].next = argIndex;
      previous = argIndex;
    }
    return index;
  }

  /** Frozen snapshot; the arena is not used after this. */
  freeze(): readonly CompiledNode[] {
    return Object.freeze(this.nodes.map(n => Object.freeze({ ...n })));
  }
}
