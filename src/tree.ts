/**
 * Node identity. Allocated per tree, increasing, never reused.
 */
export type NodeId = number;

export interface TreeEntry<T> {
  id: NodeId;
  data: T;
}

/**
 * Append-only tree. Node payloads live in one map keyed by id; structure lives in
 * separate parent and child indexes, so nodes never point at each other.
 */
export class ArenaTree<T> {
  private readonly nodes = new Map<NodeId, T>();
  private readonly parents = new Map<NodeId, NodeId>();
  private readonly children = new Map<NodeId, NodeId[]>();
  private readonly roots: NodeId[] = [];
  private nextId = 0;

  get size(): number {
    return this.nodes.size;
  }

  private allocate(data: T): NodeId {
    const id = this.nextId;
    this.nextId += 1;
    this.nodes.set(id, data);
    return id;
  }

  /**
   * Add a root-level node.
   */
  push(data: T): NodeId {
    const id = this.allocate(data);
    this.roots.push(id);
    return id;
  }

  /**
   * Add a node as the last child of `parent`. Throws if `parent` is not in this tree.
   */
  pushWithParent(data: T, parent: NodeId): NodeId {
    if (!this.nodes.has(parent)) {
      throw new Error(`Parent node ${parent} does not exist in this tree`);
    }
    const id = this.allocate(data);
    this.parents.set(id, parent);
    const siblings = this.children.get(parent);
    if (siblings) {
      siblings.push(id);
    } else {
      this.children.set(parent, [id]);
    }
    return id;
  }

  has(id: NodeId): boolean {
    return this.nodes.has(id);
  }

  getById(id: NodeId): T | undefined {
    return this.nodes.get(id);
  }

  /** The first root, in insertion order */
  first(): NodeId | undefined {
    return this.roots[0];
  }

  childrenOf(id: NodeId): readonly NodeId[] {
    return this.children.get(id) ?? [];
  }

  parentOf(id: NodeId): NodeId | undefined {
    return this.parents.get(id);
  }

  /** Siblings of `id` in insertion order; roots are siblings of each other */
  private siblingsOf(id: NodeId): readonly NodeId[] {
    const parent = this.parents.get(id);
    return parent === undefined ? this.roots : this.childrenOf(parent);
  }

  nextSiblingOf(id: NodeId): NodeId | undefined {
    const siblings = this.siblingsOf(id);
    const index = siblings.indexOf(id);
    return index === -1 ? undefined : siblings[index + 1];
  }

  previousSiblingOf(id: NodeId): NodeId | undefined {
    const siblings = this.siblingsOf(id);
    const index = siblings.indexOf(id);
    return index <= 0 ? undefined : siblings[index - 1];
  }

  /**
   * Document-order successor that skips over children: the next sibling, or else the
   * next sibling of the nearest ancestor that has one.
   */
  next(id: NodeId): NodeId | undefined {
    let current: NodeId | undefined = id;
    while (current !== undefined) {
      const sibling = this.nextSiblingOf(current);
      if (sibling !== undefined) {
        return sibling;
      }
      current = this.parents.get(current);
    }
    return undefined;
  }

  /**
   * First node (in insertion order) whose payload matches. Linear scan.
   */
  findBy(predicate: (data: T) => boolean): TreeEntry<T> | undefined {
    for (const [id, data] of this.nodes) {
      if (predicate(data)) {
        return { id, data };
      }
    }
    return undefined;
  }

  *entries(): IterableIterator<TreeEntry<T>> {
    for (const [id, data] of this.nodes) {
      yield { id, data };
    }
  }
}
