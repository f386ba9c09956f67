/**
 * Index-based tree storage. Nodes live in one array and refer to each
 * other by id, so parent and sibling links never form owning cycles.
 */

export type ArenaNodeId = number;

interface ArenaEntry<T> {
  data: T;
  parent?: ArenaNodeId;
  firstChild?: ArenaNodeId;
  lastChild?: ArenaNodeId;
  previousSibling?: ArenaNodeId;
  nextSibling?: ArenaNodeId;
}

export type AppendFailure = "missingNode" | "sameNode" | "alreadyHasParent" | "wouldCycle";

export type AppendResult = { ok: true } | { ok: false; reason: AppendFailure };

export class Arena<T> {
  private readonly entries: ArenaEntry<T>[] = [];

  get size(): number {
    return this.entries.length;
  }

  newNode(data: T): ArenaNodeId {
    this.entries.push({ data });
    return this.entries.length - 1;
  }

  has(id: ArenaNodeId): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.entries.length;
  }

  get(id: ArenaNodeId): T | undefined {
    return this.has(id) ? this.entries[id].data : undefined;
  }

  parent(id: ArenaNodeId): ArenaNodeId | undefined {
    return this.has(id) ? this.entries[id].parent : undefined;
  }

  firstChild(id: ArenaNodeId): ArenaNodeId | undefined {
    return this.has(id) ? this.entries[id].firstChild : undefined;
  }

  lastChild(id: ArenaNodeId): ArenaNodeId | undefined {
    return this.has(id) ? this.entries[id].lastChild : undefined;
  }

  previousSibling(id: ArenaNodeId): ArenaNodeId | undefined {
    return this.has(id) ? this.entries[id].previousSibling : undefined;
  }

  nextSibling(id: ArenaNodeId): ArenaNodeId | undefined {
    return this.has(id) ? this.entries[id].nextSibling : undefined;
  }

  /**
   * Make `child` the last child of `parent`.
   *
   * Refuses a child that already has a parent, and a child that is
   * `parent` itself or one of its ancestors.
   */
  append(parent: ArenaNodeId, child: ArenaNodeId): AppendResult {
    if (!this.has(parent) || !this.has(child)) {
      return { ok: false, reason: "missingNode" };
    }
    if (parent === child) {
      return { ok: false, reason: "sameNode" };
    }
    const childEntry = this.entries[child];
    if (childEntry.parent !== undefined) {
      return { ok: false, reason: "alreadyHasParent" };
    }
    for (const ancestor of this.ancestors(parent)) {
      if (ancestor === child) {
        return { ok: false, reason: "wouldCycle" };
      }
    }

    const parentEntry = this.entries[parent];
    childEntry.parent = parent;
    if (parentEntry.lastChild === undefined) {
      parentEntry.firstChild = child;
    } else {
      this.entries[parentEntry.lastChild].nextSibling = child;
      childEntry.previousSibling = parentEntry.lastChild;
    }
    parentEntry.lastChild = child;
    return { ok: true };
  }

  *children(id: ArenaNodeId): IterableIterator<ArenaNodeId> {
    let current = this.firstChild(id);
    while (current !== undefined) {
      yield current;
      current = this.entries[current].nextSibling;
    }
  }

  /** `id` itself, then each parent up to the root */
  *ancestors(id: ArenaNodeId): IterableIterator<ArenaNodeId> {
    let current: ArenaNodeId | undefined = this.has(id) ? id : undefined;
    while (current !== undefined) {
      yield current;
      current = this.entries[current].parent;
    }
  }

  /** `id` itself, then its subtree in pre-order */
  *descendants(id: ArenaNodeId): IterableIterator<ArenaNodeId> {
    if (!this.has(id)) {
      return;
    }
    const stack: ArenaNodeId[] = [id];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      yield current;
      const children = [...this.children(current)];
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(children[i]);
      }
    }
  }
}
