import type { TreeHost } from '../../src/core/tree-scope.js';

export interface MemoryNode {
  readonly id: string;
}

/**
 * In-process host tree: nodes with parent links and a log of the update
 * requests the locator made.
 */
export class MemoryTree implements TreeHost<MemoryNode> {
  private readonly parents = new Map<MemoryNode, MemoryNode | null>();
  readonly updates: string[] = [];

  root(id = 'root'): MemoryNode {
    const node = { id };
    this.parents.set(node, null);
    return node;
  }

  child(parent: MemoryNode, id: string): MemoryNode {
    const node = { id };
    this.parents.set(node, parent);
    return node;
  }

  parentOf(node: MemoryNode): MemoryNode | null | undefined {
    return this.parents.get(node);
  }

  scheduleUpdate(node: MemoryNode): void {
    this.updates.push(node.id);
  }

  updatesFor(node: MemoryNode): number {
    return this.updates.filter((id) => id === node.id).length;
  }
}
