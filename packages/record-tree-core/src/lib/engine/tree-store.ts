import { DEFAULT_TREE_CONFIG } from '../types/tree-config';
import {
  type ChildTreeNode,
  LOAD_STATES,
  type ParentTreeNode,
  type RootTreeNode,
  TREE_NODE_KINDS,
  type TreeId,
  type TreeNode,
  type TreeRowViewModel,
  isParentNode,
  nodeKey,
} from '../types/tree-node';
import { getDescendants, getRootOf } from '../utils/tree-utils';
import {
  type LoadStateMap,
  beginLoadState,
  clearLoadState,
  completeLoadState,
  failLoadState,
  getLoadState,
} from './loading';
import { createRootNode } from './node-factory';

export interface TreeStoreStats {
  parents: number;
  children: number;
  loading: number;
}

/**
 * In-memory node graph under a single root. Every structural change goes
 * through replaceChildren, which is synchronous and all-or-nothing.
 */
export class TreeStore {
  readonly root: RootTreeNode;

  private readonly index = new Map<string, TreeNode>();
  private readonly loadStates: LoadStateMap = new Map();

  constructor(rootLabel = DEFAULT_TREE_CONFIG.labels.root) {
    this.root = createRootNode(rootLabel);
    this.index.set(nodeKey(this.root), this.root);
  }

  get parents(): ParentTreeNode[] {
    return this.root.children.filter(isParentNode);
  }

  get stats(): TreeStoreStats {
    const parents = this.parents;
    return {
      parents: parents.length,
      children: parents.reduce(
        (total, parent) =>
          total + parent.children.filter((child) => child.kind === TREE_NODE_KINDS.CHILD).length,
        0,
      ),
      loading: parents.filter((parent) => this.getLoadState(parent.id) === LOAD_STATES.LOADING)
        .length,
    };
  }

  getNode(kind: TREE_NODE_KINDS, id: TreeId): TreeNode | undefined {
    return this.index.get(nodeKey({ kind, id }));
  }

  getParentNode(id: TreeId): ParentTreeNode | undefined {
    const node = this.getNode(TREE_NODE_KINDS.PARENT, id);
    return isParentNode(node) ? node : undefined;
  }

  getChildNode(id: TreeId): ChildTreeNode | undefined {
    const node = this.getNode(TREE_NODE_KINDS.CHILD, id);
    return node?.kind === TREE_NODE_KINDS.CHILD ? node : undefined;
  }

  /** True while the node is reachable from this store's root. */
  isAttached(node: TreeNode): boolean {
    return getRootOf(node) === this.root && this.index.get(nodeKey(node)) === node;
  }

  /**
   * Key of the first node in `newChildren` (or below) that would duplicate an
   * indexed node outside the subtree being replaced, or another incoming node.
   */
  findDuplicate(node: TreeNode, newChildren: readonly TreeNode[]): string | undefined {
    const removed = this.subtreeOf(node);
    const incomingKeys = new Set<string>();
    for (const child of newChildren) {
      for (const candidate of [child, ...getDescendants(child)]) {
        const key = nodeKey(candidate);
        const existing = this.index.get(key);
        if (incomingKeys.has(key) || (existing && !removed.has(existing))) {
          return key;
        }
        incomingKeys.add(key);
      }
    }
    return undefined;
  }

  /**
   * Swaps the children of `node` in one step. Prior children and their
   * descendants are detached and unindexed; parents among them lose their
   * load state. Throws without touching the graph when the new set would
   * duplicate an id of the same kind.
   */
  replaceChildren(node: TreeNode, newChildren: readonly TreeNode[]): void {
    if (
      newChildren.length > 0 &&
      node.kind !== TREE_NODE_KINDS.ROOT &&
      node.kind !== TREE_NODE_KINDS.PARENT
    ) {
      throw new Error(`Node ${nodeKey(node)} cannot have children`);
    }

    const duplicate = this.findDuplicate(node, newChildren);
    if (duplicate !== undefined) {
      throw new Error(`Duplicate tree node ${duplicate}`);
    }

    const removed = this.subtreeOf(node);
    for (const child of removed) {
      this.index.delete(nodeKey(child));
      if (child.kind === TREE_NODE_KINDS.PARENT) {
        clearLoadState(this.loadStates, child.id);
      }
    }
    for (const child of node.children) {
      child.parent = null;
    }

    node.children = [...newChildren];
    for (const child of node.children) {
      child.parent = node;
      this.indexSubtree(child);
    }
  }

  /** Nearest ancestor of kind parent, or the node itself when it is one. */
  findContainingParent(node: TreeNode | null | undefined): ParentTreeNode | undefined {
    let current: TreeNode | null = node ?? null;
    while (current) {
      if (isParentNode(current)) {
        return current;
      }
      current = current.parent;
    }
    return undefined;
  }

  getLoadState(parentId: TreeId): LOAD_STATES {
    return getLoadState(this.loadStates, parentId);
  }

  beginLoad(parentId: TreeId): boolean {
    return beginLoadState(this.loadStates, parentId);
  }

  completeLoad(parentId: TreeId): void {
    completeLoadState(this.loadStates, parentId);
  }

  failLoad(parentId: TreeId): void {
    failLoadState(this.loadStates, parentId);
  }

  /** Every parent goes back to unloaded. */
  resetLoadStates(): void {
    this.loadStates.clear();
  }

  /** Depth-first visible rows below the root; only expanded parents contribute children. */
  flatten(expandedKeys: ReadonlySet<string>): TreeRowViewModel[] {
    const rows: TreeRowViewModel[] = [];

    const visit = (node: TreeNode, level: number): void => {
      const key = nodeKey(node);
      const expanded = node.kind === TREE_NODE_KINDS.PARENT && expandedKeys.has(key);
      rows.push({
        key,
        id: node.id,
        label: node.label,
        kind: node.kind,
        level,
        expanded,
        loading:
          node.kind === TREE_NODE_KINDS.PARENT &&
          this.getLoadState(node.id) === LOAD_STATES.LOADING,
        error: node.kind === TREE_NODE_KINDS.ERROR,
        node,
      });

      if (expanded) {
        for (const child of node.children) {
          visit(child, level + 1);
        }
      }
    };

    for (const child of this.root.children) {
      visit(child, 0);
    }

    return rows;
  }

  /** Every node below `node`, excluding `node` itself. */
  private subtreeOf(node: TreeNode): Set<TreeNode> {
    const nodes = new Set<TreeNode>();
    for (const child of node.children) {
      nodes.add(child);
      for (const descendant of getDescendants(child)) {
        nodes.add(descendant);
      }
    }
    return nodes;
  }

  private indexSubtree(node: TreeNode): void {
    this.index.set(nodeKey(node), node);
    for (const child of node.children) {
      child.parent = node;
      this.indexSubtree(child);
    }
  }
}
