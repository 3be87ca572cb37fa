import type { ChildResource, ParentResource } from './resources';

export type TreeId = string;

export enum TREE_NODE_KINDS {
  ROOT = 'root',
  PARENT = 'parent',
  CHILD = 'child',
  PLACEHOLDER = 'placeholder',
  INFO = 'info',
  ERROR = 'error',
}

export type LeafNodeKind =
  | TREE_NODE_KINDS.PLACEHOLDER
  | TREE_NODE_KINDS.INFO
  | TREE_NODE_KINDS.ERROR;

export type TreeNodePayload =
  | { kind: TREE_NODE_KINDS.PARENT; resource: ParentResource }
  | { kind: TREE_NODE_KINDS.CHILD; resource: ChildResource };

interface TreeNodeBase {
  id: TreeId;
  label: string;
  /** Ordered children; always empty for leaves and child records. */
  children: TreeNode[];
  /** Non-owning back-reference, `null` for the root and for detached nodes. */
  parent: TreeNode | null;
}

export interface RootTreeNode extends TreeNodeBase {
  kind: TREE_NODE_KINDS.ROOT;
  payload?: undefined;
}

export interface ParentTreeNode extends TreeNodeBase {
  kind: TREE_NODE_KINDS.PARENT;
  payload: Extract<TreeNodePayload, { kind: TREE_NODE_KINDS.PARENT }>;
}

export interface ChildTreeNode extends TreeNodeBase {
  kind: TREE_NODE_KINDS.CHILD;
  payload: Extract<TreeNodePayload, { kind: TREE_NODE_KINDS.CHILD }>;
}

export interface LeafTreeNode extends TreeNodeBase {
  kind: LeafNodeKind;
  payload?: undefined;
}

export type TreeNode = RootTreeNode | ParentTreeNode | ChildTreeNode | LeafTreeNode;

export enum LOAD_STATES {
  UNLOADED = 'unloaded',
  LOADING = 'loading',
  LOADED = 'loaded',
  FAILED = 'failed',
}

/** Flattened row handed to renderers. */
export interface TreeRowViewModel {
  key: string;
  id: TreeId;
  label: string;
  kind: TREE_NODE_KINDS;
  level: number;
  expanded: boolean;
  loading: boolean;
  error: boolean;
  node: TreeNode;
}

export function isParentNode(node: TreeNode | null | undefined): node is ParentTreeNode {
  return node?.kind === TREE_NODE_KINDS.PARENT;
}

export function isChildNode(node: TreeNode | null | undefined): node is ChildTreeNode {
  return node?.kind === TREE_NODE_KINDS.CHILD;
}

/** Ids are unique per kind, so the index key carries both. */
export function nodeKey(node: Pick<TreeNode, 'kind' | 'id'>): string {
  return `${node.kind}:${node.id}`;
}
