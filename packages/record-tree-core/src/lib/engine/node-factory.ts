import type { ChildResource, ParentResource } from '../types/resources';
import { DEFAULT_TREE_CONFIG, type TreeConfig } from '../types/tree-config';
import {
  type ChildTreeNode,
  type LeafNodeKind,
  type LeafTreeNode,
  type ParentTreeNode,
  type RootTreeNode,
  TREE_NODE_KINDS,
  type TreeId,
} from '../types/tree-node';
import { describeChild } from './labels';

export const ROOT_NODE_ID = '__tree_root__';

export function placeholderId(parentId: TreeId): TreeId {
  return `__tree_placeholder__${parentId}`;
}

export function infoLeafId(parentId: TreeId): TreeId {
  return `__tree_info__${parentId}`;
}

export function errorLeafId(parentId: TreeId): TreeId {
  return `__tree_error__${parentId}`;
}

export function createRootNode(label = DEFAULT_TREE_CONFIG.labels.root): RootTreeNode {
  return {
    id: ROOT_NODE_ID,
    label,
    kind: TREE_NODE_KINDS.ROOT,
    children: [],
    parent: null,
  };
}

function createLeaf(kind: LeafNodeKind, id: TreeId, label: string): LeafTreeNode {
  return {
    id,
    label,
    kind,
    children: [],
    parent: null,
  };
}

export function createPlaceholderLeaf(
  parentId: TreeId,
  label = DEFAULT_TREE_CONFIG.labels.placeholder,
): LeafTreeNode {
  return createLeaf(TREE_NODE_KINDS.PLACEHOLDER, placeholderId(parentId), label);
}

export function createInfoLeaf(
  parentId: TreeId,
  label = DEFAULT_TREE_CONFIG.labels.empty,
): LeafTreeNode {
  return createLeaf(TREE_NODE_KINDS.INFO, infoLeafId(parentId), label);
}

export function createErrorLeaf(parentId: TreeId, message: string): LeafTreeNode {
  return createLeaf(TREE_NODE_KINDS.ERROR, errorLeafId(parentId), message);
}

/** Parent nodes start out unloaded with a single placeholder child. */
export function createParentNode(
  resource: ParentResource,
  config: TreeConfig = DEFAULT_TREE_CONFIG,
): ParentTreeNode {
  const node: ParentTreeNode = {
    id: resource.id,
    label: resource.name,
    kind: TREE_NODE_KINDS.PARENT,
    children: [],
    parent: null,
    payload: { kind: TREE_NODE_KINDS.PARENT, resource },
  };

  const placeholder = createPlaceholderLeaf(resource.id, config.labels.placeholder);
  placeholder.parent = node;
  node.children.push(placeholder);
  return node;
}

export function createChildNode(
  resource: ChildResource,
  config: TreeConfig = DEFAULT_TREE_CONFIG,
): ChildTreeNode {
  return {
    id: resource.id,
    label: describeChild(resource, config.routableTypes),
    kind: TREE_NODE_KINDS.CHILD,
    children: [],
    parent: null,
    payload: { kind: TREE_NODE_KINDS.CHILD, resource },
  };
}

export function mapParentsToNodes(
  resources: readonly ParentResource[],
  config: TreeConfig = DEFAULT_TREE_CONFIG,
): ParentTreeNode[] {
  return resources.map((resource) => createParentNode(resource, config));
}

/** An empty list maps to the single informational leaf. */
export function mapChildrenToNodes(
  parentId: TreeId,
  resources: readonly ChildResource[],
  config: TreeConfig = DEFAULT_TREE_CONFIG,
): Array<ChildTreeNode | LeafTreeNode> {
  if (resources.length === 0) {
    return [createInfoLeaf(parentId, config.labels.empty)];
  }

  return resources.map((resource) => createChildNode(resource, config));
}
