import type { TreeNode } from '../types/tree-node';

export function getDescendants(node: TreeNode): TreeNode[] {
  const descendants: TreeNode[] = [];
  const queue = [...node.children];

  while (queue.length > 0) {
    const current = queue.shift();
    if (!current) {
      continue;
    }
    descendants.push(current);
    queue.push(...current.children);
  }

  return descendants;
}

export function getRootOf(node: TreeNode): TreeNode {
  let current = node;
  while (current.parent) {
    current = current.parent;
  }
  return current;
}
