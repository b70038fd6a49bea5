import type { TreeNode } from '../types/index.js';

export function createTreeNode(name: string, children: TreeNode[] = []): TreeNode {
  return { name, children };
}

export function addChild(parent: TreeNode, child: TreeNode): TreeNode {
  parent.children.push(child);
  return parent;
}

/**
 * Number of nodes in the tree, root included
 */
export function countNodes(node: TreeNode): number {
  return node.children.reduce((total, child) => total + countNodes(child), 1);
}
