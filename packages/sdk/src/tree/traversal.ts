/**
 * Traversal algorithms over index nodes
 *
 * All traversals are iterative generators, so a degenerate (linear-height) tree does
 * not grow the call stack. Each node is yielded exactly once; an absent root yields
 * nothing. Mutating the tree while a traversal is suspended is not supported.
 */

import type { TraversalOrder } from "../types.js";
import type { IndexNode } from "./node.js";

/**
 * Node, then left subtree, then right subtree
 */
export function* preOrder(root: IndexNode | undefined): Generator<IndexNode> {
  if (!root) return;

  const stack: IndexNode[] = [root];
  let node: IndexNode | undefined;
  while ((node = stack.pop())) {
    yield node;
    // Right is pushed first so the left subtree is popped first
    if (node.right) stack.push(node.right);
    if (node.left) stack.push(node.left);
  }
}

/**
 * Left subtree, node, right subtree: ascending key order
 */
export function* inOrder(root: IndexNode | undefined): Generator<IndexNode> {
  const stack: IndexNode[] = [];
  let current = root;

  while (current || stack.length > 0) {
    while (current) {
      stack.push(current);
      current = current.left;
    }
    const node = stack.pop();
    if (!node) break;
    yield node;
    current = node.right;
  }
}

/**
 * Left subtree, right subtree, node: children before parent
 */
export function* postOrder(root: IndexNode | undefined): Generator<IndexNode> {
  const stack: IndexNode[] = [];
  let current = root;
  let lastVisited: IndexNode | undefined;

  while (current || stack.length > 0) {
    if (current) {
      stack.push(current);
      current = current.left;
      continue;
    }

    const top = stack.at(-1);
    if (!top) break;

    if (top.right && lastVisited !== top.right) {
      current = top.right;
    } else {
      yield top;
      lastVisited = stack.pop();
    }
  }
}

/**
 * Level by level, left to right within a level (FIFO queue seeded with the root)
 */
export function* breadthFirst(root: IndexNode | undefined): Generator<IndexNode> {
  if (!root) return;

  const queue: IndexNode[] = [root];
  // Dequeue by advancing a head cursor; the queue is never shifted
  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    if (!node) break;
    yield node;
    if (node.left) queue.push(node.left);
    if (node.right) queue.push(node.right);
  }
}

const TRAVERSALS: Record<TraversalOrder, (root: IndexNode | undefined) => Generator<IndexNode>> = {
  pre: preOrder,
  in: inOrder,
  post: postOrder,
  breadth: breadthFirst,
};

/**
 * Traverse nodes in the given order
 */
export function traverseNodes(
  root: IndexNode | undefined,
  order: TraversalOrder
): Generator<IndexNode> {
  return TRAVERSALS[order](root);
}
