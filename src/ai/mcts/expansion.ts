/**
 * Expansion step: materialize one previously untried child.
 */

import type { SearchNode } from './node.js';
import type { SearchTree } from './tree.js';

/**
 * Expand the first untried move of `node` and return the new child.
 *
 * Returns null when expansion does not apply: the node is terminal or every
 * legal move already has a child.
 */
export function expand<S, M, P>(
  tree: SearchTree<S, M, P>,
  node: SearchNode<S, M, P>,
): SearchNode<S, M, P> | null {
  if (node.isTerminal || node.untriedMoves.length === 0) {
    return null;
  }
  const move = node.untriedMoves[0];
  const child = tree.addChild(node, move);
  // Shift only after apply succeeded; a throwing game leaves untriedMoves as it was
  node.untriedMoves.shift();
  return child;
}
