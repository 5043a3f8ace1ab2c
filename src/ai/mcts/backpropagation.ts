/**
 * Backpropagation step.
 *
 * Walks from the node where the simulation started up to the root and
 * credits each node with the reward of the player stored on it. In a
 * zero-sum game with alternating turns this is the usual sign flip per ply;
 * asking the reward function per player also covers games where someone
 * moves twice in a row.
 */

import type { SearchNode } from './node.js';
import type { Reward } from './rollout.js';

export function backpropagate<S, M, P>(leaf: SearchNode<S, M, P>, reward: Reward<P>): void {
  leaf.simulationCount++;
  let node: SearchNode<S, M, P> | null = leaf;
  while (node) {
    node.visitCount++;
    node.totalValue += reward(node.player);
    node = node.parent;
  }
}
