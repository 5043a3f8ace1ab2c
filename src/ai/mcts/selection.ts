/**
 * Selection step: UCT (Upper Confidence bounds applied to Trees).
 *
 * UCT formula: Q(c) + C * sqrt(ln(N) / n(c))
 * where:
 *   Q(c) = mean reward stored at child c, i.e. for the player who moved into c,
 *          which is the player choosing at the parent
 *   N    = visit count of the parent
 *   n(c) = visit count of child c
 *   C    = exploration constant
 *
 * Because every child stores the reward of the player choosing at its
 * parent, maximizing at each level yields minimax-consistent play.
 */

import type { RandomSource } from '../../engine/random.js';
import { meanValue, type SearchNode } from './node.js';

export type TieBreak = 'first' | 'random';

export function uctScore<S, M, P>(
  child: SearchNode<S, M, P>,
  parentVisits: number,
  explorationConstant: number,
): number {
  if (child.visitCount === 0) return Infinity;
  const exploitation = meanValue(child);
  const exploration =
    explorationConstant * Math.sqrt(Math.log(parentVisits) / child.visitCount);
  return exploitation + exploration;
}

/**
 * Pick the child with the highest UCT score.
 *
 * With `tieBreak: 'first'` the earliest child in insertion order wins ties;
 * with `'random'` a tied child is drawn uniformly from `random`.
 */
export function selectChild<S, M, P>(
  node: SearchNode<S, M, P>,
  explorationConstant: number,
  tieBreak: TieBreak,
  random: RandomSource,
): SearchNode<S, M, P> {
  let bestScore = -Infinity;
  let best: SearchNode<S, M, P>[] = [];

  for (const child of node.children.values()) {
    const score = uctScore(child, node.visitCount, explorationConstant);
    if (score > bestScore) {
      bestScore = score;
      best = [child];
    } else if (score === bestScore) {
      best.push(child);
    }
  }

  if (best.length === 0) {
    throw new Error('selectChild called on a node without children');
  }
  if (tieBreak === 'random' && best.length > 1) {
    return best[Math.floor(random.next() * best.length)];
  }
  return best[0];
}

/**
 * Descend from `root` while the current node is fully expanded and not
 * terminal. Returns the node to expand or to score exactly.
 */
export function descend<S, M, P>(
  root: SearchNode<S, M, P>,
  explorationConstant: number,
  tieBreak: TieBreak,
  random: RandomSource,
): SearchNode<S, M, P> {
  let node = root;
  while (!node.isTerminal && node.untriedMoves.length === 0) {
    node = selectChild(node, explorationConstant, tieBreak, random);
  }
  return node;
}
