/**
 * Search tree node.
 *
 * A node stands for one game state reached from the search root. It owns its
 * children; the `parent` reference is only walked upwards during
 * backpropagation and never used for ownership.
 */

import type { Game } from '../../engine/types.js';

export interface SearchNode<S, M, P> {
  state: S;
  parent: SearchNode<S, M, P> | null;   // null for the root
  move: M | null;                       // move that led here from parent
  player: P;                            // whose reward totalValue accumulates
  children: Map<string, SearchNode<S, M, P>>;  // move key -> child node
  visitCount: number;                   // simulations that passed through this node
  totalValue: number;                   // sum of rewards for `player`
  untriedMoves: M[];                    // legal moves not expanded yet, in legal order
  isTerminal: boolean;
  simulationCount: number;              // simulations that started at this node
  depth: number;                        // distance from the current root
}

/**
 * Create a node for `state`.
 *
 * `player` is the mover into the node (the parent's player to move); the
 * root accumulates values for its own player to move.
 */
export function createNode<S, M, P>(
  game: Game<S, M, P>,
  state: S,
  parent: SearchNode<S, M, P> | null,
  move: M | null,
  player: P,
): SearchNode<S, M, P> {
  const legalMoves = game.isTerminal(state) ? [] : game.legalMoves(state);
  return {
    state,
    parent,
    move,
    player,
    children: new Map(),
    visitCount: 0,
    totalValue: 0,
    untriedMoves: [...legalMoves],
    // A state without legal moves cannot be searched further
    isTerminal: legalMoves.length === 0,
    simulationCount: 0,
    depth: parent ? parent.depth + 1 : 0,
  };
}

/** Q(s,a) = totalValue / visitCount, 0 for unvisited nodes. */
export function meanValue<S, M, P>(node: SearchNode<S, M, P>): number {
  return node.visitCount > 0 ? node.totalValue / node.visitCount : 0;
}

/** True once every legal move has a child. */
export function isFullyExpanded<S, M, P>(node: SearchNode<S, M, P>): boolean {
  return node.untriedMoves.length === 0;
}
