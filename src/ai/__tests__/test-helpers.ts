/**
 * Shared test helpers for the search tests.
 * Used by tree.test.ts, mcts.test.ts and root-parallel.test.ts.
 */

import assert from 'node:assert/strict';

import type { Game, PlayerIndex } from '../../engine/types.js';
import { MnkGame, type MnkMove, type MnkState } from '../../engine/mnk.js';
import type { RandomSource } from '../../engine/random.js';
import type { SearchNode } from '../mcts/node.js';
import { defaultMoveKey } from '../mcts/tree.js';

export type TttNode = SearchNode<MnkState, MnkMove, PlayerIndex>;

export const ttt = MnkGame.ticTacToe();

/** X to move, (0,2) wins on the spot. */
export const X_WINS_NOW = ['XX.', 'OO.', '...'];

/** X to move, must block O at (0,2). */
export const X_MUST_BLOCK = ['OO.', 'X..', '..X'];

/** X took the centre; O to move. Edges lose, corners draw. */
export const O_AFTER_CENTRE = ['...', '.X.', '...'];

/** X to move, (2,2) is the only empty cell and nobody has won. */
export const ONE_MOVE_LEFT = ['XOX', 'XOO', 'OX.'];

/** Random source returning a fixed value. */
export function fixedRandom(value: number): RandomSource {
  return { next: () => value };
}

/**
 * Assert the structural invariants of a search tree:
 * - visitCount == Σ children visits + simulations started at the node
 * - an unvisited node has no accumulated value
 * - untried moves and expanded moves partition the legal moves
 * - terminal nodes have neither untried moves nor children
 * - only the root lacks a parent
 */
export function assertTreeInvariants<S, M, P>(
  game: Game<S, M, P>,
  root: SearchNode<S, M, P>,
): void {
  assert.equal(root.parent, null, 'Root should have no parent');

  const stack: SearchNode<S, M, P>[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    let childVisits = 0;
    for (const child of node.children.values()) {
      assert.equal(child.parent, node, 'Child should point back to its parent');
      childVisits += child.visitCount;
      stack.push(child);
    }
    assert.equal(node.visitCount, childVisits + node.simulationCount, 'Visit counts should be conserved');
    if (node.visitCount === 0) {
      assert.equal(node.totalValue, 0, 'Unvisited node should have zero value');
    }

    if (node.isTerminal) {
      assert.equal(node.untriedMoves.length, 0, 'Terminal node should have no untried moves');
      assert.equal(node.children.size, 0, 'Terminal node should have no children');
      continue;
    }

    const legal = game.legalMoves(node.state).map(m => defaultMoveKey(m)).sort();
    const untried = node.untriedMoves.map(m => defaultMoveKey(m));
    const expanded = [...node.children.keys()];
    assert.deepEqual([...untried, ...expanded].sort(), legal, 'Untried + expanded should equal legal moves');
    assert.equal(new Set([...untried, ...expanded]).size, untried.length + expanded.length, 'Sets should be disjoint');
  }
}

/** Move keys from the root down to `node`, joined into one string. */
export function pathKey<S, M, P>(node: SearchNode<S, M, P>): string {
  const keys: string[] = [];
  let current: SearchNode<S, M, P> | null = node;
  while (current && current.move !== null) {
    keys.unshift(defaultMoveKey(current.move));
    current = current.parent;
  }
  return keys.join('/');
}

/**
 * Wraps a game and counts calls to `outcome`.
 */
export function countingGame<S, M, P>(game: Game<S, M, P>): Game<S, M, P> & { outcomeCalls: number } {
  const wrapper = {
    outcomeCalls: 0,
    legalMoves: (state: S) => game.legalMoves(state),
    apply: (state: S, move: M) => game.apply(state, move),
    isTerminal: (state: S) => game.isTerminal(state),
    currentPlayer: (state: S) => game.currentPlayer(state),
    outcome: (state: S, player: P) => {
      wrapper.outcomeCalls++;
      return game.outcome(state, player);
    },
  };
  return wrapper;
}
