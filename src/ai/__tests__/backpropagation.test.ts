/**
 * Backpropagation tests.
 *
 * Uses Node.js built-in test runner (node:test).
 * Run with: node --import tsx --test src/ai/__tests__/backpropagation.test.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import type { PlayerIndex } from '../../engine/types.js';
import type { MnkMove, MnkState } from '../../engine/mnk.js';
import { SearchTree } from '../mcts/tree.js';
import { expand } from '../mcts/expansion.js';
import { meanValue } from '../mcts/node.js';
import { backpropagate } from '../mcts/backpropagation.js';
import { selectChild } from '../mcts/selection.js';
import type { Reward } from '../mcts/rollout.js';
import { assertTreeInvariants, fixedRandom, ttt, type TttNode } from './test-helpers.js';

const X_WINS: Reward<PlayerIndex> = player => (player === 0 ? 1 : -1);
const O_WINS: Reward<PlayerIndex> = player => (player === 1 ? 1 : -1);
const DRAW: Reward<PlayerIndex> = () => 0;

function line(): { tree: SearchTree<MnkState, MnkMove, PlayerIndex>; root: TttNode; child: TttNode; grandchild: TttNode } {
  const tree = new SearchTree<MnkState, MnkMove, PlayerIndex>(ttt);
  const root = tree.createRoot(ttt.initialState());
  const child = expand(tree, root);
  assert.ok(child);
  const grandchild = expand(tree, child);
  assert.ok(grandchild);
  return { tree, root, child, grandchild };
}

describe('backpropagate', () => {
  it('should credit each node with the reward of its own player', () => {
    const { root, child, grandchild } = line();

    backpropagate(grandchild, X_WINS);

    // root and child store X's reward, the O reply stores O's
    assert.equal(root.totalValue, 1);
    assert.equal(child.totalValue, 1);
    assert.equal(grandchild.totalValue, -1);
    assert.deepEqual([root.visitCount, child.visitCount, grandchild.visitCount], [1, 1, 1]);
  });

  it('should count the simulation only where it started', () => {
    const { root, child, grandchild } = line();

    backpropagate(grandchild, DRAW);
    backpropagate(child, O_WINS);

    assert.equal(grandchild.simulationCount, 1);
    assert.equal(child.simulationCount, 1);
    assert.equal(root.simulationCount, 0);
    assert.equal(root.visitCount, 2);
    assert.equal(child.totalValue, -1);
    assert.equal(grandchild.totalValue, 0);
    assertTreeInvariants(ttt, root);
  });

  it('should not touch nodes off the path', () => {
    const { tree, root, child, grandchild } = line();
    const sibling = expand(tree, root);
    assert.ok(sibling);

    backpropagate(grandchild, X_WINS);

    assert.equal(sibling.visitCount, 0);
    assert.equal(sibling.totalValue, 0);
    assert.equal(child.children.size, 1);
  });

  it('should give the same sign to consecutive moves by one player', () => {
    const { root, child, grandchild } = line();
    grandchild.player = 0;

    backpropagate(grandchild, X_WINS);

    assert.deepEqual([root.totalValue, child.totalValue, grandchild.totalValue], [1, 1, 1]);
  });

  it('should steer selection towards the mover\'s wins', () => {
    const tree = new SearchTree<MnkState, MnkMove, PlayerIndex>(ttt);
    const root = tree.createRoot(ttt.initialState());
    const losing = expand(tree, root);
    const drawing = expand(tree, root);
    assert.ok(losing && drawing);

    for (let i = 0; i < 3; i++) {
      backpropagate(losing, O_WINS);
      backpropagate(drawing, DRAW);
    }

    assert.equal(meanValue(losing), -1);
    assert.equal(meanValue(drawing), 0);
    assert.equal(selectChild(root, 0, 'first', fixedRandom(0)), drawing);
  });
});
