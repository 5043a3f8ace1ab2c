/**
 * Root-parallel search tests.
 *
 * Uses Node.js built-in test runner (node:test).
 * Run with: node --import tsx --test src/ai/__tests__/root-parallel.test.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import type { MnkMove, MnkState } from '../../engine/mnk.js';
import { ConfigurationError, InvalidMoveError, NoIterationsError } from '../../engine/errors.js';
import { MonteCarloTreeSearch } from '../mcts/mcts.js';
import { rootParallelSearch } from '../mcts/root-parallel.js';
import type { RolloutPolicy } from '../mcts/rollout.js';
import { ONE_MOVE_LEFT, X_WINS_NOW, ttt } from './test-helpers.js';

describe('rootParallelSearch', () => {
  it('should sum iterations and visits over all trees', async () => {
    const result = await rootParallelSearch(
      ttt,
      ttt.initialState(),
      { maxIterations: 100, randomSeed: 1 },
      { trees: 3 },
    );

    assert.equal(result.trees, 3);
    assert.equal(result.iterations, 300);
    const visits = result.childStats.reduce((sum, stat) => sum + stat.visitCount, 0);
    assert.equal(visits, 300);
    assert.equal(result.childStats.length, 9);
  });

  it('should merge per-tree statistics by move', async () => {
    const config = { maxIterations: 80, randomSeed: 10 };
    const result = await rootParallelSearch(ttt, ttt.initialState(), config, { trees: 2 });

    // Tree i runs with seed base + i
    const single = [10, 11].map(seed =>
      new MonteCarloTreeSearch(ttt, { ...config, randomSeed: seed }).start(ttt.initialState()),
    );
    for (const stat of result.childStats) {
      const expected = single.reduce(
        (sum, search) => sum + (search.root?.children.get(stat.moveKey)?.visitCount ?? 0),
        0,
      );
      assert.equal(stat.visitCount, expected, `Visits of ${stat.moveKey}`);
    }
  });

  it('should sort merged statistics by visits', async () => {
    const result = await rootParallelSearch(ttt, ttt.initialState(), { maxIterations: 150, randomSeed: 3 });
    for (let i = 1; i < result.childStats.length; i++) {
      assert.ok(result.childStats[i - 1].visitCount >= result.childStats[i].visitCount);
    }
  });

  it('should be reproducible for a fixed seed', async () => {
    const run = () =>
      rootParallelSearch(ttt, ttt.initialState(), { maxIterations: 100, randomSeed: 42 }, { trees: 2 });
    const [a, b] = await Promise.all([run(), run()]);
    assert.deepEqual(a.childStats, b.childStats);
    assert.deepEqual(a.bestMove, b.bestMove);
  });

  it('should find an immediate win', async () => {
    const result = await rootParallelSearch(ttt, ttt.fromRows(X_WINS_NOW), { maxIterations: 300, randomSeed: 1 });
    assert.deepEqual(result.bestMove, { row: 0, col: 2 });
  });

  it('should answer a forced move from a zero budget', async () => {
    const result = await rootParallelSearch(
      ttt,
      ttt.fromRows(ONE_MOVE_LEFT),
      { maxIterations: 0, maxDurationMs: 0, randomSeed: 1 },
      { trees: 2 },
    );
    assert.equal(result.iterations, 0);
    assert.deepEqual(result.bestMove, { row: 2, col: 2 });
  });

  it('should fail on a terminal position', async () => {
    await assert.rejects(
      rootParallelSearch(ttt, ttt.fromRows(['XXX', 'OO.', '...']), { maxIterations: 10, randomSeed: 1 }),
      NoIterationsError,
    );
  });

  it('should reject a bad tree count', async () => {
    await assert.rejects(rootParallelSearch(ttt, ttt.initialState(), {}, { trees: 0 }), ConfigurationError);
    await assert.rejects(rootParallelSearch(ttt, ttt.initialState(), {}, { trees: 1.5 }), ConfigurationError);
  });

  it('should pass on an error from any tree', async () => {
    const illegal: RolloutPolicy<MnkState, MnkMove> = () => ({ row: -1, col: 0 });
    await assert.rejects(
      rootParallelSearch(ttt, ttt.initialState(), { maxIterations: 10, randomSeed: 1, rolloutPolicy: illegal }),
      InvalidMoveError,
    );
  });
});
