/**
 * Root-parallel MCTS.
 *
 * Runs several independent searches of the same position, each with its own
 * tree and random stream, and merges their root statistics once all of them
 * have finished. The searches interleave on the event loop through
 * `startAsync`; they share no mutable state, so nothing needs locking.
 */

import type { Game } from '../../engine/types.js';
import { ConfigurationError, NoIterationsError } from '../../engine/errors.js';
import type { MCTSConfig } from './config.js';
import { MonteCarloTreeSearch, pickFinalCandidate, type ChildStat } from './mcts.js';

export interface RootParallelOptions {
  /** Number of independent trees (default: 4) */
  trees?: number;
  /** Iterations between event-loop yields in each tree (default: 50) */
  yieldInterval?: number;
}

export interface RootParallelResult<M> {
  bestMove: M;
  /** Merged root statistics, most visited first */
  childStats: ChildStat<M>[];
  /** Iterations summed over all trees */
  iterations: number;
  trees: number;
}

interface MergedChild<M> {
  move: M;
  visitCount: number;
  totalValue: number;
}

export async function rootParallelSearch<S, M, P>(
  game: Game<S, M, P>,
  state: S,
  config: Partial<MCTSConfig<S, M, P>> = {},
  options: RootParallelOptions = {},
): Promise<RootParallelResult<M>> {
  const trees = options.trees ?? 4;
  if (!Number.isInteger(trees) || trees < 1) {
    throw new ConfigurationError('trees', 'must be an integer >= 1');
  }

  // Tree i uses seed base + i so the whole ensemble is reproducible
  const baseSeed = config.randomSeed ?? Date.now();
  const searches = Array.from(
    { length: trees },
    (_, i) => new MonteCarloTreeSearch(game, { ...config, randomSeed: baseSeed + i }),
  );

  const settled = await Promise.allSettled(
    searches.map(search => search.startAsync(state, { yieldInterval: options.yieldInterval })),
  );
  for (const result of settled) {
    if (result.status === 'rejected') throw result.reason;
  }

  const merged = new Map<string, MergedChild<M>>();
  let iterations = 0;
  let rootVisits = 0;
  for (const search of searches) {
    iterations += search.iterations;
    const root = search.root;
    if (!root) continue;
    rootVisits += root.visitCount;
    for (const [key, child] of root.children) {
      if (child.move === null) continue;
      const entry = merged.get(key) ?? { move: child.move, visitCount: 0, totalValue: 0 };
      entry.visitCount += child.visitCount;
      entry.totalValue += child.totalValue;
      merged.set(key, entry);
    }
  }

  const entries = [...merged.entries()];
  const childStats: ChildStat<M>[] = entries.map(([moveKey, entry]) => ({
    move: entry.move,
    moveKey,
    visitCount: entry.visitCount,
    meanValue: entry.visitCount > 0 ? entry.totalValue / entry.visitCount : 0,
    probability: rootVisits > 0 ? entry.visitCount / rootVisits : 0,
  }));

  const finalMoveSelection = config.finalMoveSelection ?? 'most-visited';
  const bestIndex = pickFinalCandidate(childStats, finalMoveSelection);
  let bestMove: M;
  if (bestIndex >= 0) {
    bestMove = childStats[bestIndex].move;
  } else {
    const legalMoves = game.isTerminal(state) ? [] : game.legalMoves(state);
    if (legalMoves.length !== 1) {
      throw new NoIterationsError('No tree completed an iteration');
    }
    bestMove = legalMoves[0];
  }

  childStats.sort((a, b) => b.visitCount - a.visitCount);
  return { bestMove, childStats, iterations, trees };
}
