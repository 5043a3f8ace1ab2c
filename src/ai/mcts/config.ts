/**
 * Configuration for MCTS search: defaults and validation.
 */

import { ConfigurationError } from '../../engine/errors.js';
import type { StateEvaluator } from '../../engine/types.js';
import { uniformRandomPolicy, type RolloutPolicy } from './rollout.js';
import type { TieBreak } from './selection.js';
import { defaultMoveKey, type MoveKeyFn } from './tree.js';

/**
 * How the final move is picked from the root children.
 * - `most-visited`: robust child; ties by higher mean value, then insertion order
 * - `highest-mean`: max child; ties by more visits, then insertion order
 */
export type FinalMoveSelection = 'most-visited' | 'highest-mean';

/**
 * Compute budget of one search. The search stops as soon as either limit is
 * reached. `maxIterations <= 0` removes the iteration cap, leaving only the
 * time limit.
 */
export interface SearchBudget {
  maxIterations: number;
  maxDurationMs?: number;
}

export interface MCTSConfig<S, M, P> extends SearchBudget {
  explorationConstant: number;            // C in the UCT formula (default: √2)
  rolloutPolicy: RolloutPolicy<S, M>;     // default policy for simulations (default: uniform random)
  randomSeed?: number;                    // seed of the search's random source (default: Date.now())
  finalMoveSelection: FinalMoveSelection; // (default: 'most-visited')
  selectionTieBreak: TieBreak;            // UCT tie-break (default: 'first')
  simulationsPerIteration: number;        // rollouts from each selected leaf (default: 1)
  maxRolloutDepth?: number;               // rollout move cap (default: unbounded)
  evaluate?: StateEvaluator<S, P>;        // scores rollouts cut off by maxRolloutDepth
  moveKey: MoveKeyFn<M>;                  // children-map key of a move (default: JSON.stringify)
  verbose: boolean;                       // log a summary after each search (default: false)
}

export const DEFAULT_MAX_ITERATIONS = 1000;

export function resolveConfig<S, M, P>(config: Partial<MCTSConfig<S, M, P>> = {}): MCTSConfig<S, M, P> {
  const resolved: MCTSConfig<S, M, P> = {
    maxIterations: config.maxIterations ?? DEFAULT_MAX_ITERATIONS,
    maxDurationMs: config.maxDurationMs,
    explorationConstant: config.explorationConstant ?? Math.SQRT2,
    rolloutPolicy: config.rolloutPolicy ?? uniformRandomPolicy,
    randomSeed: config.randomSeed,
    finalMoveSelection: config.finalMoveSelection ?? 'most-visited',
    selectionTieBreak: config.selectionTieBreak ?? 'first',
    simulationsPerIteration: config.simulationsPerIteration ?? 1,
    maxRolloutDepth: config.maxRolloutDepth,
    evaluate: config.evaluate,
    moveKey: config.moveKey ?? defaultMoveKey,
    verbose: config.verbose ?? false,
  };

  validateBudget(resolved);
  if (!Number.isFinite(resolved.explorationConstant) || resolved.explorationConstant < 0) {
    throw new ConfigurationError('explorationConstant', 'must be a finite number >= 0');
  }
  if (!Number.isInteger(resolved.simulationsPerIteration) || resolved.simulationsPerIteration < 1) {
    throw new ConfigurationError('simulationsPerIteration', 'must be an integer >= 1');
  }
  if (
    resolved.maxRolloutDepth !== undefined &&
    (!Number.isInteger(resolved.maxRolloutDepth) || resolved.maxRolloutDepth < 1)
  ) {
    throw new ConfigurationError('maxRolloutDepth', 'must be an integer >= 1');
  }
  if (resolved.randomSeed !== undefined && !Number.isSafeInteger(resolved.randomSeed)) {
    throw new ConfigurationError('randomSeed', 'must be a safe integer');
  }
  return resolved;
}

export function validateBudget(budget: SearchBudget): void {
  if (Number.isNaN(budget.maxIterations)) {
    throw new ConfigurationError('maxIterations', 'must be a number');
  }
  if (budget.maxDurationMs !== undefined && (Number.isNaN(budget.maxDurationMs) || budget.maxDurationMs < 0)) {
    throw new ConfigurationError('maxDurationMs', 'must be >= 0');
  }
  const iterationCapped = budget.maxIterations > 0 && Number.isFinite(budget.maxIterations);
  const timeCapped = budget.maxDurationMs !== undefined && Number.isFinite(budget.maxDurationMs);
  if (!iterationCapped && !timeCapped) {
    throw new ConfigurationError(
      'maxIterations',
      'a non-positive or infinite iteration cap needs a finite maxDurationMs',
    );
  }
}
