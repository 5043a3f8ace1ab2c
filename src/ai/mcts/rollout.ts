/**
 * Simulation (rollout) step.
 *
 * Plays a game from a leaf state to the end with a default policy and reports
 * the result as a reward function over players. Rollouts never touch the
 * tree; the only side effect is consuming numbers from the random source.
 */

import type { Game, StateEvaluator } from '../../engine/types.js';
import { pickRandom, type RandomSource } from '../../engine/random.js';

/**
 * Chooses the next move of a rollout. `moves` is never empty.
 */
export type RolloutPolicy<S, M> = (state: S, moves: readonly M[], random: RandomSource) => M;

/** Reward of a finished simulation for a given player. */
export type Reward<P> = (player: P) => number;

export interface RolloutOptions<S, P> {
  /** Stop after this many moves and score the state with `evaluate` (default: unbounded) */
  maxDepth?: number;
  /** Scores a cut-off state; 0 for every player when absent */
  evaluate?: StateEvaluator<S, P>;
}

/** Uniformly random choice among the legal moves. */
export function uniformRandomPolicy<S, M>(_state: S, moves: readonly M[], random: RandomSource): M {
  return pickRandom(moves, random);
}

/**
 * Heuristic policy: play a move that wins on the spot when there is one,
 * otherwise fall back to `fallback`.
 */
export function createDecisiveMovePolicy<S, M, P>(
  game: Game<S, M, P>,
  fallback: RolloutPolicy<S, M> = uniformRandomPolicy,
): RolloutPolicy<S, M> {
  return (state, moves, random) => {
    const mover = game.currentPlayer(state);
    for (const move of moves) {
      const next = game.apply(state, move);
      if (game.isTerminal(next) && game.outcome(next, mover) > 0) {
        return move;
      }
    }
    return fallback(state, moves, random);
  };
}

/**
 * Exact reward of a terminal state. Outcomes are cached per player.
 */
export function terminalReward<S, M, P>(game: Game<S, M, P>, state: S): Reward<P> {
  const cache = new Map<P, number>();
  return (player) => {
    let value = cache.get(player);
    if (value === undefined) {
      value = game.outcome(state, player);
      cache.set(player, value);
    }
    return value;
  };
}

/**
 * Play from `state` until the game ends (or the depth cap is hit).
 */
export function rollout<S, M, P>(
  game: Game<S, M, P>,
  state: S,
  policy: RolloutPolicy<S, M>,
  random: RandomSource,
  options: RolloutOptions<S, P> = {},
): Reward<P> {
  const maxDepth = options.maxDepth ?? Infinity;
  let current = state;
  let depth = 0;

  while (!game.isTerminal(current)) {
    const moves = game.legalMoves(current);
    if (moves.length === 0) break;

    if (depth >= maxDepth) {
      const cutoff = current;
      const evaluate = options.evaluate;
      return evaluate ? (player) => evaluate(cutoff, player) : () => 0;
    }

    current = game.apply(current, policy(current, moves, random));
    depth++;
  }

  return terminalReward(game, current);
}
