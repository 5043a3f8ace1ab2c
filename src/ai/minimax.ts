/**
 * Minimax search with alpha-beta pruning and an optional transposition cache.
 *
 * Written in negamax form for two-player zero-sum games: the value of a state
 * is always from the perspective of the player to move there. A child whose
 * player to move differs from the parent's is negated; a player moving twice
 * keeps the sign. With an unbounded depth this solves small games such as
 * tic-tac-toe exactly, which makes it a reference for checking MCTS.
 */

import type { Game, StateEvaluator } from '../engine/types.js';
import { ConfigurationError, InvalidStateError } from '../engine/errors.js';

export interface MinimaxConfig<S, P> {
  maxDepth: number;                    // plies before `evaluate` is used (default: Infinity)
  evaluate?: StateEvaluator<S, P>;     // cut-off score; 0 when absent
  alphaBeta: boolean;                  // prune with alpha-beta (default: true)
  stateKey?: (state: S) => string;     // enables the transposition cache when set
}

export interface MoveValue<M> {
  move: M;
  value: number;
}

type Bound = 'exact' | 'lower' | 'upper';

interface CacheEntry {
  value: number;
  remaining: number;
  bound: Bound;
}

export class MinimaxSearch<S, M, P> {
  private readonly config: MinimaxConfig<S, P>;
  private cache = new Map<string, CacheEntry>();
  private visited = 0;

  constructor(
    private readonly game: Game<S, M, P>,
    config: Partial<MinimaxConfig<S, P>> = {},
  ) {
    this.config = {
      maxDepth: config.maxDepth ?? Infinity,
      evaluate: config.evaluate,
      alphaBeta: config.alphaBeta ?? true,
      stateKey: config.stateKey,
    };
    if (Number.isNaN(this.config.maxDepth) || this.config.maxDepth < 1) {
      throw new ConfigurationError('maxDepth', 'must be >= 1');
    }
  }

  /** States evaluated by the last call. */
  get nodesVisited(): number {
    return this.visited;
  }

  /**
   * Best move for the player to move; the first one in legal order among equals.
   */
  search(state: S): M {
    const moves = this.rootMoves(state);
    let best = moves[0];
    let bestValue = -Infinity;
    let alpha = -Infinity;

    for (const move of moves) {
      const value = this.childValue(state, move, 1, alpha, Infinity);
      if (value > bestValue) {
        bestValue = value;
        best = move;
      }
      if (this.config.alphaBeta) alpha = Math.max(alpha, value);
    }
    return best;
  }

  /**
   * Exact value of every legal move, for the player to move.
   */
  evaluateMoves(state: S): MoveValue<M>[] {
    const moves = this.rootMoves(state);
    return moves.map(move => ({
      move,
      value: this.childValue(state, move, 1, -Infinity, Infinity),
    }));
  }

  /**
   * Value of `state` for its player to move.
   */
  value(state: S): number {
    this.cache.clear();
    this.visited = 0;
    return this.negamax(state, 0, -Infinity, Infinity);
  }

  private rootMoves(state: S): readonly M[] {
    const moves = this.game.isTerminal(state) ? [] : this.game.legalMoves(state);
    if (moves.length === 0) {
      throw new InvalidStateError('Cannot search a terminal state');
    }
    this.cache.clear();
    this.visited = 0;
    return moves;
  }

  private childValue(state: S, move: M, depth: number, alpha: number, beta: number): number {
    const child = this.game.apply(state, move);
    const sameMover = this.game.currentPlayer(child) === this.game.currentPlayer(state);
    return sameMover
      ? this.negamax(child, depth, alpha, beta)
      : -this.negamax(child, depth, -beta, -alpha);
  }

  private negamax(state: S, depth: number, alpha: number, beta: number): number {
    this.visited++;
    const player = this.game.currentPlayer(state);

    if (this.game.isTerminal(state)) {
      return this.game.outcome(state, player);
    }
    const moves = this.game.legalMoves(state);
    if (moves.length === 0) {
      return this.game.outcome(state, player);
    }
    if (depth >= this.config.maxDepth) {
      return this.config.evaluate ? this.config.evaluate(state, player) : 0;
    }

    const remaining = this.config.maxDepth - depth;
    const key = this.config.stateKey?.(state);
    const alphaOrig = alpha;

    if (key !== undefined) {
      const entry = this.cache.get(key);
      if (entry && entry.remaining >= remaining) {
        if (entry.bound === 'exact') return entry.value;
        if (entry.bound === 'lower') alpha = Math.max(alpha, entry.value);
        if (entry.bound === 'upper') beta = Math.min(beta, entry.value);
        if (alpha >= beta) return entry.value;
      }
    }

    let best = -Infinity;
    for (const move of moves) {
      const value = this.childValue(state, move, depth + 1, alpha, beta);
      best = Math.max(best, value);
      if (this.config.alphaBeta) {
        alpha = Math.max(alpha, value);
        if (alpha >= beta) break;
      }
    }

    if (key !== undefined) {
      const bound: Bound = best <= alphaOrig ? 'upper' : best >= beta ? 'lower' : 'exact';
      this.cache.set(key, { value: best, remaining, bound });
    }
    return best;
  }
}
