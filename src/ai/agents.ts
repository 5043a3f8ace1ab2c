/**
 * Move-choosing agents sharing one interface, so that search engines can be
 * played against each other with `playMatch`.
 */

import { isDeepStrictEqual } from 'node:util';

import type { Game } from '../engine/types.js';
import { InvalidStateError } from '../engine/errors.js';
import { SeededRandom, pickRandom } from '../engine/random.js';
import { MonteCarloTreeSearch } from './mcts/mcts.js';
import type { MCTSConfig } from './mcts/config.js';
import { MinimaxSearch, type MinimaxConfig } from './minimax.js';

export interface Agent<S, M> {
  readonly name: string;
  selectMove(state: S): M;
  /** Tell the agent which moves were played since its last decision (optional). */
  observe?(moves: readonly M[]): void;
  /** Forget everything about the previous game (optional). */
  reset?(): void;
}

/**
 * Uniformly random legal moves.
 */
export class RandomAgent<S, M, P> implements Agent<S, M> {
  readonly name = 'random';
  private readonly random: SeededRandom;

  constructor(
    private readonly game: Game<S, M, P>,
    seed?: number,
  ) {
    this.random = new SeededRandom(seed);
  }

  selectMove(state: S): M {
    const moves = this.game.legalMoves(state);
    if (moves.length === 0) {
      throw new InvalidStateError('No legal moves to choose from');
    }
    return pickRandom(moves, this.random);
  }
}

export interface MctsAgentOptions {
  /**
   * Keep the subtree under the moves played since the previous decision
   * (default: false). Opponent moves must be reported through `observe`;
   * a subtree whose state differs from the one passed to `selectMove` is
   * dropped.
   */
  reuseTree?: boolean;
}

/**
 * Plays the move chosen by a fresh (or continued) MCTS search.
 */
export class MctsAgent<S, M, P> implements Agent<S, M> {
  readonly name = 'mcts';
  readonly search: MonteCarloTreeSearch<S, M, P>;
  private readonly reuseTree: boolean;
  private pendingMoves: M[] = [];

  constructor(
    game: Game<S, M, P>,
    config: Partial<MCTSConfig<S, M, P>> = {},
    options: MctsAgentOptions = {},
  ) {
    this.search = new MonteCarloTreeSearch(game, config);
    this.reuseTree = options.reuseTree ?? false;
  }

  selectMove(state: S): M {
    const kept =
      this.reuseTree && this.search.phase === 'done' && this.search.reset(this.pendingMoves);
    this.pendingMoves = [];

    // Continue from the kept subtree only if it really stands for `state`
    const root = this.search.root;
    if (kept && root && isDeepStrictEqual(root.state, state)) {
      this.search.start();
    } else {
      this.search.start(state);
    }
    const move = this.search.bestMove();
    this.pendingMoves.push(move);
    return move;
  }

  observe(moves: readonly M[]): void {
    this.pendingMoves.push(...moves);
  }

  reset(): void {
    this.pendingMoves = [];
    this.search.reset();
  }
}

/**
 * Plays the minimax-optimal move (first in legal order among equals).
 */
export class MinimaxAgent<S, M, P> implements Agent<S, M> {
  readonly name = 'minimax';
  private readonly minimax: MinimaxSearch<S, M, P>;

  constructor(game: Game<S, M, P>, config: Partial<MinimaxConfig<S, P>> = {}) {
    this.minimax = new MinimaxSearch(game, config);
  }

  selectMove(state: S): M {
    return this.minimax.search(state);
  }
}
