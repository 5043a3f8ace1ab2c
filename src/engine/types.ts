/**
 * Game Contract - Core Type Definitions
 *
 * The search engine knows nothing about boards, pieces or rules. Any
 * two-player, perfect-information, turn-based game can be searched as long as
 * it implements the five operations of `Game`.
 */

// ============================================================================
// GAME CONTRACT
// ============================================================================

/**
 * Abstract game rules.
 *
 * @typeParam S - Game state. Treated as immutable: `apply` must return a new state.
 * @typeParam M - Move. Used only as an edge label in the search tree.
 * @typeParam P - Player identifier.
 */
export interface Game<S, M, P> {
  /** All moves applicable in `state`. Empty iff the state is terminal (or a stalemate). */
  legalMoves(state: S): readonly M[];

  /**
   * Deterministic transition. Throws `InvalidMoveError` if `move` is not legal.
   */
  apply(state: S, move: M): S;

  isTerminal(state: S): boolean;

  /**
   * Reward of a terminal state from `player`'s perspective,
   * e.g. +1 win, 0 draw, -1 loss.
   */
  outcome(state: S, player: P): number;

  /** Whose turn it is in `state`. */
  currentPlayer(state: S): P;
}

/** The two seats of a two-player game. */
export type PlayerIndex = 0 | 1;

/**
 * Returns the other seat.
 */
export function otherPlayer(player: PlayerIndex): PlayerIndex {
  return player === 0 ? 1 : 0;
}

// ============================================================================
// EVALUATION
// ============================================================================

/**
 * Heuristic score of a non-terminal state from `player`'s perspective,
 * on the same scale as `Game.outcome`.
 */
export type StateEvaluator<S, P> = (state: S, player: P) => number;
