/**
 * Play rounds between agents and tally the results.
 */

import type { Game } from '../engine/types.js';
import { ConfigurationError, InvalidStateError } from '../engine/errors.js';
import type { Agent } from './agents.js';

export interface MatchOptions<S> {
  rounds?: number;          // games to play (default: 1)
  maxMoves?: number;        // a game still running after this many moves counts as a draw (default: 10000)
  verbose?: boolean;        // log each game's result (default: false)
  render?: (state: S) => string;  // with verbose, also log the final position
}

export interface GameRecord<M, P> {
  moves: M[];
  winner: P | null;
  /** True when the game was cut off by maxMoves */
  truncated: boolean;
}

export interface MatchResult<M, P> {
  games: GameRecord<M, P>[];
  wins: Map<P, number>;
  draws: number;
}

/**
 * Play `rounds` games from `initialState`. The agent for each turn is looked
 * up by the game's current player. After every move the other agents are
 * told what was played.
 */
export function playMatch<S, M, P>(
  game: Game<S, M, P>,
  initialState: S,
  agents: ReadonlyMap<P, Agent<S, M>>,
  options: MatchOptions<S> = {},
): MatchResult<M, P> {
  const rounds = options.rounds ?? 1;
  const maxMoves = options.maxMoves ?? 10_000;
  if (!Number.isInteger(rounds) || rounds < 1) {
    throw new ConfigurationError('rounds', 'must be an integer >= 1');
  }
  if (!Number.isInteger(maxMoves) || maxMoves < 1) {
    throw new ConfigurationError('maxMoves', 'must be an integer >= 1');
  }

  const wins = new Map<P, number>();
  for (const player of agents.keys()) wins.set(player, 0);
  const games: GameRecord<M, P>[] = [];
  let draws = 0;

  for (let round = 0; round < rounds; round++) {
    for (const agent of agents.values()) agent.reset?.();

    let state = initialState;
    const moves: M[] = [];
    while (!game.isTerminal(state) && moves.length < maxMoves) {
      const player = game.currentPlayer(state);
      const agent = agents.get(player);
      if (!agent) {
        throw new InvalidStateError(`No agent registered for player ${String(player)}`);
      }
      const move = agent.selectMove(state);
      state = game.apply(state, move);
      moves.push(move);
      for (const other of agents.values()) {
        if (other !== agent) other.observe?.([move]);
      }
    }

    const truncated = !game.isTerminal(state);
    let winner: P | null = null;
    if (!truncated) {
      for (const player of agents.keys()) {
        if (game.outcome(state, player) > 0) winner = player;
      }
    }

    if (winner === null) {
      draws++;
    } else {
      wins.set(winner, (wins.get(winner) ?? 0) + 1);
    }
    games.push({ moves, winner, truncated });

    if (options.verbose) {
      const result = winner === null ? (truncated ? 'unfinished (draw)' : 'draw') : `won by ${String(winner)}`;
      console.log(`[Arena] Round ${round + 1}/${rounds}: ${result} after ${moves.length} moves`);
      if (options.render) console.log(options.render(state));
    }
  }

  return { games, wins, draws };
}
