/**
 * m,n,k-game rules (tic-tac-toe = 3,3,3; gomoku = 15,15,5).
 *
 * Two players alternately claim empty cells of an m×n board; the first to get
 * k of their own cells in a row (horizontally, vertically or diagonally) wins.
 * A full board without such a row is a draw.
 *
 * All methods are pure functions: MnkState -> MnkState (or similar).
 */

import { ConfigurationError, InvalidMoveError } from './errors.js';
import { Game, PlayerIndex, otherPlayer } from './types.js';

export type Cell = PlayerIndex | null;

export interface MnkMove {
  row: number;
  col: number;
}

export interface MnkState {
  /** Row-major cells, `rows * cols` long. */
  readonly board: readonly Cell[];
  readonly toMove: PlayerIndex;
  readonly lastMove: MnkMove | null;
  readonly winner: PlayerIndex | null;
  readonly movesLeft: number;
}

export interface MnkConfig {
  rows: number;
  cols: number;
  k: number;
  /** Player who moves first (default: 0) */
  firstPlayer?: PlayerIndex;
}

// Row/column steps of the four line directions through a cell
const DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [0, 1],
  [1, 0],
  [1, 1],
  [1, -1],
];

const SYMBOLS: Record<PlayerIndex, string> = { 0: 'X', 1: 'O' };

export class MnkGame implements Game<MnkState, MnkMove, PlayerIndex> {
  readonly rows: number;
  readonly cols: number;
  readonly k: number;
  private readonly firstPlayer: PlayerIndex;

  constructor(config: MnkConfig) {
    const { rows, cols, k } = config;
    if (!Number.isInteger(rows) || rows < 1 || !Number.isInteger(cols) || cols < 1) {
      throw new ConfigurationError('rows/cols', 'board dimensions must be positive integers');
    }
    if (!Number.isInteger(k) || k < 1) {
      throw new ConfigurationError('k', 'k must be a positive integer');
    }
    if (k > Math.min(rows, cols)) {
      throw new ConfigurationError('k', `k (${k}) must not exceed min(rows, cols) (${Math.min(rows, cols)})`);
    }
    this.rows = rows;
    this.cols = cols;
    this.k = k;
    this.firstPlayer = config.firstPlayer ?? 0;
  }

  /** Standard 3×3 tic-tac-toe. */
  static ticTacToe(): MnkGame {
    return new MnkGame({ rows: 3, cols: 3, k: 3 });
  }

  /** Free-style gomoku on a 15×15 board. */
  static gomoku(): MnkGame {
    return new MnkGame({ rows: 15, cols: 15, k: 5 });
  }

  initialState(): MnkState {
    return {
      board: new Array<Cell>(this.rows * this.cols).fill(null),
      toMove: this.firstPlayer,
      lastMove: null,
      winner: null,
      movesLeft: this.rows * this.cols,
    };
  }

  /**
   * Build a state from rows of `X`, `O` and `.` (X is player 0).
   * The player to move is derived from the piece counts unless given.
   * Useful for setting up positions in tests.
   */
  fromRows(rows: readonly string[], toMove?: PlayerIndex): MnkState {
    if (rows.length !== this.rows || rows.some(r => r.length !== this.cols)) {
      throw new ConfigurationError('rows', `expected ${this.rows} rows of ${this.cols} cells`);
    }
    const board: Cell[] = [];
    let counts: [number, number] = [0, 0];
    for (const line of rows) {
      for (const ch of line) {
        if (ch === 'X') {
          board.push(0);
          counts = [counts[0] + 1, counts[1]];
        } else if (ch === 'O') {
          board.push(1);
          counts = [counts[0], counts[1] + 1];
        } else {
          board.push(null);
        }
      }
    }

    const first = this.firstPlayer;
    const derived: PlayerIndex =
      counts[first] > counts[otherPlayer(first)] ? otherPlayer(first) : first;

    let winner: PlayerIndex | null = null;
    for (let index = 0; index < board.length && winner === null; index++) {
      const owner = board[index];
      if (owner !== null && this.hasLineThrough(board, this.indexToMove(index), owner)) {
        winner = owner;
      }
    }

    return {
      board,
      toMove: toMove ?? derived,
      lastMove: null,
      winner,
      movesLeft: board.filter(c => c === null).length,
    };
  }

  legalMoves(state: MnkState): MnkMove[] {
    if (this.isTerminal(state)) return [];
    const moves: MnkMove[] = [];
    for (let index = 0; index < state.board.length; index++) {
      if (state.board[index] === null) {
        moves.push(this.indexToMove(index));
      }
    }
    return moves;
  }

  apply(state: MnkState, move: MnkMove): MnkState {
    if (this.isTerminal(state)) {
      throw new InvalidMoveError(move, 'the game is already over');
    }
    if (
      !Number.isInteger(move.row) || !Number.isInteger(move.col) ||
      move.row < 0 || move.row >= this.rows ||
      move.col < 0 || move.col >= this.cols
    ) {
      throw new InvalidMoveError(move, 'cell is outside the board');
    }
    const index = move.row * this.cols + move.col;
    if (state.board[index] !== null) {
      throw new InvalidMoveError(move, 'cell is already occupied');
    }

    const board = state.board.slice();
    board[index] = state.toMove;
    const won = this.hasLineThrough(board, move, state.toMove);

    return {
      board,
      toMove: otherPlayer(state.toMove),
      lastMove: { row: move.row, col: move.col },
      winner: won ? state.toMove : null,
      movesLeft: state.movesLeft - 1,
    };
  }

  isTerminal(state: MnkState): boolean {
    return state.winner !== null || state.movesLeft <= 0;
  }

  outcome(state: MnkState, player: PlayerIndex): number {
    if (state.winner === null) return 0;
    return state.winner === player ? 1 : -1;
  }

  currentPlayer(state: MnkState): PlayerIndex {
    return state.toMove;
  }

  /** Text board, one row per line. */
  render(state: MnkState): string {
    const lines: string[] = [];
    for (let row = 0; row < this.rows; row++) {
      let line = '';
      for (let col = 0; col < this.cols; col++) {
        const cell = state.board[row * this.cols + col];
        line += cell === null ? '.' : SYMBOLS[cell];
      }
      lines.push(line);
    }
    return lines.join('\n');
  }

  /** Compact key for transposition caches. */
  stateKey(state: MnkState): string {
    return state.board.map(c => (c === null ? '.' : SYMBOLS[c])).join('') + state.toMove;
  }

  /**
   * Key of a move that does not depend on how the move object was written
   * (`{ row, col }` and `{ col, row }` agree). Pass it as the search's
   * `moveKey` when moves come from outside the engine.
   */
  moveKey(move: MnkMove): string {
    return `${move.row},${move.col}`;
  }

  private indexToMove(index: number): MnkMove {
    return { row: Math.floor(index / this.cols), col: index % this.cols };
  }

  private cellAt(board: readonly Cell[], row: number, col: number): Cell | undefined {
    if (row < 0 || row >= this.rows || col < 0 || col >= this.cols) return undefined;
    return board[row * this.cols + col];
  }

  /**
   * Whether `player` owns k cells in a row along some line through `at`.
   */
  private hasLineThrough(board: readonly Cell[], at: MnkMove, player: PlayerIndex): boolean {
    for (const [dr, dc] of DIRECTIONS) {
      let run = 1;
      for (let step = 1; this.cellAt(board, at.row + dr * step, at.col + dc * step) === player; step++) {
        run++;
      }
      for (let step = 1; this.cellAt(board, at.row - dr * step, at.col - dc * step) === player; step++) {
        run++;
      }
      if (run >= this.k) return true;
    }
    return false;
  }
}
