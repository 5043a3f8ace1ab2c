/**
 * Error types raised by the search engine and by the bundled games.
 *
 * Every error is reported to the caller; nothing in the engine retries or
 * suppresses them.
 */

/**
 * Base class for all engine errors.
 */
export class MctsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MctsError';
  }
}

/**
 * A move was applied to a state in which it is not legal.
 */
export class InvalidMoveError extends MctsError {
  constructor(
    public readonly move: unknown,
    reason: string,
  ) {
    super(`Invalid move ${JSON.stringify(move)}: ${reason}`);
    this.name = 'InvalidMoveError';
  }
}

/**
 * The search driver was used out of order (e.g. `start` while running).
 */
export class InvalidStateError extends MctsError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidStateError';
  }
}

/**
 * A best move was requested but there are no statistics to decide from.
 */
export class NoIterationsError extends MctsError {
  constructor(message: string = 'No completed iterations to choose a move from') {
    super(message);
    this.name = 'NoIterationsError';
  }
}

/**
 * Rejected configuration value.
 */
export class ConfigurationError extends MctsError {
  constructor(
    public readonly option: string,
    message: string,
  ) {
    super(`${option}: ${message}`);
    this.name = 'ConfigurationError';
  }
}
