// Generic MCTS engine - Main Exports
export * from './engine/types.js';
export * from './engine/errors.js';
export { SeededRandom, pickRandom, type RandomSource } from './engine/random.js';
export { MnkGame, type MnkState, type MnkMove, type MnkConfig, type Cell } from './engine/mnk.js';

export {
  MonteCarloTreeSearch,
  pickFinalCandidate,
  type SearchPhase,
  type ChildStat,
  type SearchStats,
  type AsyncSearchOptions,
} from './ai/mcts/mcts.js';
export {
  resolveConfig,
  DEFAULT_MAX_ITERATIONS,
  type MCTSConfig,
  type SearchBudget,
  type FinalMoveSelection,
} from './ai/mcts/config.js';
export { createNode, meanValue, isFullyExpanded, type SearchNode } from './ai/mcts/node.js';
export { SearchTree, defaultMoveKey, type MoveKeyFn } from './ai/mcts/tree.js';
export { uctScore, selectChild, descend, type TieBreak } from './ai/mcts/selection.js';
export { expand } from './ai/mcts/expansion.js';
export {
  rollout,
  terminalReward,
  uniformRandomPolicy,
  createDecisiveMovePolicy,
  type RolloutPolicy,
  type RolloutOptions,
  type Reward,
} from './ai/mcts/rollout.js';
export { backpropagate } from './ai/mcts/backpropagation.js';
export {
  rootParallelSearch,
  type RootParallelOptions,
  type RootParallelResult,
} from './ai/mcts/root-parallel.js';

export { MinimaxSearch, type MinimaxConfig, type MoveValue } from './ai/minimax.js';
export {
  RandomAgent,
  MctsAgent,
  MinimaxAgent,
  type Agent,
  type MctsAgentOptions,
} from './ai/agents.js';
export { playMatch, type MatchOptions, type MatchResult, type GameRecord } from './ai/arena.js';
