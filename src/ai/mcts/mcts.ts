/**
 * Monte Carlo Tree Search driver.
 *
 * Works with any game implementing the `Game` contract. Each iteration runs
 * the four classic phases to completion before the next one starts:
 * 1. Selection: descend from the root with UCT while nodes are fully expanded
 * 2. Expansion: add one child for an untried move
 * 3. Simulation: play out from the new child with the rollout policy
 *    (terminal nodes are scored exactly instead)
 * 4. Backpropagation: credit the result to every node on the path
 *
 * The driver is a small state machine:
 *   idle --start()--> running --budget exhausted--> done --reset()--> idle
 * `start` from `done` begins a fresh search directly.
 */

import type { Game } from '../../engine/types.js';
import { ConfigurationError, InvalidStateError, NoIterationsError } from '../../engine/errors.js';
import { SeededRandom } from '../../engine/random.js';
import {
  resolveConfig,
  validateBudget,
  type FinalMoveSelection,
  type MCTSConfig,
  type SearchBudget,
} from './config.js';
import { meanValue, type SearchNode } from './node.js';
import { SearchTree } from './tree.js';
import { descend } from './selection.js';
import { expand } from './expansion.js';
import { rollout, terminalReward } from './rollout.js';
import { backpropagate } from './backpropagation.js';

export type SearchPhase = 'idle' | 'running' | 'done';

/**
 * Root child statistics for analysis and debugging.
 */
export interface ChildStat<M> {
  move: M;
  moveKey: string;
  visitCount: number;
  meanValue: number;
  probability: number;   // visit share of the root
}

export interface SearchStats {
  iterations: number;
  nodeCount: number;
  elapsedMs: number;
  rootVisits: number;
}

export interface AsyncSearchOptions {
  budget?: Partial<SearchBudget>;
  /** Yield to the event loop every N iterations (default: 50) */
  yieldInterval?: number;
  /** Called at every yield and once at the end; maxIterations is Infinity for time-only budgets */
  onProgress?: (iterations: number, maxIterations: number) => void;
}

const DEFAULT_YIELD_INTERVAL = 50;

// Bookkeeping of one run of the search loop
interface RunContext<S, M, P> {
  root: SearchNode<S, M, P>;
  maxIterations: number;
  deadline: number;
  startedAt: number;
}

export class MonteCarloTreeSearch<S, M, P> {
  private readonly config: MCTSConfig<S, M, P>;
  private readonly random: SeededRandom;
  private readonly tree: SearchTree<S, M, P>;
  private currentPhase: SearchPhase = 'idle';
  private hasRetainedTree = false;
  private iterationCount = 0;
  private lastElapsedMs = 0;

  constructor(
    private readonly game: Game<S, M, P>,
    config: Partial<MCTSConfig<S, M, P>> = {},
  ) {
    this.config = resolveConfig(config);
    this.random = new SeededRandom(this.config.randomSeed ?? Date.now());
    this.tree = new SearchTree(game, this.config.moveKey);
  }

  get phase(): SearchPhase {
    return this.currentPhase;
  }

  /** Iterations completed by the current (or last) search. */
  get iterations(): number {
    return this.iterationCount;
  }

  get nodeCount(): number {
    return this.tree.nodeCount;
  }

  get elapsedMs(): number {
    return this.lastElapsedMs;
  }

  /** Current root, for analysis only. Do not mutate. */
  get root(): SearchNode<S, M, P> | null {
    return this.tree.root;
  }

  /**
   * Run a search synchronously.
   *
   * @param state - Root state. Omit it to continue from the subtree kept by `reset(moves)`.
   * @param budget - Overrides the configured budget for this search
   */
  start(state?: S, budget?: Partial<SearchBudget>): this {
    const run = this.begin(state, budget);
    try {
      while (this.hasBudget(run)) {
        this.iterate(run.root);
      }
    } catch (error) {
      this.abort();
      throw error;
    }
    this.finish(run);
    return this;
  }

  /**
   * Run a search, yielding to the event loop periodically so callers stay
   * responsive. The driver is `running` until the returned promise settles.
   */
  async startAsync(state?: S, options: AsyncSearchOptions = {}): Promise<this> {
    const yieldInterval = options.yieldInterval ?? DEFAULT_YIELD_INTERVAL;
    if (!Number.isInteger(yieldInterval) || yieldInterval < 1) {
      throw new ConfigurationError('yieldInterval', 'must be an integer >= 1');
    }

    const run = this.begin(state, options.budget);
    try {
      while (this.hasBudget(run)) {
        this.iterate(run.root);
        if (this.iterationCount % yieldInterval === 0) {
          options.onProgress?.(this.iterationCount, run.maxIterations);
          await new Promise(resolve => setTimeout(resolve, 0));
        }
      }
    } catch (error) {
      this.abort();
      throw error;
    }
    options.onProgress?.(this.iterationCount, run.maxIterations);
    this.finish(run);
    return this;
  }

  /**
   * The move to play: the root child chosen by `finalMoveSelection`.
   *
   * With no statistics at the root, a position with exactly one legal move
   * still returns that move; anything else throws `NoIterationsError`.
   */
  bestMove(): M {
    if (this.currentPhase === 'running') {
      throw new InvalidStateError('bestMove() called while a search is running');
    }
    const root = this.tree.root;
    if (this.currentPhase !== 'done' || !root) {
      throw new NoIterationsError('No search has completed');
    }

    const best = this.selectFinalChild(root);
    if (best && best.move !== null) {
      return best.move;
    }

    const legalMoves = root.isTerminal ? [] : this.game.legalMoves(root.state);
    if (legalMoves.length === 1) {
      return legalMoves[0];
    }
    throw new NoIterationsError(
      root.isTerminal
        ? 'Root state is terminal: there are no moves to choose among'
        : `No completed iterations to choose among ${legalMoves.length} moves`,
    );
  }

  /**
   * Return to `idle`.
   *
   * @param playedMoves - Moves actually played from the root since the last
   *   search. When given, the subtree they lead to is kept and the next
   *   `start()` without a state continues from it.
   * @returns whether a subtree was kept
   */
  reset(playedMoves?: readonly M[]): boolean {
    if (this.currentPhase === 'running') {
      throw new InvalidStateError('Cannot reset while a search is running');
    }
    if (playedMoves && this.tree.root) {
      this.hasRetainedTree = this.tree.reroot(playedMoves) !== null;
    } else {
      this.tree.clear();
      this.hasRetainedTree = false;
    }
    this.currentPhase = 'idle';
    this.iterationCount = 0;
    this.lastElapsedMs = 0;
    return this.hasRetainedTree;
  }

  /**
   * Statistics of every root child, most visited first.
   */
  rootChildStats(): ChildStat<M>[] {
    const root = this.tree.root;
    if (!root) return [];

    const stats: ChildStat<M>[] = [];
    for (const [key, child] of root.children) {
      if (child.move === null) continue;
      stats.push({
        move: child.move,
        moveKey: key,
        visitCount: child.visitCount,
        meanValue: meanValue(child),
        probability: root.visitCount > 0 ? child.visitCount / root.visitCount : 0,
      });
    }
    // Stable sort keeps insertion order among equal visit counts
    stats.sort((a, b) => b.visitCount - a.visitCount);
    return stats;
  }

  getStats(): SearchStats {
    return {
      iterations: this.iterationCount,
      nodeCount: this.tree.nodeCount,
      elapsedMs: this.lastElapsedMs,
      rootVisits: this.tree.root?.visitCount ?? 0,
    };
  }

  /**
   * Visit every node of the tree, root first.
   */
  forEachNode(visit: (node: SearchNode<S, M, P>, depth: number) => void): void {
    this.tree.walk(this.tree.root, visit);
  }

  private begin(state: S | undefined, budget: Partial<SearchBudget> | undefined): RunContext<S, M, P> {
    if (this.currentPhase === 'running') {
      throw new InvalidStateError('A search is already running');
    }

    const retained = this.hasRetainedTree ? this.tree.root : null;
    if (state === undefined && !retained) {
      throw new InvalidStateError('No root state given and no retained subtree to continue from');
    }

    const resolvedBudget: SearchBudget = {
      maxIterations: budget?.maxIterations ?? this.config.maxIterations,
      maxDurationMs: budget?.maxDurationMs ?? this.config.maxDurationMs,
    };
    // A root with at most one legal move is answered without searching,
    // whatever the budget says
    const rootState = state !== undefined ? state : retained?.state;
    const forced = rootState !== undefined && this.legalMoveCount(rootState) <= 1;
    if (!forced) {
      validateBudget(resolvedBudget);
    }

    let root: SearchNode<S, M, P>;
    if (state !== undefined) {
      root = this.tree.createRoot(state);
    } else if (retained) {
      root = retained;
    } else {
      throw new InvalidStateError('No root state given and no retained subtree to continue from');
    }

    this.hasRetainedTree = false;
    this.currentPhase = 'running';
    this.iterationCount = 0;

    const startedAt = performance.now();
    return {
      root,
      maxIterations: forced ? 0 : resolvedBudget.maxIterations > 0 ? resolvedBudget.maxIterations : Infinity,
      deadline: startedAt + (resolvedBudget.maxDurationMs ?? Infinity),
      startedAt,
    };
  }

  private legalMoveCount(state: S): number {
    return this.game.isTerminal(state) ? 0 : this.game.legalMoves(state).length;
  }

  // Checked only between iterations; an iteration in flight always completes
  private hasBudget(run: RunContext<S, M, P>): boolean {
    if (run.root.isTerminal) return false;
    if (this.iterationCount >= run.maxIterations) return false;
    return run.deadline === Infinity || performance.now() < run.deadline;
  }

  private iterate(root: SearchNode<S, M, P>): void {
    const { explorationConstant, selectionTieBreak, rolloutPolicy, simulationsPerIteration } = this.config;

    const leaf = descend(root, explorationConstant, selectionTieBreak, this.random);
    const node = expand(this.tree, leaf) ?? leaf;

    for (let i = 0; i < simulationsPerIteration; i++) {
      const reward = node.isTerminal
        ? terminalReward(this.game, node.state)
        : rollout(this.game, node.state, rolloutPolicy, this.random, {
            maxDepth: this.config.maxRolloutDepth,
            evaluate: this.config.evaluate,
          });
      backpropagate(node, reward);
    }

    this.iterationCount++;
  }

  private finish(run: RunContext<S, M, P>): void {
    this.lastElapsedMs = performance.now() - run.startedAt;
    this.currentPhase = 'done';

    if (this.config.verbose) {
      console.log(
        `[MCTS] ${this.iterationCount} iterations in ${this.lastElapsedMs.toFixed(1)}ms ` +
          `(${this.tree.nodeCount} nodes, root visits ${run.root.visitCount})`,
      );
    }
  }

  // A failed search leaves no partial tree behind
  private abort(): void {
    this.tree.clear();
    this.hasRetainedTree = false;
    this.currentPhase = 'idle';
  }

  private selectFinalChild(root: SearchNode<S, M, P>): SearchNode<S, M, P> | null {
    const children = [...root.children.values()];
    const index = pickFinalCandidate(
      children.map(child => ({ visitCount: child.visitCount, meanValue: meanValue(child) })),
      this.config.finalMoveSelection,
    );
    return index >= 0 ? children[index] : null;
  }
}

/**
 * Index of the candidate to play under `selection`, or -1 when no candidate
 * has been visited. Earlier candidates win full ties.
 */
export function pickFinalCandidate(
  candidates: ReadonlyArray<{ visitCount: number; meanValue: number }>,
  selection: FinalMoveSelection,
): number {
  const byMean = selection === 'highest-mean';
  let bestIndex = -1;

  candidates.forEach((candidate, index) => {
    if (candidate.visitCount === 0) return;
    if (bestIndex < 0) {
      bestIndex = index;
      return;
    }
    const best = candidates[bestIndex];
    const visits = candidate.visitCount - best.visitCount;
    const mean = candidate.meanValue - best.meanValue;
    const primary = byMean ? mean : visits;
    const secondary = byMean ? visits : mean;
    if (primary > 0 || (primary === 0 && secondary > 0)) {
      bestIndex = index;
    }
  });
  return bestIndex;
}

export default MonteCarloTreeSearch;
