/**
 * Tree store: owns every node reachable from the search root.
 *
 * Nodes are created only through `createRoot` and `addChild`, so the store
 * always knows how many nodes are alive. `reroot` keeps the subtree under a
 * sequence of played moves and drops everything else, which lets successive
 * searches across real-game plies reuse earlier statistics.
 */

import type { Game } from '../../engine/types.js';
import { createNode, type SearchNode } from './node.js';

/**
 * Derives the children-map key of a move. Two moves that mean the same must
 * map to the same key, or `reroot` will not find the played child.
 */
export type MoveKeyFn<M> = (move: M) => string;

/**
 * `JSON.stringify` of the move. Property order is part of the key, so
 * `{ row: 1, col: 2 }` and `{ col: 2, row: 1 }` differ; games whose moves are
 * objects built outside the engine should supply their own key.
 */
export function defaultMoveKey<M>(move: M): string {
  return JSON.stringify(move);
}

export class SearchTree<S, M, P> {
  private rootNode: SearchNode<S, M, P> | null = null;
  private count = 0;

  constructor(
    private readonly game: Game<S, M, P>,
    readonly moveKey: MoveKeyFn<M> = defaultMoveKey,
  ) {}

  get root(): SearchNode<S, M, P> | null {
    return this.rootNode;
  }

  get nodeCount(): number {
    return this.count;
  }

  /**
   * Discard the current tree and start a new one at `state`.
   */
  createRoot(state: S): SearchNode<S, M, P> {
    this.rootNode = createNode(this.game, state, null, null, this.game.currentPlayer(state));
    this.count = 1;
    return this.rootNode;
  }

  /**
   * Apply `move` to `parent.state` and link the resulting node under `parent`.
   * Errors from `Game.apply` propagate unchanged.
   */
  addChild(parent: SearchNode<S, M, P>, move: M): SearchNode<S, M, P> {
    const childState = this.game.apply(parent.state, move);
    const mover = this.game.currentPlayer(parent.state);
    const child = createNode(this.game, childState, parent, move, mover);
    parent.children.set(this.moveKey(move), child);
    this.count++;
    return child;
  }

  getChild(node: SearchNode<S, M, P>, move: M): SearchNode<S, M, P> | undefined {
    return node.children.get(this.moveKey(move));
  }

  /**
   * Keep only the subtree reached by playing `moves` from the root.
   *
   * @returns the new root, or null (and an empty store) when some move along
   *   the path was never expanded
   */
  reroot(moves: readonly M[]): SearchNode<S, M, P> | null {
    let node = this.rootNode;
    for (const move of moves) {
      if (!node) break;
      node = this.getChild(node, move) ?? null;
    }

    if (!node) {
      this.clear();
      return null;
    }

    node.parent = null;
    node.move = null;
    this.rootNode = node;
    this.count = 0;
    this.walk(node, (n, depth) => {
      n.depth = depth;
      this.count++;
    });
    return node;
  }

  clear(): void {
    this.rootNode = null;
    this.count = 0;
  }

  /**
   * Depth-first visit of every node in the subtree under `from` (the root by default).
   */
  walk(
    from: SearchNode<S, M, P> | null,
    visit: (node: SearchNode<S, M, P>, depth: number) => void,
  ): void {
    if (!from) return;
    const stack: Array<[SearchNode<S, M, P>, number]> = [[from, 0]];
    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) break;
      const [node, depth] = entry;
      visit(node, depth);
      for (const child of node.children.values()) {
        stack.push([child, depth + 1]);
      }
    }
  }
}
