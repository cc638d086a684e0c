import type { BoardState } from '../BoardState.ts';
import type { Puzzle } from '../Puzzle.ts';
import type { SearchObserver } from './SearchObserver.ts';

import { Propagator } from '../propagation/Propagator.ts';
import { scanBoard } from './scanBoard.ts';

export interface SearchEngineOptions {
  readonly observer?: SearchObserver;
  readonly propagator?: Propagator;
}

export interface SearchStats {
  branches: number;
  contradictions: number;
  nodes: number;
  solutions: number;
}

/**
 * Depth-first search over board states with the minimum-remaining-values heuristic.
 *
 * Each branch works on its own clone, so a failed branch never touches its parent.
 */
export class SearchEngine {
  public get stats(): Readonly<SearchStats> {
    return this._stats;
  }

  private readonly _stats: SearchStats = {
    branches: 0,
    contradictions: 0,
    nodes: 0,
    solutions: 0
  };

  private readonly observer: SearchObserver;
  private readonly propagator: Propagator;

  public constructor(options: SearchEngineOptions = {}) {
    this.observer = options.observer ?? {};
    this.propagator = options.propagator ?? new Propagator();
  }

  public countSolutions(board: BoardState, limit = Infinity): number {
    let count = 0;
    const iterator = this.solutions(board);
    while (count < limit && iterator.next().done !== true) {
      count++;
    }
    iterator.return();
    return count;
  }

  public resetStats(): void {
    this._stats.branches = 0;
    this._stats.contradictions = 0;
    this._stats.nodes = 0;
    this._stats.solutions = 0;
  }

  /**
   * Yields every solved board reachable from `board`, in search order.
   * `board` itself is never modified.
   */
  public *solutions(board: BoardState): Generator<BoardState, void, undefined> {
    yield* this.explore(board, 0);
  }

  public solve(board: BoardState): BoardState | null {
    for (const solution of this.solutions(board)) {
      return solution;
    }
    return null;
  }

  /**
   * Solves a puzzle from its givens. A puzzle whose givens contradict each other has no solution.
   */
  public solvePuzzle(puzzle: Puzzle): BoardState | null {
    const setup = puzzle.toBoard(this.propagator);
    return setup.type === 'ready' ? this.solve(setup.board) : null;
  }

  private *explore(board: BoardState, depth: number): Generator<BoardState, void, undefined> {
    this._stats.nodes++;
    const status = scanBoard(board);

    switch (status.type) {
      case 'branch':
        break;
      case 'contradiction':
        this._stats.contradictions++;
        return;
      case 'solved':
        this._stats.solutions++;
        this.observer.onSolution?.(board, depth);
        yield board;
        return;
      default: {
        const exhaustive: never = status;
        throw new Error(`Unknown board status: ${String(exhaustive)}`);
      }
    }

    for (const digit of board.getCandidates(status.square)) {
      const event = { depth, digit, square: status.square };
      this._stats.branches++;
      this.observer.onBranch?.(event);

      const branch = board.clone();
      const outcome = this.propagator.assign(branch, status.square, digit);
      if (outcome.type === 'contradiction') {
        this._stats.contradictions++;
        this.observer.onContradiction?.(event, outcome.contradiction);
        continue;
      }
      yield* this.explore(branch, depth + 1);
    }
  }
}
