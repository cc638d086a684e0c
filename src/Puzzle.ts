import type { ContradictionOutcome } from './outcomes.ts';
import type { PuzzleCell } from './parsers.ts';
import type { Propagator } from './propagation/Propagator.ts';

import { BoardState } from './BoardState.ts';
import { parsePuzzleText } from './parsers.ts';
import { Topology } from './Topology.ts';
import { assertDigit } from './typeGuards.ts';

export interface BoardReady {
  readonly board: BoardState;
  readonly type: 'ready';
}

export interface Given {
  readonly digit: number;
  readonly square: number;
}

export interface PuzzleJson {
  readonly grid: string;
  readonly solution?: string;
  readonly title?: string;
}

export interface PuzzleOptions {
  readonly title?: string;
  readonly topology?: Topology;
}

const DEFAULT_TITLE = 'Sudoku';

export class Puzzle {
  public get givenCount(): number {
    return this.givens.length;
  }

  public readonly givens: readonly Given[];

  public constructor(
    public readonly topology: Topology,
    public readonly cells: readonly PuzzleCell[],
    public readonly title: string = DEFAULT_TITLE
  ) {
    if (cells.length !== topology.squareCount) {
      throw new Error(`Expected ${String(topology.squareCount)} cells, got ${String(cells.length)}`);
    }
    const givens: Given[] = [];
    cells.forEach((digit, square) => {
      if (digit !== null) {
        assertDigit(digit, topology.size);
        givens.push({ digit, square });
      }
    });
    this.givens = givens;
  }

  public static fromJson(json: PuzzleJson, topology: Topology = Topology.standard()): Puzzle {
    return Puzzle.parse(json.grid, { topology, ...json.title !== undefined && { title: json.title } });
  }

  public static parse(text: string, options: PuzzleOptions = {}): Puzzle {
    const topology = options.topology ?? Topology.standard();
    return new Puzzle(topology, parsePuzzleText(text, topology.squareCount), options.title);
  }

  /**
   * Builds the starting board by assigning every given in square order.
   * Stops at the first given that contradicts the ones before it.
   */
  public toBoard(propagator: Propagator): BoardReady | ContradictionOutcome {
    const board = BoardState.create(this.topology);
    for (const { digit, square } of this.givens) {
      const outcome = propagator.assign(board, square, digit);
      if (outcome.type === 'contradiction') {
        return outcome;
      }
    }
    return { board, type: 'ready' };
  }

  public toString(): string {
    return this.cells.map((digit) => digit ?? '.').join('');
  }
}
