import type { BoardState } from './BoardState.ts';
import type { Puzzle } from './Puzzle.ts';
import type { Unit } from './Topology.ts';

export interface GivenConflict {
  readonly digit: number;
  readonly squares: readonly [number, number];
  readonly unit: Unit;
}

export function findConflictingGivens(puzzle: Puzzle): GivenConflict[] {
  const conflicts: GivenConflict[] = [];
  for (const unit of puzzle.topology.units) {
    const firstByDigit = new Map<number, number>();
    for (const square of unit.squares) {
      const digit = puzzle.cells[square] ?? null;
      if (digit === null) {
        continue;
      }
      const first = firstByDigit.get(digit);
      if (first === undefined) {
        firstByDigit.set(digit, square);
      } else {
        conflicts.push({ digit, squares: [first, square], unit });
      }
    }
  }
  return conflicts;
}

/**
 * Checks a finished board from scratch: every square holds one digit and every unit
 * holds each digit exactly once.
 */
export function isValidSolution(board: BoardState): boolean {
  const { topology } = board;
  for (const unit of topology.units) {
    const seen = new Set<number>();
    for (const square of unit.squares) {
      const value = board.getValue(square);
      if (value === null || seen.has(value)) {
        return false;
      }
      seen.add(value);
    }
    if (seen.size !== topology.size) {
      return false;
    }
  }
  return true;
}
