import type { BoardState } from '../BoardState.ts';

export interface BranchStatus {
  readonly candidateCount: number;
  readonly square: number;
  readonly type: 'branch';
}

export type BoardStatus = BranchStatus | ContradictedStatus | SolvedStatus;

export interface ContradictedStatus {
  readonly square: number;
  readonly type: 'contradiction';
}

export interface SolvedStatus {
  readonly type: 'solved';
}

/**
 * Classifies a board in one pass over its squares.
 *
 * The branch square is the one with the fewest candidates above one. Ties go to the
 * lowest square index, which is the first square in row-major order.
 */
export function scanBoard(board: BoardState): BoardStatus {
  let assigned = 0;
  let branchSquare = -1;
  let branchCount = Infinity;

  for (let square = 0; square < board.topology.squareCount; square++) {
    const count = board.candidateCount(square);
    if (count === 0) {
      return { square, type: 'contradiction' };
    }
    if (count === 1) {
      assigned++;
    } else if (count < branchCount) {
      branchCount = count;
      branchSquare = square;
    }
  }

  if (assigned === board.topology.squareCount) {
    return { type: 'solved' };
  }
  return { candidateCount: branchCount, square: branchSquare, type: 'branch' };
}
