import {
  describe,
  expect,
  it
} from 'vitest';

import { BoardState } from '../src/BoardState.ts';
import { Puzzle } from '../src/Puzzle.ts';
import { Topology } from '../src/Topology.ts';
import {
  findConflictingGivens,
  isValidSolution
} from '../src/validation.ts';
import {
  createBoard,
  EASY_PUZZLE,
  EMPTY_PUZZLE,
  SOLUTION
} from './puzzleTestHelper.ts';

describe('isValidSolution', () => {
  it('accepts a complete grid with every unit a permutation', () => {
    expect(isValidSolution(createBoard(SOLUTION))).toBe(true);
  });

  it('rejects a board with open squares', () => {
    expect(isValidSolution(createBoard(EMPTY_PUZZLE))).toBe(false);
  });

  it('rejects singletons that repeat a digit in a unit', () => {
    const board = createBoard(SOLUTION);
    // Swapping A1 and A2 keeps row A whole but repeats 9 in column 1.
    board.setCandidates(0, [9]);
    board.setCandidates(1, [1]);
    expect(isValidSolution(board)).toBe(false);
  });

  it('rejects an empty square', () => {
    const board = createBoard(SOLUTION);
    board.setCandidates(40, []);
    expect(isValidSolution(board)).toBe(false);
  });

  it('checks boards of other sizes against their own digits', () => {
    const topology = Topology.create({ boxHeight: 2, boxWidth: 2 });
    const board = BoardState.create(topology);
    const grid = '1234341221434321';
    [...grid].forEach((ch, square) => {
      board.setCandidates(square, [parseInt(ch, 10)]);
    });
    expect(isValidSolution(board)).toBe(true);
  });
});

describe('findConflictingGivens', () => {
  it('returns nothing for consistent givens', () => {
    expect(findConflictingGivens(Puzzle.parse(EASY_PUZZLE))).toEqual([]);
  });

  it('reports each unit where a digit repeats', () => {
    const topology = Topology.standard();
    const conflicts = findConflictingGivens(Puzzle.parse(`55${'.'.repeat(79)}`));
    expect(conflicts).toEqual([
      { digit: 5, squares: [0, 1], unit: topology.rows[0] },
      { digit: 5, squares: [0, 1], unit: topology.boxes[0] }
    ]);
  });

  it('reports a repeat within a column', () => {
    const topology = Topology.standard();
    const conflicts = findConflictingGivens(Puzzle.parse(`7${'.'.repeat(71)}7${'.'.repeat(8)}`));
    expect(conflicts).toEqual([{ digit: 7, squares: [0, 72], unit: topology.columns[0] }]);
  });
});
