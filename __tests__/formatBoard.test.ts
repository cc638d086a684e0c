import {
  describe,
  expect,
  it
} from 'vitest';

import { BoardState } from '../src/BoardState.ts';
import {
  formatBoard,
  toGridString
} from '../src/formatBoard.ts';
import { Propagator } from '../src/propagation/Propagator.ts';
import { Topology } from '../src/Topology.ts';
import {
  createBoard,
  SOLUTION
} from './puzzleTestHelper.ts';

describe('formatBoard', () => {
  it('right-aligns each digit to width 6 by default', () => {
    const lines = formatBoard(createBoard(SOLUTION)).split('\n');
    expect(lines).toHaveLength(9);
    expect(lines[0]).toBe('     1      9      7      4      8      2      5      3      6');
    expect(lines[1]).toBe('     4      8      2      5      3      6      1      9      7');
  });

  it('takes a custom width', () => {
    const lines = formatBoard(createBoard(SOLUTION), { width: 2 }).split('\n');
    expect(lines[0]).toBe(' 1  9  7  4  8  2  5  3  6');
    expect(lines[8]).toBe(' 3  2  4  9  6  5  8  7  1');
  });

  it('prints compact rows at width 1', () => {
    const text = formatBoard(createBoard(SOLUTION), { width: 1 });
    expect(text.split('\n')[0]).toBe('1 9 7 4 8 2 5 3 6');
  });

  it('shows every remaining candidate of an unsolved square', () => {
    const board = BoardState.create(Topology.standard());
    new Propagator().assign(board, 0, 5);
    const lines = formatBoard(board).split('\n');
    expect(lines[0]).toBe('     5 12346789 12346789 12346789 12346789 12346789 12346789 12346789 12346789');
    expect(lines[1]).toBe('12346789 12346789 12346789 123456789 123456789 123456789 123456789 123456789 123456789');
  });
});

describe('toGridString', () => {
  it('writes a solved board as 81 digits', () => {
    expect(toGridString(createBoard(SOLUTION))).toBe(SOLUTION);
  });

  it('writes unsolved squares as dots', () => {
    const board = BoardState.create(Topology.standard());
    board.setCandidates(2, [8]);
    expect(toGridString(board)).toBe(`..8${'.'.repeat(78)}`);
  });
});
