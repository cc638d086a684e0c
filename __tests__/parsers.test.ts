import {
  describe,
  expect,
  it
} from 'vitest';

import {
  getSquareRef,
  parsePuzzleText,
  parseSquareRef
} from '../src/parsers.ts';

describe('getSquareRef', () => {
  it('converts row 0 column 0 to A1', () => {
    expect(getSquareRef(0, 0)).toBe('A1');
  });

  it('puts the row letter first', () => {
    expect(getSquareRef(1, 4)).toBe('B5');
  });

  it('converts the last square to I9', () => {
    expect(getSquareRef(8, 8)).toBe('I9');
  });
});

describe('parseSquareRef', () => {
  it('parses A1', () => {
    expect(parseSquareRef('A1')).toEqual({ column: 0, row: 0 });
  });

  it('parses C7', () => {
    expect(parseSquareRef('C7')).toEqual({ column: 6, row: 2 });
  });

  it('is case-insensitive and trims', () => {
    expect(parseSquareRef(' e5 ')).toEqual({ column: 4, row: 4 });
  });

  it('throws for rows past I', () => {
    expect(() => parseSquareRef('J1')).toThrow('Bad square ref: J1');
  });

  it('throws for column 0', () => {
    expect(() => parseSquareRef('A0')).toThrow('Bad square ref');
  });

  it('throws for empty string', () => {
    expect(() => parseSquareRef('')).toThrow('Bad square ref');
  });
});

describe('parsePuzzleText', () => {
  it('maps digits to givens and everything else to blanks', () => {
    const cells = parsePuzzleText('1.3x0 9', 7);
    expect(cells).toEqual([1, null, 3, null, null, null, 9]);
  });

  it('ignores line breaks', () => {
    expect(parsePuzzleText('12\n3.\r\n', 4)).toEqual([1, 2, 3, null]);
  });

  it('treats line breaks as blanks when the text is too short without them', () => {
    expect(parsePuzzleText('1\n.3', 4)).toEqual([1, null, null, 3]);
  });

  it('reads only the first squareCount characters', () => {
    expect(parsePuzzleText('123456', 4)).toEqual([1, 2, 3, 4]);
  });

  it('throws when the text is too short', () => {
    expect(() => parsePuzzleText('.'.repeat(80), 81)).toThrow('Puzzle must contain at least 81 characters, got 80');
    expect(() => parsePuzzleText('12\n', 4)).toThrow('Puzzle must contain at least 4 characters, got 3');
  });
});
