import type { Square } from './Topology.ts';

import {
  ensureNonNullable,
  isDigitChar
} from './typeGuards.ts';

export type PuzzleCell = null | number;

const CHAR_CODE_A = 65;

export function getSquareRef(row: number, column: number): string {
  return String.fromCharCode(CHAR_CODE_A + row) + String(column + 1);
}

/**
 * Reads `squareCount` squares from `text`. Line breaks are skipped when enough characters remain
 * without them; otherwise they count as blanks like any other non-digit.
 */
export function parsePuzzleText(text: string, squareCount: number): PuzzleCell[] {
  const withoutLineBreaks = [...text.replace(/[\r\n]/g, '')];
  const chars = withoutLineBreaks.length >= squareCount ? withoutLineBreaks : [...text];
  if (chars.length < squareCount) {
    throw new Error(`Puzzle must contain at least ${String(squareCount)} characters, got ${String(chars.length)}`);
  }
  return chars.slice(0, squareCount).map((ch) => isDigitChar(ch) ? parseInt(ch, 10) : null);
}

export function parseSquareRef(token: string): Square {
  const m = /^(?<row>[A-I])(?<column>[1-9])$/.exec(token.trim().toUpperCase());
  if (!m) {
    throw new Error(`Bad square ref: ${token}`);
  }
  const groups = ensureNonNullable(m.groups);
  return {
    column: parseInt(ensureNonNullable(groups['column']), 10) - 1,
    row: ensureNonNullable(groups['row']).charCodeAt(0) - CHAR_CODE_A
  };
}
