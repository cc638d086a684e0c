import type { BoardState } from './BoardState.ts';

export interface FormatBoardOptions {
  readonly width?: number;
}

const DEFAULT_CELL_WIDTH = 6;

/**
 * Renders one line per row. Each square shows its candidate digits right-aligned to `width`.
 */
export function formatBoard(board: BoardState, options: FormatBoardOptions = {}): string {
  const width = options.width ?? DEFAULT_CELL_WIDTH;
  return board.topology.rows
    .map((row) => row.squares.map((square) => board.getCandidates(square).join('').padStart(width)).join(' '))
    .join('\n');
}

export function toGridString(board: BoardState): string {
  return board.topology.squares
    .map((_, square) => board.getValue(square) ?? '.')
    .join('');
}
