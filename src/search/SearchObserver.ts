import type { BoardState } from '../BoardState.ts';
import type { Contradiction } from '../outcomes.ts';

export interface BranchEvent {
  readonly depth: number;
  readonly digit: number;
  readonly square: number;
}

/**
 * Receives search events. Every method is optional.
 */
export interface SearchObserver {
  onBranch?(event: BranchEvent): void;
  onContradiction?(event: BranchEvent, contradiction: Contradiction): void;
  onSolution?(board: BoardState, depth: number): void;
}
