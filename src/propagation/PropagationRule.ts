import type { BoardState } from '../BoardState.ts';
import type { PropagationOutcome } from '../outcomes.ts';

export interface PropagationContext {
  readonly board: BoardState;
  enqueueAssignment(square: number, digit: number): void;
  enqueueElimination(square: number, digit: number): void;
}

/**
 * A deduction triggered after `digit` has been removed from `square`.
 * Rules only queue further work; they never write to the board themselves.
 */
export interface PropagationRule {
  afterElimination(context: PropagationContext, square: number, digit: number): PropagationOutcome;
}
