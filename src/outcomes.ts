import type {
  Topology,
  Unit
} from './Topology.ts';

/**
 * Why a board state can no longer be completed.
 *
 * - `emptySquare`: eliminating the digit would leave the square without candidates.
 * - `unplaceableDigit`: no square of the unit still admits the digit.
 */
export type ContradictionReason = 'emptySquare' | 'unplaceableDigit';

export interface Contradiction {
  readonly digit: number;
  readonly kind: 'noRemainingValues';
  readonly reason: ContradictionReason;
  readonly square: number;
  readonly unit?: Unit;
}

export interface ConsistentOutcome {
  readonly type: 'consistent';
}

export interface ContradictionOutcome {
  readonly contradiction: Contradiction;
  readonly type: 'contradiction';
}

export type PropagationOutcome = ConsistentOutcome | ContradictionOutcome;

export const CONSISTENT: ConsistentOutcome = Object.freeze({ type: 'consistent' });

export function contradiction(reason: ContradictionReason, square: number, digit: number, unit?: Unit): ContradictionOutcome {
  return {
    contradiction: {
      digit,
      kind: 'noRemainingValues',
      reason,
      square,
      ...unit !== undefined && { unit }
    },
    type: 'contradiction'
  };
}

export function describeContradiction(topology: Topology, value: Contradiction): string {
  if (value.reason === 'unplaceableDigit' && value.unit) {
    return `${value.unit.toString()} has no place left for ${String(value.digit)}`;
  }
  return `${topology.ref(value.square)} has no candidates left after removing ${String(value.digit)}`;
}
