import type { ContradictionOutcome } from './outcomes.ts';
import type {
  Topology,
  Unit
} from './Topology.ts';

import { contradiction } from './outcomes.ts';
import {
  assertDigit,
  ensureNonNullable
} from './typeGuards.ts';

export interface MultipleCandidates {
  readonly squares: readonly number[];
  readonly type: 'multipleCandidates';
}

export interface OneCandidate {
  readonly square: number;
  readonly type: 'oneCandidate';
}

export type UnitPlacement = MultipleCandidates | OneCandidate;

/**
 * One point of the search space: the candidate digits still open for every square.
 *
 * Writes here never propagate. Use a `Propagator` to keep the board consistent.
 */
export class BoardState {
  public get assignedCount(): number {
    let count = 0;
    for (const candidates of this.candidates) {
      if (candidates.size === 1) {
        count++;
      }
    }
    return count;
  }

  private constructor(public readonly topology: Topology, private readonly candidates: readonly Set<number>[]) {
  }

  public static create(topology: Topology): BoardState {
    return new BoardState(topology, topology.squares.map(() => new Set(topology.digits)));
  }

  public candidateCount(square: number): number {
    return this.getCandidateSet(square).size;
  }

  public clone(): BoardState {
    return new BoardState(this.topology, this.candidates.map((candidates) => new Set(candidates)));
  }

  public countPlacesForValue(unit: Unit, digit: number): ContradictionOutcome | UnitPlacement {
    const squares = unit.squares.filter((square) => this.hasCandidate(square, digit));
    if (squares.length === 0) {
      return contradiction('unplaceableDigit', ensureNonNullable(unit.squares[0]), digit, unit);
    }
    if (squares.length === 1) {
      return { square: ensureNonNullable(squares[0]), type: 'oneCandidate' };
    }
    return { squares, type: 'multipleCandidates' };
  }

  public getCandidates(square: number): number[] {
    return [...this.getCandidateSet(square)].sort((a, b) => a - b);
  }

  public getValue(square: number): null | number {
    const candidates = this.getCandidateSet(square);
    if (candidates.size !== 1) {
      return null;
    }
    const [value] = candidates;
    return ensureNonNullable(value);
  }

  public hasCandidate(square: number, digit: number): boolean {
    return this.getCandidateSet(square).has(digit);
  }

  public isAssigned(square: number): boolean {
    return this.getCandidateSet(square).size === 1;
  }

  public removeCandidate(square: number, digit: number): boolean {
    return this.getCandidateSet(square).delete(digit);
  }

  public setCandidates(square: number, values: Iterable<number>): void {
    const candidates = this.getCandidateSet(square);
    candidates.clear();
    for (const v of values) {
      assertDigit(v, this.topology.size);
      candidates.add(v);
    }
  }

  private getCandidateSet(square: number): Set<number> {
    return ensureNonNullable(this.candidates[square], `Square index out of range: ${String(square)}`);
  }
}
