import type { BoardState } from '../BoardState.ts';
import type { PropagationOutcome } from '../outcomes.ts';
import type {
  PropagationContext,
  PropagationRule
} from './PropagationRule.ts';

import {
  CONSISTENT,
  contradiction
} from '../outcomes.ts';
import { assertDigit } from '../typeGuards.ts';
import { createDefaultRules } from './createDefaultRules.ts';

interface Elimination {
  readonly digit: number;
  readonly square: number;
}

/**
 * Drives a board to a fixed point with a FIFO queue of pending eliminations.
 *
 * A run stops at the first contradiction and leaves the board partially updated.
 * Callers discard the board in that case.
 */
export class PropagationRun implements PropagationContext {
  public get eliminationCount(): number {
    return this._eliminationCount;
  }

  public get pendingCount(): number {
    return this.queue.length - this.head;
  }

  private _eliminationCount = 0;
  private head = 0;
  private readonly queue: Elimination[] = [];

  public constructor(public readonly board: BoardState, private readonly rules: readonly PropagationRule[]) {
  }

  public enqueueAssignment(square: number, digit: number): void {
    assertDigit(digit, this.board.topology.size);
    for (const other of this.board.getCandidates(square)) {
      if (other !== digit) {
        this.queue.push({ digit: other, square });
      }
    }
  }

  public enqueueElimination(square: number, digit: number): void {
    assertDigit(digit, this.board.topology.size);
    this.queue.push({ digit, square });
  }

  public run(): PropagationOutcome {
    let outcome = this.step();
    while (outcome !== null) {
      if (outcome.type === 'contradiction') {
        return outcome;
      }
      outcome = this.step();
    }
    return CONSISTENT;
  }

  /**
   * Processes one queued elimination. Returns `null` once the queue is empty.
   */
  public step(): null | PropagationOutcome {
    const next = this.queue[this.head];
    if (next === undefined) {
      this.clear();
      return null;
    }
    this.head++;

    const { digit, square } = next;
    if (!this.board.hasCandidate(square, digit)) {
      return CONSISTENT;
    }
    if (this.board.candidateCount(square) === 1) {
      this.clear();
      return contradiction('emptySquare', square, digit);
    }
    this.board.removeCandidate(square, digit);
    this._eliminationCount++;

    for (const rule of this.rules) {
      const outcome = rule.afterElimination(this, square, digit);
      if (outcome.type === 'contradiction') {
        this.clear();
        return outcome;
      }
    }
    return CONSISTENT;
  }

  private clear(): void {
    this.queue.length = 0;
    this.head = 0;
  }
}

export class Propagator {
  public constructor(private readonly rules: readonly PropagationRule[] = createDefaultRules()) {
  }

  public assign(board: BoardState, square: number, digit: number): PropagationOutcome {
    const run = this.begin(board);
    run.enqueueAssignment(square, digit);
    return run.run();
  }

  public begin(board: BoardState): PropagationRun {
    return new PropagationRun(board, this.rules);
  }

  public eliminate(board: BoardState, square: number, digit: number): PropagationOutcome {
    const run = this.begin(board);
    run.enqueueElimination(square, digit);
    return run.run();
  }
}
