import {
  describe,
  expect,
  it
} from 'vitest';

import { BoardState } from '../../src/BoardState.ts';
import { SingletonPropagationRule } from '../../src/propagation/SingletonPropagationRule.ts';
import { Topology } from '../../src/Topology.ts';
import {
  RecordingContext,
  square
} from '../puzzleTestHelper.ts';

describe('SingletonPropagationRule', () => {
  const rule = new SingletonPropagationRule();
  const topology = Topology.standard();

  it('queues nothing while the square keeps several candidates', () => {
    const board = BoardState.create(topology);
    board.setCandidates(0, [3, 8]);
    const context = new RecordingContext(board);

    expect(rule.afterElimination(context, 0)).toEqual({ type: 'consistent' });
    expect(context.eliminations).toEqual([]);
  });

  it('removes the remaining digit from every peer', () => {
    const board = BoardState.create(topology);
    board.setCandidates(square('D5'), [3]);
    const context = new RecordingContext(board);

    expect(rule.afterElimination(context, square('D5'))).toEqual({ type: 'consistent' });
    expect(context.eliminations).toEqual(
      topology.peersOf(square('D5')).map((peer) => ({ digit: 3, square: peer }))
    );
    expect(context.assignments).toEqual([]);
  });
});
