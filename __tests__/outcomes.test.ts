import {
  describe,
  expect,
  it
} from 'vitest';

import {
  CONSISTENT,
  contradiction,
  describeContradiction
} from '../src/outcomes.ts';
import { Topology } from '../src/Topology.ts';
import { ensureNonNullable } from '../src/typeGuards.ts';

describe('outcomes', () => {
  const topology = Topology.standard();

  it('shares one frozen consistent outcome', () => {
    expect(CONSISTENT).toEqual({ type: 'consistent' });
    expect(Object.isFrozen(CONSISTENT)).toBe(true);
  });

  it('omits the unit for an empty square', () => {
    expect(contradiction('emptySquare', 1, 9)).toEqual({
      contradiction: { digit: 9, kind: 'noRemainingValues', reason: 'emptySquare', square: 1 },
      type: 'contradiction'
    });
  });

  it('describes an empty square by its ref', () => {
    const { contradiction: value } = contradiction('emptySquare', 1, 9);
    expect(describeContradiction(topology, value)).toBe('A2 has no candidates left after removing 9');
  });

  it('describes an unplaceable digit by its unit', () => {
    const box = ensureNonNullable(topology.boxes[8]);
    const { contradiction: value } = contradiction('unplaceableDigit', 60, 6, box);
    expect(describeContradiction(topology, value)).toBe('Box 9 has no place left for 6');
  });
});
