import type { PropagationOutcome } from '../outcomes.ts';
import type {
  PropagationContext,
  PropagationRule
} from './PropagationRule.ts';

import { CONSISTENT } from '../outcomes.ts';

export class SingletonPropagationRule implements PropagationRule {
  public afterElimination(context: PropagationContext, square: number): PropagationOutcome {
    const value = context.board.getValue(square);
    if (value === null) {
      return CONSISTENT;
    }
    for (const peer of context.board.topology.peersOf(square)) {
      context.enqueueElimination(peer, value);
    }
    return CONSISTENT;
  }
}
