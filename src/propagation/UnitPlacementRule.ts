import type { PropagationOutcome } from '../outcomes.ts';
import type {
  PropagationContext,
  PropagationRule
} from './PropagationRule.ts';

import { CONSISTENT } from '../outcomes.ts';

export class UnitPlacementRule implements PropagationRule {
  public afterElimination(context: PropagationContext, square: number, digit: number): PropagationOutcome {
    const { board } = context;
    for (const unit of board.topology.unitsOf(square)) {
      const placement = board.countPlacesForValue(unit, digit);
      switch (placement.type) {
        case 'contradiction':
          return placement;
        case 'multipleCandidates':
          break;
        case 'oneCandidate':
          context.enqueueAssignment(placement.square, digit);
          break;
        default: {
          const exhaustive: never = placement;
          throw new Error(`Unknown placement: ${String(exhaustive)}`);
        }
      }
    }
    return CONSISTENT;
  }
}
