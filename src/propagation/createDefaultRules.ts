import type { PropagationRule } from './PropagationRule.ts';

import { SingletonPropagationRule } from './SingletonPropagationRule.ts';
import { UnitPlacementRule } from './UnitPlacementRule.ts';

export function createDefaultRules(): PropagationRule[] {
  return [
    new SingletonPropagationRule(),
    new UnitPlacementRule()
  ];
}
