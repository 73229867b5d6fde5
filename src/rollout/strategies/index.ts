import type { StrategyKind } from '../../domain/types';
import { BlueGreenStrategy } from './blue-green';
import { CanaryStrategy } from './canary';
import { RollingStrategy } from './rolling';
import type { RolloutStrategy } from './types';

export { BlueGreenStrategy, activeSlot } from './blue-green';
export { CanaryStrategy } from './canary';
export { RollingStrategy } from './rolling';
export type { RolloutStrategy, StrategyContext, StrategyResult } from './types';

export function createStrategy(kind: StrategyKind): RolloutStrategy {
  switch (kind) {
    case 'rolling':
      return new RollingStrategy();
    case 'blue-green':
      return new BlueGreenStrategy();
    case 'canary':
      return new CanaryStrategy();
  }
}
