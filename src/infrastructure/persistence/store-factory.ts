/**
 * Rollout store factory
 * Picks the in-memory or file store from configuration
 */

import type { Logger } from 'pino';
import type { AppConfig } from '../../config';
import type { RolloutStore } from '../../domain/types';
import { FileRolloutStore } from './file-store';
import { InMemoryRolloutStore } from './memory-store';

export function createRolloutStore(config: Pick<AppConfig, 'state'>, logger: Logger): RolloutStore {
  logger.debug({ store: config.state.store, dir: config.state.dir }, 'Creating rollout store');
  if (config.state.store === 'memory') {
    return new InMemoryRolloutStore(logger);
  }
  return new FileRolloutStore(config.state.dir, logger);
}
