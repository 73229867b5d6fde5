/**
 * In-memory rollout store
 * Used by tests and when `ROLLOUT_STATE_STORE=memory`; records live for the process only
 */

import type { Logger } from 'pino';
import {
  nextRevisionOf,
  selectRecords,
  type RolloutFilter,
  type RolloutRecord,
  type RolloutStore,
} from '../../domain/types';

export class InMemoryRolloutStore implements RolloutStore {
  private readonly records = new Map<string, RolloutRecord>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'InMemoryRolloutStore' });
  }

  async save(record: RolloutRecord): Promise<void> {
    this.records.set(record.id, structuredClone(record));
    this.logger.debug({ id: record.id, phase: record.phase }, 'Rollout record saved');
  }

  async get(id: string): Promise<RolloutRecord | null> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async list(filter?: RolloutFilter): Promise<RolloutRecord[]> {
    return structuredClone(selectRecords([...this.records.values()], filter));
  }

  async nextRevision(namespace: string, name: string): Promise<number> {
    return nextRevisionOf([...this.records.values()], namespace, name);
  }
}
