/**
 * Rollout store interface
 * Contract for persisting rollout history records
 */

import type { RolloutRecord } from './rollout';

export interface RolloutFilter {
  namespace?: string;
  name?: string;
  limit?: number;
}

export interface RolloutStore {
  /** Insert or replace by id */
  save(record: RolloutRecord): Promise<void>;
  get(id: string): Promise<RolloutRecord | null>;
  /** Newest first */
  list(filter?: RolloutFilter): Promise<RolloutRecord[]>;
  nextRevision(namespace: string, name: string): Promise<number>;
}

export function matchesFilter(record: RolloutRecord, filter: RolloutFilter = {}): boolean {
  return (
    (filter.namespace === undefined || record.namespace === filter.namespace) &&
    (filter.name === undefined || record.name === filter.name)
  );
}

export function newestFirst(a: RolloutRecord, b: RolloutRecord): number {
  if (a.startedAt !== b.startedAt) {
    return a.startedAt < b.startedAt ? 1 : -1;
  }
  return b.revision - a.revision;
}

/**
 * Apply a filter, newest-first ordering and the limit
 */
export function selectRecords(records: readonly RolloutRecord[], filter: RolloutFilter = {}): RolloutRecord[] {
  const selected = records.filter((record) => matchesFilter(record, filter)).sort(newestFirst);
  return filter.limit === undefined ? selected : selected.slice(0, filter.limit);
}

export function nextRevisionOf(records: readonly RolloutRecord[], namespace: string, name: string): number {
  return (
    records
      .filter((record) => record.namespace === namespace && record.name === name)
      .reduce((max, record) => Math.max(max, record.revision), 0) + 1
  );
}
