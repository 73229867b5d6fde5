/**
 * JSON file rollout store
 *
 * Keeps `{ version: 1, records }` in `<dir>/history.json`. Writes go to a temp
 * file that is renamed over the target, and are serialized per store instance.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import {
  RolloutRecordSchema,
  describeError,
  nextRevisionOf,
  selectRecords,
  type RolloutFilter,
  type RolloutRecord,
  type RolloutStore,
} from '../../domain/types';
import { ErrorCodes, StoreError, formatIssues } from '../../lib/errors';

export const HISTORY_FILE = 'history.json';

const HistoryFileSchema = z.object({
  version: z.literal(1),
  records: z.array(RolloutRecordSchema),
});

// fs errors can come from another realm (Jest), so match on the code alone
const isMissingFile = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

export class FileRolloutStore implements RolloutStore {
  readonly file: string;
  private readonly logger: Logger;
  private pending: Promise<void> = Promise.resolve();

  constructor(dir: string, logger: Logger) {
    this.file = path.join(dir, HISTORY_FILE);
    this.logger = logger.child({ component: 'FileRolloutStore' });
  }

  async save(record: RolloutRecord): Promise<void> {
    const parsed = RolloutRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw new StoreError(
        `Refusing to save invalid rollout record: ${formatIssues(parsed.error.issues).join('; ')}`,
        ErrorCodes.STORE_WRITE_FAILED,
        { id: record.id },
      );
    }

    const run = this.pending.then(async () => {
      const records = await this.load();
      const index = records.findIndex((existing) => existing.id === parsed.data.id);
      if (index === -1) {
        records.push(parsed.data);
      } else {
        records[index] = parsed.data;
      }
      await this.write(records);
      this.logger.debug({ id: record.id, phase: record.phase, file: this.file }, 'Rollout record saved');
    });
    this.pending = run.catch((error: unknown) => {
      this.logger.debug({ error: describeError(error) }, 'Queued history write failed');
    });
    return run;
  }

  async get(id: string): Promise<RolloutRecord | null> {
    const records = await this.load();
    return records.find((record) => record.id === id) ?? null;
  }

  async list(filter?: RolloutFilter): Promise<RolloutRecord[]> {
    return selectRecords(await this.load(), filter);
  }

  async nextRevision(namespace: string, name: string): Promise<number> {
    return nextRevisionOf(await this.load(), namespace, name);
  }

  private async load(): Promise<RolloutRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.file, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw new StoreError(
        `Failed to read rollout history ${this.file}: ${describeError(error)}`,
        ErrorCodes.STORE_CORRUPT,
        { file: this.file },
        error instanceof Error ? error : undefined,
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StoreError(
        `Rollout history ${this.file} is not valid JSON`,
        ErrorCodes.STORE_CORRUPT,
        { file: this.file },
        error instanceof Error ? error : undefined,
      );
    }

    const parsed = HistoryFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new StoreError(
        `Rollout history ${this.file} is corrupt: ${formatIssues(parsed.error.issues).join('; ')}`,
        ErrorCodes.STORE_CORRUPT,
        { file: this.file },
      );
    }
    return parsed.data.records;
  }

  private async write(records: RolloutRecord[]): Promise<void> {
    const temp = `${this.file}.${process.pid}.${Date.now()}.tmp`;
    try {
      await mkdir(path.dirname(this.file), { recursive: true });
      await writeFile(temp, `${JSON.stringify({ version: 1, records }, null, 2)}\n`, 'utf-8');
      await rename(temp, this.file);
    } catch (error) {
      throw new StoreError(
        `Failed to write rollout history ${this.file}: ${describeError(error)}`,
        ErrorCodes.STORE_WRITE_FAILED,
        { file: this.file },
        error instanceof Error ? error : undefined,
      );
    }
  }
}
