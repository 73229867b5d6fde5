/**
 * Plain-text rendering for command output on stdout
 */

import { describeError, type RolloutRecord } from '../domain/types';
import { isRolloutError } from '../lib/errors';
import type { WorkflowStep } from '../workflows/types';

/**
 * One-line error for stderr; rollout errors carry their code
 */
export function formatErrorMessage(error: unknown): string {
  return isRolloutError(error) ? error.getUserMessage() : describeError(error);
}

export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length)),
  );
  const render = (cells: string[]): string =>
    cells
      .map((cell, column) => cell.padEnd(widths[column] ?? cell.length))
      .join('  ')
      .trimEnd();
  return [render(headers), ...rows.map(render)];
}

export function formatHistory(records: RolloutRecord[]): string[] {
  return formatTable(
    ['REVISION', 'NAMESPACE', 'NAME', 'STRATEGY', 'PHASE', 'IMAGE', 'STARTED'],
    records.map((record) => [
      String(record.revision),
      record.namespace,
      record.name,
      record.strategy,
      record.phase,
      record.image ?? '-',
      record.startedAt,
    ]),
  );
}

export function formatSteps(steps: WorkflowStep[]): string[] {
  return formatTable(
    ['STEP', 'STATUS', 'DETAIL'],
    steps.map((step) => [step.name, step.status, step.error ?? '']),
  );
}

export function formatRecordSummary(record: RolloutRecord): string {
  const base = `${record.namespace}/${record.name} revision ${record.revision} (${record.strategy}): ${record.phase}`;
  return record.message ? `${base} - ${record.message}` : base;
}
