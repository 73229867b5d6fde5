/**
 * Rollout State Machine
 *
 * Owns the lifecycle phase of one rollout. Every accepted event is appended to
 * the transition history and emitted as a `transition` event.
 */

import { EventEmitter } from 'node:events';
import type { RolloutEventType, RolloutPhase, TransitionRecord } from '../domain/types';
import { InvalidTransitionError } from '../lib/errors';

type TransitionTable = Readonly<Record<RolloutPhase, Partial<Record<RolloutEventType, RolloutPhase>>>>;

const TRANSITIONS: TransitionTable = {
  pending: { start: 'progressing', abort: 'aborted', fail: 'failed' },
  progressing: {
    pause: 'paused',
    promote: 'promoting',
    fail: 'failed',
    abort: 'rolling-back',
    rollback: 'rolling-back',
  },
  paused: { resume: 'progressing', fail: 'failed', abort: 'rolling-back', rollback: 'rolling-back' },
  promoting: { complete: 'succeeded', fail: 'failed', abort: 'rolling-back', rollback: 'rolling-back' },
  'rolling-back': { complete: 'rolled-back', fail: 'failed' },
  failed: { rollback: 'rolling-back' },
  succeeded: {},
  'rolled-back': {},
  aborted: {},
};

export const TERMINAL_PHASES: ReadonlySet<RolloutPhase> = new Set(['succeeded', 'rolled-back', 'aborted']);

export type TransitionListener = (transition: TransitionRecord) => void;

export class RolloutStateMachine {
  private current: RolloutPhase = 'pending';
  private readonly records: TransitionRecord[] = [];
  private readonly emitter = new EventEmitter();
  private abortRequested = false;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  get phase(): RolloutPhase {
    return this.current;
  }

  get history(): TransitionRecord[] {
    return this.records.map((record) => ({ ...record }));
  }

  /** Whether the phase is succeeded, rolled-back or aborted */
  isTerminal(): boolean {
    return TERMINAL_PHASES.has(this.current);
  }

  can(event: RolloutEventType): boolean {
    return TRANSITIONS[this.current][event] !== undefined;
  }

  /**
   * Apply an event and return the new phase
   */
  dispatch(event: RolloutEventType, reason?: string): RolloutPhase {
    const from = this.current;
    let to = TRANSITIONS[from][event];
    if (to === undefined) {
      throw new InvalidTransitionError(from, event);
    }

    if (event === 'abort') {
      this.abortRequested = true;
    } else if (event === 'rollback') {
      this.abortRequested = false;
    }
    // A rollback entered through abort settles as aborted
    if (from === 'rolling-back' && event === 'complete' && this.abortRequested) {
      to = 'aborted';
    }

    const record: TransitionRecord = { from, to, event, at: this.clock().toISOString() };
    if (reason !== undefined) record.reason = reason;

    this.current = to;
    this.records.push(record);
    this.emitter.emit('transition', { ...record });
    return to;
  }

  /** Subscribe to transitions; returns the unsubscribe function */
  onTransition(listener: TransitionListener): () => void {
    this.emitter.on('transition', listener);
    return () => {
      this.emitter.off('transition', listener);
    };
  }
}
