/**
 * Workflow type definitions for rollout pipelines
 *
 * Step tracking and the parameter/result shapes of the rollout workflow.
 */

import type { Logger } from 'pino';
import type { ClusterClient } from '../infrastructure/kubernetes';
import type {
  ResolvedPlan,
  RolloutRecord,
  RolloutStore,
  TransitionRecord,
} from '../domain/types';
import type { ManifestBundle, TargetRequest } from '../manifests';
import type { ProbeRunner } from '../rollout/health';
import type { Sleep } from '../shared/async';

export type WorkflowStepStatus = 'pending' | 'running' | 'completed' | 'failed' | 'skipped';

/**
 * Individual step within a workflow execution
 *
 * Tracks the lifecycle and results of each stage so the CLI can report where a
 * rollout stopped.
 */
export interface WorkflowStep {
  name: string;
  status: WorkflowStepStatus;
  startTime?: Date;
  endTime?: Date;
  error?: string;
  output?: unknown;
}

export interface RolloutWorkflowParams {
  bundle: ManifestBundle;
  plan: ResolvedPlan;
  request: TargetRequest;
}

/**
 * Collaborators of a workflow run. Clock, sleep and probe runner default to the
 * real ones.
 */
export interface RolloutWorkflowContext {
  client: ClusterClient;
  store: RolloutStore;
  logger: Logger;
  signal?: AbortSignal;
  sleep?: Sleep;
  now?: () => Date;
  runProbe?: ProbeRunner;
  onTransition?: (transition: TransitionRecord) => void;
}

export interface RolloutWorkflowResult {
  success: boolean;
  record?: RolloutRecord;
  steps: WorkflowStep[];
  error?: string;
  duration: number;
}

export interface UndoParams {
  namespace: string;
  name: string;
  plan: ResolvedPlan;
}
