import type { Logger } from 'pino';
import type { ClusterClient } from '../../infrastructure/kubernetes';
import type { ResolvedPlan, RolloutPhase, StrategyKind } from '../../domain/types';
import type { RolloutTarget } from '../../manifests';
import type { Sleep } from '../../shared/async';
import type { HealthReport } from '../health';
import type { RolloutStateMachine } from '../state-machine';

export interface StrategyContext {
  client: ClusterClient;
  target: RolloutTarget;
  plan: ResolvedPlan;
  machine: RolloutStateMachine;
  logger: Logger;
  sleep: Sleep;
  /** Poll a Deployment in the target namespace with the plan's health settings */
  checkHealth: (deployment: string) => Promise<HealthReport>;
  signal?: AbortSignal;
}

export interface StrategyResult {
  phase: RolloutPhase;
  message: string;
}

export interface RolloutStrategy {
  readonly kind: StrategyKind;
  /** Throw a PlanError when the target cannot be rolled out this way */
  validate(target: RolloutTarget, plan: ResolvedPlan): void;
  /** Human-readable steps, used by `plan` */
  describe(target: RolloutTarget, plan: ResolvedPlan): string[];
  execute(context: StrategyContext): Promise<StrategyResult>;
}
