/**
 * Main export file for library consumption
 * Manifest loading, rollout strategies, health polling and history stores
 */

export * from './domain/types';
export * from './manifests';
export * from './rollout';
export {
  ROLLOUT_STEPS,
  runRolloutWorkflow,
  undoRollout,
  type RolloutStepName,
} from './workflows/rollout';
export type {
  RolloutWorkflowContext,
  RolloutWorkflowParams,
  RolloutWorkflowResult,
  UndoParams,
  WorkflowStep,
} from './workflows/types';
export { createKubernetesClient, type ClusterClient, type KubernetesClientOptions } from './infrastructure/kubernetes';
export { FileRolloutStore, InMemoryRolloutStore, createRolloutStore } from './infrastructure/persistence';
export { AppConfigSchema, createAppConfig, type AppConfig, type ConfigOverrides } from './config';
export { createLogger, createTimer, type Logger } from './lib/logger';
export * from './lib/errors';
