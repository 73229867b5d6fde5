/**
 * Centralized Configuration Defaults
 */

import type { CanaryStep } from '../domain/types';

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  rollout: 300000, // 5 minutes per health wait
  healthPoll: 2000, // between deployment status checks
  httpProbe: 5000,
  shutdown: 10000,
} as const;

export const DEFAULT_HEALTH = {
  successThreshold: 1,
  failureThreshold: 3,
} as const;

export const DEFAULT_CANARY_STEPS: readonly CanaryStep[] = [
  { setWeight: 20 },
  { pause: { durationMs: 30000 } },
  { setWeight: 50 },
  { pause: { durationMs: 30000 } },
  { setWeight: 100 },
];

export const DEFAULT_KUBERNETES = {
  namespace: 'default',
} as const;

export const DEFAULT_STATE = {
  store: 'file',
  dir: '.kube-rollout',
} as const;

/**
 * Labels and annotations kube-rollout writes onto managed resources
 */
export const ROLLOUT_LABELS = {
  slot: 'kube-rollout/slot',
  track: 'kube-rollout/track',
  revision: 'kube-rollout/revision',
  managedBy: 'app.kubernetes.io/managed-by',
} as const;

export const MANAGER_NAME = 'kube-rollout';
