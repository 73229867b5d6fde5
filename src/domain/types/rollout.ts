/**
 * Rollout Types
 * Plan descriptor, lifecycle phases and persisted history records
 */

import { z } from 'zod';
import { KubernetesManifestSchema } from './kubernetes';

export const PLAN_API_VERSION = 'kube-rollout/v1';
export const PLAN_KIND = 'RolloutPlan';

export const StrategyKindSchema = z.enum(['rolling', 'blue-green', 'canary']);
export type StrategyKind = z.infer<typeof StrategyKindSchema>;

export const TrafficRoutingSchema = z.enum(['replicas', 'virtual-service']);
export type TrafficRouting = z.infer<typeof TrafficRoutingSchema>;

export const HttpProbeSchema = z.object({
  url: z.string().url(),
  expectStatus: z.number().int().min(100).max(599).optional(),
  timeoutMs: z.number().int().positive().optional(),
});
export type HttpProbe = z.infer<typeof HttpProbeSchema>;

export const CanaryStepSchema = z.union([
  z.object({ setWeight: z.number().int().min(1).max(100) }).strict(),
  z.object({ pause: z.object({ durationMs: z.number().int().positive() }).strict() }).strict(),
]);
export type CanaryStep = z.infer<typeof CanaryStepSchema>;

export const HealthSettingsSchema = z.object({
  intervalMs: z.number().int().min(0).optional(),
  timeoutMs: z.number().int().positive().optional(),
  successThreshold: z.number().int().positive().optional(),
  failureThreshold: z.number().int().positive().optional(),
  probes: z.array(HttpProbeSchema).optional(),
});
export type HealthSettings = z.infer<typeof HealthSettingsSchema>;

export const RolloutPlanSpecSchema = z.object({
  target: z
    .object({
      deployment: z.string().optional(),
      service: z.string().optional(),
      virtualService: z.string().optional(),
    })
    .default({}),
  strategy: StrategyKindSchema.optional(),
  image: z.string().min(1).optional(),
  container: z.string().min(1).optional(),
  autoRollback: z.boolean().optional(),
  health: HealthSettingsSchema.optional(),
  blueGreen: z
    .object({
      previewService: z.boolean().optional(),
      scaleDownPrevious: z.boolean().optional(),
    })
    .optional(),
  canary: z
    .object({
      trafficRouting: TrafficRoutingSchema.optional(),
      steps: z.array(CanaryStepSchema).min(1).optional(),
    })
    .optional()
    .refine(
      (canary) => {
        const steps = canary?.steps;
        if (!steps) return true;
        const last = steps[steps.length - 1];
        return last !== undefined && 'setWeight' in last;
      },
      { message: 'canary steps must end with a setWeight step' },
    ),
});
export type RolloutPlanSpec = z.infer<typeof RolloutPlanSpecSchema>;

export const RolloutPlanDocumentSchema = KubernetesManifestSchema.extend({
  apiVersion: z.literal(PLAN_API_VERSION),
  kind: z.literal(PLAN_KIND),
  spec: RolloutPlanSpecSchema,
});
export type RolloutPlanDocument = z.infer<typeof RolloutPlanDocumentSchema>;

export const ROLLOUT_PHASES = [
  'pending',
  'progressing',
  'paused',
  'promoting',
  'succeeded',
  'rolling-back',
  'rolled-back',
  'aborted',
  'failed',
] as const;
export const RolloutPhaseSchema = z.enum(ROLLOUT_PHASES);
export type RolloutPhase = z.infer<typeof RolloutPhaseSchema>;

export const RolloutEventTypeSchema = z.enum([
  'start',
  'pause',
  'resume',
  'promote',
  'complete',
  'fail',
  'abort',
  'rollback',
]);
export type RolloutEventType = z.infer<typeof RolloutEventTypeSchema>;

export const TransitionRecordSchema = z.object({
  from: RolloutPhaseSchema,
  to: RolloutPhaseSchema,
  event: RolloutEventTypeSchema,
  at: z.string(),
  reason: z.string().optional(),
});
export type TransitionRecord = z.infer<typeof TransitionRecordSchema>;

export const RolloutRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  namespace: z.string().min(1),
  strategy: StrategyKindSchema,
  revision: z.number().int().positive(),
  image: z.string().optional(),
  phase: RolloutPhaseSchema,
  message: z.string().optional(),
  startedAt: z.string(),
  finishedAt: z.string().optional(),
  transitions: z.array(TransitionRecordSchema),
  snapshot: z.array(KubernetesManifestSchema),
});
export type RolloutRecord = z.infer<typeof RolloutRecordSchema>;

/**
 * Fully resolved plan after config defaults, descriptor and CLI flags are merged
 */
export interface ResolvedPlan {
  strategy: StrategyKind;
  image?: string;
  container?: string;
  autoRollback: boolean;
  health: {
    intervalMs: number;
    timeoutMs: number;
    successThreshold: number;
    failureThreshold: number;
    probes: HttpProbe[];
  };
  blueGreen: {
    previewService: boolean;
    scaleDownPrevious: boolean;
  };
  canary: {
    trafficRouting: TrafficRouting;
    steps: CanaryStep[];
  };
}
