/**
 * Unified Application Configuration
 *
 * Single source of truth for configuration with Zod validation. Precedence is
 * CLI overrides, then environment variables, then the defaults below.
 */

import { z } from 'zod';
import { CanaryStepSchema, StrategyKindSchema } from '../domain/types';
import { ConfigError, formatIssues } from '../lib/errors';
import {
  DEFAULT_CANARY_STEPS,
  DEFAULT_HEALTH,
  DEFAULT_KUBERNETES,
  DEFAULT_STATE,
  DEFAULT_TIMEOUTS,
} from './defaults';

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info');

export const AppConfigSchema = z.object({
  logging: z.object({
    level: LogLevelSchema,
    pretty: z.boolean().default(false),
  }),
  kubernetes: z.object({
    kubeconfig: z.string().min(1).optional(),
    context: z.string().min(1).optional(),
    namespace: z.string().min(1).default(DEFAULT_KUBERNETES.namespace),
  }),
  rollout: z.object({
    strategy: StrategyKindSchema.default('rolling'),
    autoRollback: z.boolean().default(true),
    intervalMs: z.coerce.number().int().min(0).default(DEFAULT_TIMEOUTS.healthPoll),
    timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.rollout),
    successThreshold: z.coerce.number().int().positive().default(DEFAULT_HEALTH.successThreshold),
    failureThreshold: z.coerce.number().int().positive().default(DEFAULT_HEALTH.failureThreshold),
    scaleDownPrevious: z.boolean().default(true),
    previewService: z.boolean().default(false),
    canarySteps: z.array(CanaryStepSchema).min(1).default([...DEFAULT_CANARY_STEPS]),
  }),
  state: z.object({
    store: z.enum(['memory', 'file']).default(DEFAULT_STATE.store),
    dir: z.string().min(1).default(DEFAULT_STATE.dir),
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Values a caller (normally the CLI) may force over the environment
 */
export interface ConfigOverrides {
  logLevel?: string;
  pretty?: boolean;
  kubeconfig?: string;
  context?: string;
  namespace?: string;
  strategy?: string;
  autoRollback?: boolean;
  timeoutMs?: number;
  stateStore?: string;
  stateDir?: string;
}

type Env = Record<string, string | undefined>;

/**
 * Parse a boolean-ish environment value; unrecognised text is passed through so
 * schema validation reports it
 */
function envBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return value;
}

function envValue(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === '' ? undefined : value;
}

/**
 * Create configuration with environment variable and CLI overrides
 */
export function createAppConfig(overrides: ConfigOverrides = {}, env: Env = process.env): AppConfig {
  const rawConfig = {
    logging: {
      level: overrides.logLevel ?? envValue(env, 'LOG_LEVEL'),
      pretty: overrides.pretty ?? (envValue(env, 'NODE_ENV') === 'development' ? true : undefined),
    },
    kubernetes: {
      kubeconfig: overrides.kubeconfig ?? envValue(env, 'KUBECONFIG'),
      context: overrides.context ?? envValue(env, 'KUBE_CONTEXT'),
      namespace: overrides.namespace ?? envValue(env, 'ROLLOUT_NAMESPACE'),
    },
    rollout: {
      strategy: overrides.strategy ?? envValue(env, 'ROLLOUT_STRATEGY'),
      autoRollback: overrides.autoRollback ?? envBoolean(envValue(env, 'ROLLOUT_AUTO_ROLLBACK')),
      intervalMs: envValue(env, 'ROLLOUT_INTERVAL_MS'),
      timeoutMs: overrides.timeoutMs ?? envValue(env, 'ROLLOUT_TIMEOUT_MS'),
      successThreshold: envValue(env, 'ROLLOUT_SUCCESS_THRESHOLD'),
      failureThreshold: envValue(env, 'ROLLOUT_FAILURE_THRESHOLD'),
    },
    state: {
      store: overrides.stateStore ?? envValue(env, 'ROLLOUT_STATE_STORE'),
      dir: overrides.stateDir ?? envValue(env, 'ROLLOUT_STATE_DIR'),
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error.issues));
  }
  return result.data;
}
