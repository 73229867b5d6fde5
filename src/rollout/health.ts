/**
 * Health Poller
 *
 * Polls a Deployment until it is rolled out and every HTTP probe answers, or
 * until it fails, times out or the caller aborts.
 */

import type { Logger } from 'pino';
import type { ClusterClient } from '../infrastructure/kubernetes';
import { describeError, type DeploymentStatus, type HttpProbe } from '../domain/types';
import { DEFAULT_TIMEOUTS } from '../config/defaults';
import { sleep as defaultSleep, type Sleep } from '../shared/async';

export type ReadinessState = 'ready' | 'progressing' | 'failed';

export interface Readiness {
  state: ReadinessState;
  message: string;
}

export type HealthOutcome = 'healthy' | 'unhealthy' | 'timeout' | 'aborted';

export interface ProbeResult {
  url: string;
  ok: boolean;
  status?: number;
  error?: string;
}

export interface HealthReport {
  outcome: HealthOutcome;
  message: string;
  attempts: number;
  elapsedMs: number;
  status?: DeploymentStatus;
  probes: ProbeResult[];
}

export type ProbeRunner = (probe: HttpProbe, signal?: AbortSignal) => Promise<ProbeResult>;

export interface HealthCheckOptions {
  client: Pick<ClusterClient, 'getDeploymentStatus'>;
  namespace: string;
  name: string;
  intervalMs: number;
  timeoutMs: number;
  successThreshold: number;
  failureThreshold: number;
  probes?: HttpProbe[];
  logger: Logger;
  signal?: AbortSignal;
  now?: () => number;
  sleep?: Sleep;
  runProbe?: ProbeRunner;
}

/**
 * Classify a Deployment the way `kubectl rollout status` does
 */
export function evaluateDeploymentReadiness(status: DeploymentStatus): Readiness {
  const { name } = status;

  if (status.observedGeneration < status.generation) {
    return { state: 'progressing', message: `Waiting for deployment ${name} spec update to be observed` };
  }

  const progressing = status.conditions.find((condition) => condition.type === 'Progressing');
  if (progressing?.reason === 'ProgressDeadlineExceeded') {
    return { state: 'failed', message: `Deployment ${name} exceeded its progress deadline` };
  }

  if (status.updatedReplicas < status.desiredReplicas) {
    return {
      state: 'progressing',
      message: `Waiting for deployment ${name}: ${status.updatedReplicas} of ${status.desiredReplicas} new replicas updated`,
    };
  }

  if (status.replicas > status.updatedReplicas) {
    return {
      state: 'progressing',
      message: `Waiting for deployment ${name}: ${status.replicas - status.updatedReplicas} old replicas pending termination`,
    };
  }

  if (status.availableReplicas < status.updatedReplicas) {
    return {
      state: 'progressing',
      message: `Waiting for deployment ${name}: ${status.availableReplicas} of ${status.updatedReplicas} updated replicas available`,
    };
  }

  return { state: 'ready', message: `Deployment ${name} successfully rolled out` };
}

/**
 * HTTP GET a probe URL; 2xx/3xx pass unless an exact status is expected
 */
export const httpProbe: ProbeRunner = async (probe, signal) => {
  const controller = new AbortController();
  const onAbort = (): void => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });
  const timer = setTimeout(() => controller.abort(), probe.timeoutMs ?? DEFAULT_TIMEOUTS.httpProbe);

  try {
    const response = await fetch(probe.url, { method: 'GET', signal: controller.signal });
    const ok =
      probe.expectStatus !== undefined
        ? response.status === probe.expectStatus
        : response.status >= 200 && response.status < 400;
    return { url: probe.url, ok, status: response.status };
  } catch (error) {
    return { url: probe.url, ok: false, error: describeError(error) };
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
};

const describeProbe = (probe: ProbeResult): string =>
  `${probe.url} ${probe.status !== undefined ? `returned ${probe.status}` : `failed: ${probe.error ?? 'unknown error'}`}`;

/**
 * Poll until healthy, unhealthy, timed out or aborted.
 *
 * A check succeeds when the Deployment is ready and every probe passes; it fails
 * when the status cannot be read or a probe fails. Progressing checks reset the
 * success streak only. A ProgressDeadlineExceeded condition is unhealthy at once.
 */
export async function pollDeploymentHealth(options: HealthCheckOptions): Promise<HealthReport> {
  const {
    client,
    namespace,
    name,
    intervalMs,
    timeoutMs,
    successThreshold,
    failureThreshold,
    probes = [],
    logger,
    signal,
    now = Date.now,
    sleep = defaultSleep,
    runProbe = httpProbe,
  } = options;

  const startedAt = now();
  let attempts = 0;
  let successes = 0;
  let failures = 0;
  let message = `Waiting for deployment ${name}`;
  let status: DeploymentStatus | undefined;
  let probeResults: ProbeResult[] = [];

  const report = (outcome: HealthOutcome, text: string): HealthReport => {
    const result: HealthReport = {
      outcome,
      message: text,
      attempts,
      elapsedMs: now() - startedAt,
      probes: probeResults,
    };
    if (status) result.status = status;
    logger.debug({ namespace, name, outcome, attempts }, 'Health check finished');
    return result;
  };

  for (;;) {
    if (signal?.aborted) {
      return report('aborted', `Health check for ${name} aborted`);
    }

    attempts++;
    const result = await client.getDeploymentStatus(namespace, name);
    if (!result.ok) {
      failures++;
      successes = 0;
      message = result.error;
    } else {
      status = result.value;
      const readiness = evaluateDeploymentReadiness(status);
      message = readiness.message;

      if (readiness.state === 'failed') {
        return report('unhealthy', message);
      }

      if (readiness.state === 'ready') {
        probeResults = await Promise.all(probes.map((probe) => runProbe(probe, signal)));
        const failed = probeResults.filter((probe) => !probe.ok);
        if (failed.length === 0) {
          successes++;
          failures = 0;
          if (successes >= successThreshold) {
            return report('healthy', message);
          }
        } else {
          successes = 0;
          failures++;
          message = `Probe failed: ${failed.map(describeProbe).join(', ')}`;
        }
      } else {
        successes = 0;
      }
    }

    logger.debug({ namespace, name, attempts, successes, failures, message }, 'Health check');

    // aborting cancels in-flight probes, which then report a failure
    if (signal?.aborted) {
      return report('aborted', `Health check for ${name} aborted`);
    }
    if (failures >= failureThreshold) {
      return report('unhealthy', message);
    }
    if (now() - startedAt >= timeoutMs) {
      return report('timeout', `Timed out after ${timeoutMs}ms: ${message}`);
    }

    await sleep(intervalMs, signal);
  }
}
