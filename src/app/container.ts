/**
 * Dependency Container
 *
 * Builds the configuration, logger, history store and cluster client a CLI
 * command needs. Tests pass overrides for any of them.
 */

import type { Logger } from 'pino';
import { createLogger } from '../lib/logger';
import { createAppConfig, type AppConfig, type ConfigOverrides } from '../config';
import type { RolloutStore } from '../domain/types';
import {
  createKubernetesClient,
  type ClusterClient,
  type KubernetesClientOptions,
} from '../infrastructure/kubernetes';
import { createRolloutStore } from '../infrastructure/persistence';

/**
 * All application dependencies with their types
 */
export interface Deps {
  config: AppConfig;
  logger: Logger;
  store: RolloutStore;
  /** Created on first use so offline commands never read a kubeconfig */
  getClusterClient: () => ClusterClient;
}

export type DepsOverrides = Partial<Omit<Deps, 'getClusterClient'>> & {
  clusterClient?: ClusterClient;
};

/**
 * Create application container with all dependencies
 */
export function createContainer(configOverrides: ConfigOverrides = {}, depsOverrides: DepsOverrides = {}): Deps {
  const config = depsOverrides.config ?? createAppConfig(configOverrides);
  const logger =
    depsOverrides.logger ??
    createLogger({ name: 'kube-rollout', level: config.logging.level, pretty: config.logging.pretty });
  const store = depsOverrides.store ?? createRolloutStore(config, logger);

  let clusterClient = depsOverrides.clusterClient;
  const getClusterClient = (): ClusterClient => {
    if (!clusterClient) {
      const options: KubernetesClientOptions = {};
      if (config.kubernetes.kubeconfig) options.kubeconfig = config.kubernetes.kubeconfig;
      if (config.kubernetes.context) options.context = config.kubernetes.context;
      clusterClient = createKubernetesClient(logger, options);
    }
    return clusterClient;
  };

  logger.debug(
    { namespace: config.kubernetes.namespace, store: config.state.store, context: config.kubernetes.context },
    'Container created',
  );
  return { config, logger, store, getClusterClient };
}
