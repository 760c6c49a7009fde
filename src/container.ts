/**
 * Dependency Injection Container
 *
 * Builds every collaborator once from the configuration object.
 */

import type { Logger } from 'pino';
import type { ClusterTarget } from './types';
import { createLogger } from './lib/logger';
import { createAppConfig, type AppConfig } from './config/app-config';
import {
  createConsoleEcho,
  createProcessExecutor,
  type LineSink,
  type ProcessExecutor,
} from './infra/process/executor';
import { createAzureCli, type AzureCli } from './infra/azure/az-cli';
import { createKeyVaultClient, type VaultClient } from './infra/azure/key-vault';
import { createResourceDiscovery, type ResourceDiscovery } from './infra/azure/resources';
import { createRemoteInvoker, type RemoteInvoker } from './infra/azure/remote-invoker';
import { createChartPackager, type ChartPackager } from './infra/helm/chart-packager';
import { createRemoteOps, type RemoteOps } from './infra/kubernetes/remote-ops';

/**
 * Application dependencies
 */
export interface Dependencies {
  config: AppConfig;
  logger: Logger;
  executor: ProcessExecutor;
  az: AzureCli;
  vault: VaultClient;
  discovery: ResourceDiscovery;
  packager: ChartPackager;
  /** Invoker and remote operations bound to one cluster */
  cluster: (target: ClusterTarget) => { invoker: RemoteInvoker; ops: RemoteOps };
}

export interface DependencyOverrides {
  logger?: Logger;
  echo?: LineSink;
  executor?: ProcessExecutor;
}

/**
 * Create application dependencies
 */
export function createDependencies(
  config: AppConfig = createAppConfig({}),
  overrides: DependencyOverrides = {},
): Dependencies {
  const logger =
    overrides.logger ??
    createLogger({
      level: config.runtime.logLevel,
      pretty: config.runtime.nodeEnv === 'development',
    });

  const executor =
    overrides.executor ??
    createProcessExecutor({ logger, echo: overrides.echo ?? createConsoleEcho() });
  const az = createAzureCli(executor, config.azure.cliPath);

  return {
    config,
    logger,
    executor,
    az,
    vault: createKeyVaultClient(az, logger),
    discovery: createResourceDiscovery(az),
    packager: createChartPackager({ executor, logger, helmPath: config.chart.helmPath }),
    cluster(target) {
      const invoker = createRemoteInvoker(az, target, logger);
      return { invoker, ops: createRemoteOps(invoker, logger) };
    },
  };
}
