/**
 * deploy / deploy-chart commands
 */

import path from 'node:path';
import { Command } from 'commander';
import type { SecretSet } from '@/types';
import type { AppConfig } from '@/config';
import { SECRET_NAMES } from '@/config';
import { baselineManifestPaths, deploy } from '@/workflows/deploy';
import { loadSecretsFile } from '@/workflows/secrets/sources';
import { requireKubernetesName } from '@/lib/shell';
import { renderSecretReport, renderStages } from '../render';
import { DeployChartOptionsSchema, DeployOptionsSchema } from '../validation';
import { runCommand, type CommandContext } from './context';

/**
 * Storage credentials from configuration, keyed by their secret names
 */
export function configSecretValues(config: AppConfig): SecretSet {
  const values: Record<string, string> = {};
  if (config.azure.storageAccountName) {
    values[SECRET_NAMES.storageAccountName] = config.azure.storageAccountName;
  }
  if (config.azure.storageAccountKey) {
    values[SECRET_NAMES.storageAccountKey] = config.azure.storageAccountKey;
  }
  return values;
}

export const clusterDefaults = (config: AppConfig): Record<string, unknown> => ({
  resourceGroup: config.azure.resourceGroup,
  clusterName: config.azure.clusterName,
  namespace: config.deploy.namespace,
  release: config.deploy.release,
  keyVault: config.azure.keyVault,
});

export function createDeployCommand(ctx: CommandContext): Command {
  return new Command('deploy')
    .description('Deploy Supabase to AKS: add-on, secrets, manifests, chart')
    .option('--resource-group <name>', 'resource group of the cluster')
    .option('--cluster-name <name>', 'AKS cluster name')
    .option('--namespace <namespace>', 'target namespace')
    .option('--release <name>', 'Helm release name')
    .option('--key-vault <name>', 'Key Vault to synchronize secrets into')
    .option('--values-file <path>', 'Helm values file')
    .option('--secrets-file <path>', 'JSON object of secret names to values')
    .option('--generate-default-secrets', 'generate defaults for secrets not supplied')
    .action(async (_options: unknown, command: Command) => {
      await runCommand(ctx, command, DeployOptionsSchema, clusterDefaults, async (options, deps) => {
        const target = { resourceGroup: options.resourceGroup, clusterName: options.clusterName };
        const { invoker, ops } = deps.cluster(target);
        const fileValues = options.secretsFile
          ? await loadSecretsFile(path.resolve(options.secretsFile))
          : {};

        const result = await deploy(
          {
            invoker,
            ops,
            packager: deps.packager,
            secretDeps: { vault: deps.vault, discovery: deps.discovery, logger: deps.logger },
            secretRequest: {
              vault: options.keyVault,
              resourceGroup: options.resourceGroup,
              clusterName: options.clusterName,
              fileValues,
              configValues: configSecretValues(deps.config),
              generateDefaults: options.generateDefaultSecrets,
              skipRoleAssignment: false,
            },
            chartSource: deps.config.chart,
            manifests: baselineManifestPaths(deps.config.deploy.manifestDir),
            namespace: options.namespace,
            release: options.release,
            valuesFile: path.resolve(options.valuesFile),
            timeout: deps.config.deploy.installTimeout,
            logger: deps.logger,
          },
          { onStage: (report) => deps.logger.debug({ report }, 'Stage finished') },
        );

        renderStages(result.stages).forEach(ctx.print);
        if (result.outputs.secrets) {
          renderSecretReport(result.outputs.secrets).forEach(ctx.print);
        }
        if (result.outputs.installLog) {
          ctx.print(result.outputs.installLog);
        }
      });
    });
}

export function createDeployChartCommand(ctx: CommandContext): Command {
  return new Command('deploy-chart')
    .description('Install a pre-packaged chart on AKS')
    .option('--resource-group <name>', 'resource group of the cluster')
    .option('--cluster-name <name>', 'AKS cluster name')
    .option('--namespace <namespace>', 'target namespace')
    .option('--release <name>', 'Helm release name')
    .option('--chart-tgz <path>', 'path to supabase-*.tgz')
    .option('--values-file <path>', 'Helm values file')
    .action(async (_options: unknown, command: Command) => {
      await runCommand(ctx, command, DeployChartOptionsSchema, clusterDefaults, async (options, deps) => {
        requireKubernetesName('namespace', options.namespace);
        requireKubernetesName('release', options.release);
        const { ops } = deps.cluster({
          resourceGroup: options.resourceGroup,
          clusterName: options.clusterName,
        });
        const log = await ops.installChart({
          namespace: options.namespace,
          release: options.release,
          chartPackage: path.resolve(options.chartTgz),
          valuesFile: path.resolve(options.valuesFile),
          timeout: deps.config.deploy.installTimeout,
        });
        ctx.print(log);
      });
    });
}
