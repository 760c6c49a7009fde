/**
 * aks-configure, diagnose and smoke-test commands
 */

import { Command } from 'commander';
import { configureCluster } from '@/workflows/configure';
import { renderDiagnostics, runDiagnostics } from '@/workflows/diagnostics';
import { runExternalSmokeTest, runInternalSmokeTest } from '@/workflows/smoke-test';
import { requireKubernetesName } from '@/lib/shell';
import { renderStages } from '../render';
import {
  ConfigureOptionsSchema,
  DiagnoseOptionsSchema,
  SmokeTestOptionsSchema,
} from '../validation';
import { runCommand, type CommandContext } from './context';
import { clusterDefaults } from './deploy';

export function createConfigureCommand(ctx: CommandContext): Command {
  return new Command('aks-configure')
    .alias('addon-configure')
    .description('Install add-ons, ingress and baseline manifests on AKS')
    .option('--resource-group <name>', 'resource group of the cluster')
    .option('--cluster-name <name>', 'AKS cluster name')
    .option('--namespace <namespace>', 'application namespace')
    .action(async (_options: unknown, command: Command) => {
      await runCommand(ctx, command, ConfigureOptionsSchema, clusterDefaults, async (options, deps) => {
        requireKubernetesName('namespace', options.namespace);
        const { invoker, ops } = deps.cluster({
          resourceGroup: options.resourceGroup,
          clusterName: options.clusterName,
        });
        ctx.print(`Configuring AKS ${options.resourceGroup}/${options.clusterName}...`);
        const reports = await configureCluster({
          invoker,
          ops,
          namespace: options.namespace,
          manifestDir: deps.config.deploy.manifestDir,
          ingressReadiness: {
            attempts: deps.config.ingress.readinessAttempts,
            intervalSeconds: deps.config.ingress.readinessIntervalSeconds,
          },
          logger: deps.logger,
        });
        renderStages(reports).forEach(ctx.print);
        ctx.print('AKS baseline configuration complete.');
      });
    });
}

export function createDiagnoseCommand(ctx: CommandContext): Command {
  return new Command('diagnose')
    .description('Report cluster, release, pod, add-on and event status')
    .option('--resource-group <name>', 'resource group of the cluster')
    .option('--cluster-name <name>', 'AKS cluster name')
    .option('--namespace <namespace>', 'application namespace')
    .option('--release <name>', 'Helm release name')
    .action(async (_options: unknown, command: Command) => {
      await runCommand(ctx, command, DiagnoseOptionsSchema, clusterDefaults, async (options, deps) => {
        const target = { resourceGroup: options.resourceGroup, clusterName: options.clusterName };
        const results = await runDiagnostics(
          { discovery: deps.discovery, ops: deps.cluster(target).ops },
          { target, namespace: options.namespace, release: options.release },
        );
        ctx.print(renderDiagnostics(results));
      });
    });
}

export function createSmokeTestCommand(ctx: CommandContext): Command {
  return new Command('smoke-test')
    .description('Request the REST endpoint and expect HTTP 200')
    .option('--resource-group <name>', 'resource group of the cluster')
    .option('--cluster-name <name>', 'AKS cluster name')
    .option('--namespace <namespace>', 'application namespace (in-cluster test)')
    .option('--base-url <url>', 'public base URL; detected from the ingress when omitted')
    .option('--internal', 'test from a pod inside the cluster')
    .action(async (_options: unknown, command: Command) => {
      await runCommand(ctx, command, SmokeTestOptionsSchema, clusterDefaults, async (options, deps) => {
        const invoker =
          options.resourceGroup && options.clusterName
            ? deps.cluster({ resourceGroup: options.resourceGroup, clusterName: options.clusterName })
                .invoker
            : undefined;

        if (options.internal && invoker) {
          const outcome = await runInternalSmokeTest(invoker, options.namespace);
          ctx.print(`HTTP ${outcome.status} from ${outcome.url}`);
          return;
        }

        const outcome = await runExternalSmokeTest({
          baseUrl: options.baseUrl,
          invoker,
          logger: deps.logger,
        });
        ctx.print(`HTTP ${outcome.status} from ${outcome.url}`);
      });
    });
}
