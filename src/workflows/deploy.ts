/**
 * Full deployment: add-on, secrets, baseline manifests, chart package, install.
 */

import path from 'node:path';
import type { Logger } from 'pino';
import type { RemoteInvoker } from '@/infra/azure/remote-invoker';
import type { ChartPackager, ChartSource } from '@/infra/helm/chart-packager';
import { assertManifestsExist, type RemoteOps } from '@/infra/kubernetes/remote-ops';
import { BASELINE_MANIFESTS } from '@/config/constants';
import { InputFileMissingError } from '@/lib/errors';
import { pathExists } from '@/lib/file-utils';
import { requireKubernetesName } from '@/lib/shell';
import { ensureExternalSecrets } from './addons';
import { runStages, type PipelineStage, type RunStagesOptions, type StageReport } from './pipeline';
import {
  synchronizeSecrets,
  type SecretSyncReport,
  type SecretSyncRequest,
  type SecretSynchronizerDeps,
} from './secrets/synchronizer';

export interface DeployContext {
  invoker: RemoteInvoker;
  ops: RemoteOps;
  packager: ChartPackager;
  secretDeps: SecretSynchronizerDeps;
  secretRequest: SecretSyncRequest;
  chartSource: ChartSource;
  /** Baseline manifests, absolute or relative to the working directory */
  manifests: readonly string[];
  namespace: string;
  release: string;
  valuesFile: string;
  timeout: string;
  logger: Logger;
  /** Filled in by stages as the run progresses */
  outputs: {
    secrets?: SecretSyncReport;
    chartPackage?: string;
    installLog?: string;
  };
}

export function baselineManifestPaths(manifestDir: string): string[] {
  return BASELINE_MANIFESTS.map((manifest) => path.resolve(manifestDir, manifest));
}

export const DEPLOY_STAGES: readonly PipelineStage<DeployContext>[] = [
  {
    name: 'ensure-addon-present',
    description: 'Install or upgrade the External Secrets Operator',
    failure: 'fatal',
    async run(ctx) {
      await ensureExternalSecrets(ctx.invoker, ctx.logger);
    },
  },
  {
    name: 'synchronize-secrets',
    description: 'Synchronize secrets into the vault',
    failure: 'fatal',
    async run(ctx) {
      const report = await synchronizeSecrets(ctx.secretDeps, ctx.secretRequest);
      ctx.outputs.secrets = report;
      if (report.rbac !== 'not-requested' && !report.rbac.ok) {
        return report.rbac.error;
      }
      return undefined;
    },
  },
  {
    name: 'apply-baseline-manifests',
    description: 'Apply secret store and storage proxy manifests',
    failure: 'fatal',
    precondition: (ctx) => assertManifestsExist(ctx.manifests),
    async run(ctx) {
      await ctx.ops.applyManifestFiles(ctx.manifests);
    },
  },
  {
    name: 'package-chart',
    description: 'Download and package the application chart',
    failure: 'fatal',
    async run(ctx) {
      const packaged = await ctx.packager.package(ctx.chartSource);
      ctx.outputs.chartPackage = packaged.packagePath;
    },
  },
  {
    name: 'install-chart',
    description: 'Upgrade or install the release on the cluster',
    failure: 'fatal',
    async run(ctx) {
      const chartPackage = ctx.outputs.chartPackage;
      if (!chartPackage) {
        throw new InputFileMissingError('Chart package', '(not produced)');
      }
      await ctx.ops.ensureNamespace(ctx.namespace);
      ctx.outputs.installLog = await ctx.ops.installChart({
        namespace: ctx.namespace,
        release: ctx.release,
        chartPackage,
        valuesFile: ctx.valuesFile,
        timeout: ctx.timeout,
      });
    },
  },
];

export interface DeployResult {
  stages: StageReport[];
  outputs: DeployContext['outputs'];
}

/**
 * Validate inputs that can be checked locally, then run every deploy stage.
 */
export async function deploy(
  context: Omit<DeployContext, 'outputs'>,
  options: Omit<RunStagesOptions, 'logger'> = {},
): Promise<DeployResult> {
  requireKubernetesName('namespace', context.namespace);
  requireKubernetesName('release', context.release);
  if (!(await pathExists(context.valuesFile))) {
    throw new InputFileMissingError('Values file', context.valuesFile);
  }

  const fullContext: DeployContext = { ...context, outputs: {} };
  const stages = await runStages(DEPLOY_STAGES, fullContext, { ...options, logger: context.logger });
  return { stages, outputs: fullContext.outputs };
}
