/**
 * Cluster baseline configuration: namespace, add-ons, ingress, ESO baseline
 * and policy manifests. Manifests that are not present locally are skipped.
 */

import path from 'node:path';
import type { Logger } from 'pino';
import type { RemoteInvoker } from '@/infra/azure/remote-invoker';
import type { RemoteOps } from '@/infra/kubernetes/remote-ops';
import { CONFIGURE_MANIFESTS, POLICY_MANIFESTS } from '@/config/constants';
import { pathExists } from '@/lib/file-utils';
import {
  annotateIngressInternal,
  ensureExternalSecrets,
  installIngressNginx,
  type ReadinessWait,
} from './addons';
import { runStages, type PipelineStage, type RunStagesOptions, type StageReport } from './pipeline';

export interface ConfigureContext {
  invoker: RemoteInvoker;
  ops: RemoteOps;
  namespace: string;
  manifestDir: string;
  ingressReadiness: ReadinessWait;
  logger: Logger;
}

export async function existingFiles(manifestDir: string, relative: readonly string[]): Promise<string[]> {
  const present: string[] = [];
  for (const manifest of relative) {
    const file = path.resolve(manifestDir, manifest);
    if (await pathExists(file)) {
      present.push(file);
    }
  }
  return present;
}

async function applyPresent(
  ctx: ConfigureContext,
  relative: readonly string[],
): Promise<string | void> {
  const files = await existingFiles(ctx.manifestDir, relative);
  if (files.length === 0) {
    return `No manifests found under ${ctx.manifestDir}`;
  }
  await ctx.ops.applyManifestFiles(files);
  return undefined;
}

export const CONFIGURE_STAGES: readonly PipelineStage<ConfigureContext>[] = [
  {
    name: 'ensure-namespace',
    description: 'Create the application namespace if absent',
    failure: 'fatal',
    async run(ctx) {
      await ctx.ops.ensureNamespace(ctx.namespace);
    },
  },
  {
    name: 'ensure-external-secrets',
    description: 'Install or upgrade the External Secrets Operator',
    failure: 'fatal',
    async run(ctx) {
      await ensureExternalSecrets(ctx.invoker, ctx.logger);
    },
  },
  {
    name: 'install-ingress-nginx',
    description: 'Install or upgrade the ingress-nginx controller',
    failure: 'fatal',
    async run(ctx) {
      await installIngressNginx(ctx.invoker, ctx.logger);
    },
  },
  {
    name: 'annotate-ingress-internal',
    description: 'Mark the ingress load balancer as internal',
    failure: 'warn',
    async run(ctx) {
      const result = await annotateIngressInternal(ctx.invoker, ctx.ingressReadiness);
      if (!result.ok) {
        return result.error;
      }
      return undefined;
    },
  },
  {
    name: 'apply-eso-manifests',
    description: 'Apply External Secrets baseline manifests',
    failure: 'fatal',
    run: (ctx) => applyPresent(ctx, CONFIGURE_MANIFESTS),
  },
  {
    name: 'apply-policies',
    description: 'Apply autoscaling and network policies',
    failure: 'fatal',
    run: (ctx) => applyPresent(ctx, POLICY_MANIFESTS),
  },
];

export function configureCluster(
  context: ConfigureContext,
  options: Omit<RunStagesOptions, 'logger'> = {},
): Promise<StageReport[]> {
  return runStages(CONFIGURE_STAGES, context, { ...options, logger: context.logger });
}
