/**
 * Kubernetes and Helm operations expressed as single remote commands.
 *
 * Each function submits one self-contained command through the Remote Invoker;
 * check-then-create logic lives inside the submitted shell text.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { RemoteInvoker } from '@/infra/azure/remote-invoker';
import { mountedPath } from '@/infra/azure/remote-invoker';
import { ManifestMissingError, InputFileMissingError } from '@/lib/errors';
import { createScratchDir, pathExists } from '@/lib/file-utils';
import { bashCommand, requireKubernetesName, shellQuote } from '@/lib/shell';
import { DIAGNOSTICS } from '@/config/constants';

const INSTALL_SCRIPT_NAME = 'install.sh';

const HelmReleaseSchema = z
  .object({
    name: z.string(),
    namespace: z.string(),
    revision: z.string().optional(),
    status: z.string().optional(),
    chart: z.string().optional(),
    app_version: z.string().optional(),
  })
  .passthrough();

export type HelmRelease = z.infer<typeof HelmReleaseSchema>;

const HelmReleaseListSchema = z.array(HelmReleaseSchema);

export interface InstallChartRequest {
  namespace: string;
  release: string;
  /** Local path to the packaged chart (.tgz) */
  chartPackage: string;
  /** Local path to the values file */
  valuesFile: string;
  /** helm wait timeout, e.g. `15m` */
  timeout: string;
}

export interface RemoteOps {
  ensureNamespace: (namespace: string) => Promise<string>;
  /**
   * Apply manifests in order. Every file is checked before the first apply, so
   * a missing file means nothing is applied.
   */
  applyManifestFiles: (files: readonly string[]) => Promise<string[]>;
  listReleases: () => Promise<HelmRelease[]>;
  getJson: (namespace: string, what: string) => Promise<unknown>;
  getText: (namespace: string, what: string) => Promise<string>;
  recentEvents: (namespace: string, tail?: number) => Promise<string>;
  installChart: (request: InstallChartRequest) => Promise<string>;
}

export function ensureNamespaceCommand(namespace: string): string {
  const ns = shellQuote(requireKubernetesName('namespace', namespace));
  return bashCommand(`kubectl get ns ${ns} >/dev/null 2>&1 || kubectl create ns ${ns}`);
}

/**
 * Script run on the cluster side for an upgrade-or-install. On failure it
 * prints release status, pods and recent events before exiting 1.
 */
export function buildInstallScript(request: {
  namespace: string;
  release: string;
  chartFile: string;
  valuesFile: string;
  timeout: string;
}): string {
  const ns = shellQuote(requireKubernetesName('namespace', request.namespace));
  const release = shellQuote(requireKubernetesName('release', request.release));
  const chart = shellQuote(request.chartFile);
  const values = shellQuote(request.valuesFile);
  const timeout = shellQuote(request.timeout);

  return [
    '#!/usr/bin/env bash',
    'set -uo pipefail',
    `kubectl create namespace ${ns} --dry-run=client -o yaml | kubectl apply -f -`,
    `if ! helm upgrade --install ${release} ${chart} --namespace ${ns} --create-namespace -f ${values} --timeout ${timeout} --wait --debug; then`,
    "  echo '--- Status ---'",
    `  helm status ${release} -n ${ns} || true`,
    "  echo '--- Pods ---'",
    `  kubectl get pods -n ${ns} -o wide || true`,
    "  echo '--- Events ---'",
    `  kubectl get events -n ${ns} --sort-by=.lastTimestamp | tail -n ${DIAGNOSTICS.eventTail} || true`,
    '  exit 1',
    'fi',
    `helm status ${release} -n ${ns}`,
    `kubectl get pods -n ${ns}`,
    '',
  ].join('\n');
}

/**
 * Reject with {@link ManifestMissingError} for the first file that does not exist.
 */
export async function assertManifestsExist(files: readonly string[]): Promise<void> {
  for (const file of files) {
    if (!(await pathExists(file))) {
      throw new ManifestMissingError(file);
    }
  }
}

export function createRemoteOps(invoker: RemoteInvoker, logger: Logger): RemoteOps {
  const getText = (namespace: string, what: string): Promise<string> =>
    invoker.invoke(`kubectl -n ${shellQuote(namespace)} get ${what}`);

  return {
    async ensureNamespace(namespace) {
      return invoker.invoke(ensureNamespaceCommand(namespace));
    },

    async applyManifestFiles(files) {
      await assertManifestsExist(files);
      const logs: string[] = [];
      for (const file of files) {
        logger.info({ manifest: file }, 'Applying manifest');
        logs.push(await invoker.invoke(`kubectl apply -f ${shellQuote(mountedPath(file))}`, [file]));
      }
      return logs;
    },

    async listReleases() {
      const output = await invoker.invoke('helm list -A -o json');
      const parsed = HelmReleaseListSchema.safeParse(JSON.parse(output.trim() || '[]'));
      if (!parsed.success) {
        throw new Error(`Unexpected helm list output: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      }
      return parsed.data;
    },

    async getJson(namespace, what) {
      const output = await getText(namespace, `${what} -o json`);
      const parsed: unknown = JSON.parse(output);
      return parsed;
    },

    getText,

    async recentEvents(namespace, tail = DIAGNOSTICS.eventTail) {
      return invoker.invoke(
        bashCommand(
          `kubectl -n ${shellQuote(namespace)} get events --sort-by='.lastTimestamp' | tail -n ${tail}`,
        ),
      );
    },

    async installChart(request) {
      for (const [label, file] of [
        ['Chart package', request.chartPackage],
        ['Values file', request.valuesFile],
      ] as const) {
        if (!(await pathExists(file))) {
          throw new InputFileMissingError(label, file);
        }
      }

      const scriptPath = path.join(createScratchDir('install-'), INSTALL_SCRIPT_NAME);
      const script = buildInstallScript({
        namespace: request.namespace,
        release: request.release,
        chartFile: mountedPath(request.chartPackage),
        valuesFile: mountedPath(request.valuesFile),
        timeout: request.timeout,
      });
      await fs.writeFile(scriptPath, script, { mode: 0o755 });

      logger.info(
        { release: request.release, namespace: request.namespace, timeout: request.timeout },
        'Installing chart on cluster',
      );
      return invoker.invoke(`bash ${shellQuote(mountedPath(scriptPath))}`, [
        scriptPath,
        request.chartPackage,
        request.valuesFile,
      ]);
    },
  };
}
