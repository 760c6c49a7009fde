/**
 * Diagnostics
 *
 * Read-only probes of cluster, release, pods, add-on resources and recent
 * events. Each probe is isolated: a failing probe yields its own error line
 * and the rest still run.
 */

import { z } from 'zod';
import type { ClusterTarget } from '@/types';
import type { ResourceDiscovery } from '@/infra/azure/resources';
import type { RemoteOps } from '@/infra/kubernetes/remote-ops';
import { DIAGNOSTICS } from '@/config/constants';
import { extractErrorMessage } from '@/lib/errors';

export type ProbeName = 'cluster' | 'release' | 'pods' | 'addons' | 'events';

export interface ProbeResult {
  probe: ProbeName;
  ok: boolean;
  lines: string[];
}

export interface DiagnosticsRequest {
  target: ClusterTarget;
  namespace: string;
  release: string;
}

export interface DiagnosticsDeps {
  discovery: ResourceDiscovery;
  ops: RemoteOps;
}

const PodListSchema = z.object({
  items: z.array(
    z.object({
      metadata: z.object({ name: z.string() }),
      status: z.object({ phase: z.string().optional() }).optional(),
    }),
  ),
});

type Probe = (deps: DiagnosticsDeps, request: DiagnosticsRequest) => Promise<string[]>;

const probes: ReadonlyArray<[ProbeName, Probe]> = [
  [
    'cluster',
    async ({ discovery }, { target }) => {
      const info = await discovery.showCluster(target);
      return [
        `AKS: ${info.name} | Power: ${info.powerState?.code ?? 'unknown'} | State: ${info.provisioningState ?? 'unknown'} | K8s: ${info.kubernetesVersion ?? 'unknown'}`,
      ];
    },
  ],
  [
    'release',
    async ({ ops }, { namespace, release }) => {
      const releases = await ops.listReleases();
      const match = releases.find((r) => r.name === release && r.namespace === namespace);
      if (!match) {
        return [`Release ${release} not found in ${namespace}.`];
      }
      return [
        `Release ${release} in ${namespace}: ${match.status ?? 'unknown'} | chart ${match.chart ?? 'unknown'} rev ${match.revision ?? '?'}`,
      ];
    },
  ],
  [
    'pods',
    async ({ ops }, { namespace }) => {
      const pods = PodListSchema.parse(await ops.getJson(namespace, 'pods'));
      return [
        `Pods in ${namespace}: ${pods.items.length}`,
        ...pods.items
          .slice(0, DIAGNOSTICS.maxPods)
          .map((pod) => `  ${pod.metadata.name}: ${pod.status?.phase ?? 'Unknown'}`),
      ];
    },
  ],
  [
    'addons',
    async ({ ops }, { namespace }) => {
      const text = await ops.getText(namespace, 'secretstore,externalsecret');
      return text.length > 0 ? text.split('\n') : ['No secret stores or external secrets found.'];
    },
  ],
  [
    'events',
    async ({ ops }, { namespace }) => {
      const events = await ops.recentEvents(namespace, DIAGNOSTICS.eventTail);
      return ['Recent events:', ...(events.length > 0 ? events.split('\n') : [])];
    },
  ],
];

export async function runDiagnostics(
  deps: DiagnosticsDeps,
  request: DiagnosticsRequest,
): Promise<ProbeResult[]> {
  const results: ProbeResult[] = [];
  for (const [probe, run] of probes) {
    try {
      results.push({ probe, ok: true, lines: await run(deps, request) });
    } catch (error) {
      results.push({ probe, ok: false, lines: [`${probe} error: ${extractErrorMessage(error)}`] });
    }
  }
  return results;
}

export function renderDiagnostics(results: readonly ProbeResult[]): string {
  return ['=== Supabase Deployment Diagnostics ===', ...results.flatMap((r) => r.lines)].join('\n');
}
