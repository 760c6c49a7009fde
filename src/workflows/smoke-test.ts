/**
 * Smoke test of the REST endpoint, from inside the cluster or through the ingress.
 */

import type { Logger } from 'pino';
import type { RemoteInvoker } from '@/infra/azure/remote-invoker';
import { ADDONS, SMOKE_TEST } from '@/config/constants';
import { SmokeTestFailedError, extractErrorMessage } from '@/lib/errors';
import { httpGetStatus } from '@/lib/file-utils';
import { bashCommand, requireKubernetesName } from '@/lib/shell';

export interface SmokeTestOutcome {
  url: string;
  status: number;
  log?: string;
}

export type HttpGetStatus = (url: string, timeoutMs: number) => Promise<number>;

/**
 * Starts a throwaway curl pod in the namespace, requests the Kong service's
 * REST path (with the anon key when the release secret has one) and prints
 * `CODE:<status>`.
 */
export function internalProbeScript(namespace: string): string {
  const ns = requireKubernetesName('namespace', namespace);
  return [
    'set -e',
    `NS=${ns}`,
    'KONG=$(kubectl -n "$NS" get svc -l app.kubernetes.io/name=supabase-kong -o jsonpath="{.items[0].metadata.name}" 2>/dev/null || true)',
    'if [ -z "$KONG" ]; then KONG=$(kubectl -n "$NS" get svc -o name | sed "s#service/##" | grep -i kong | head -n1 || true); fi',
    '[ -n "$KONG" ] || KONG=kong-proxy',
    'PORT=$(kubectl -n "$NS" get svc "$KONG" -o jsonpath="{.spec.ports[0].port}" 2>/dev/null || echo 80)',
    '[ -n "$PORT" ] || PORT=80',
    `BASE="http://$KONG.$NS.svc.cluster.local:$PORT${SMOKE_TEST.path}"`,
    'POD=curlpod-$(date +%s)',
    'kubectl -n "$NS" run "$POD" --image=curlimages/curl --restart=Never --labels=app=curltest --command -- sleep 3600 >/dev/null',
    'kubectl -n "$NS" wait --for=condition=Ready pod/"$POD" --timeout=120s || true',
    'ANON=$(kubectl -n "$NS" get secret supabase-env -o jsonpath="{.data.ANON_KEY}" 2>/dev/null | base64 -d || true)',
    'if [ -n "$ANON" ]; then',
    '  OUT=$(kubectl -n "$NS" exec "$POD" -- curl -sS -o /dev/null -w "CODE:%{http_code}" -H "apikey: $ANON" -H "Authorization: Bearer $ANON" "$BASE" || true)',
    'else',
    '  OUT=$(kubectl -n "$NS" exec "$POD" -- curl -sS -o /dev/null -w "CODE:%{http_code}" "$BASE" || true)',
    'fi',
    'echo "$OUT"',
    'kubectl -n "$NS" delete pod "$POD" --ignore-not-found >/dev/null 2>&1 || true',
  ].join('\n');
}

/**
 * Status code from a `CODE:<status>` marker in a remote log.
 */
export function parseStatusMarker(log: string): number | undefined {
  const match = /CODE:(\d{3})/.exec(log);
  return match?.[1] ? Number(match[1]) : undefined;
}

export function ingressIpCommand(): string {
  const nginx = ADDONS.ingressNginx;
  return `kubectl -n ${nginx.namespace} get svc ${nginx.service} -o jsonpath='{.status.loadBalancer.ingress[0].ip}'`;
}

export function restUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${SMOKE_TEST.path}`;
}

export async function runInternalSmokeTest(
  invoker: RemoteInvoker,
  namespace: string,
): Promise<SmokeTestOutcome> {
  const log = await invoker.invoke(bashCommand(internalProbeScript(namespace)));
  const status = parseStatusMarker(log);
  const url = `kong.${namespace}${SMOKE_TEST.path}`;
  if (status === undefined) {
    throw new SmokeTestFailedError(`no status reported by in-cluster probe\n${log}`);
  }
  if (status !== 200) {
    throw new SmokeTestFailedError(`unexpected status ${status} from ${url}`);
  }
  return { url, status, log };
}

export async function detectIngressBaseUrl(invoker: RemoteInvoker): Promise<string> {
  let ip: string;
  try {
    ip = (await invoker.invoke(ingressIpCommand())).trim().replace(/^['"]|['"]$/g, '');
  } catch (error) {
    throw new SmokeTestFailedError(`failed to detect ingress IP: ${extractErrorMessage(error)}`);
  }
  if (!ip) {
    throw new SmokeTestFailedError('failed to detect ingress IP: no ingress IP found');
  }
  return `http://${ip}.nip.io`;
}

export interface ExternalSmokeTestOptions {
  baseUrl?: string | undefined;
  invoker?: RemoteInvoker | undefined;
  logger: Logger;
  httpGet?: HttpGetStatus;
}

export async function runExternalSmokeTest(options: ExternalSmokeTestOptions): Promise<SmokeTestOutcome> {
  const httpGet = options.httpGet ?? httpGetStatus;
  let base = options.baseUrl;
  if (!base) {
    if (!options.invoker) {
      throw new SmokeTestFailedError('either a base URL or a cluster to detect the ingress IP is required');
    }
    base = await detectIngressBaseUrl(options.invoker);
  }

  const url = restUrl(base);
  options.logger.info({ url }, 'Testing REST endpoint');
  let status: number;
  try {
    status = await httpGet(url, SMOKE_TEST.timeoutMs);
  } catch (error) {
    throw new SmokeTestFailedError(`${url}: ${extractErrorMessage(error)}`);
  }
  if (status !== 200) {
    throw new SmokeTestFailedError(`unexpected status ${status} from ${url}`);
  }
  return { url, status };
}
