/**
 * Cluster add-ons: External Secrets Operator and ingress-nginx.
 */

import type { Logger } from 'pino';
import type { RemoteInvoker } from '@/infra/azure/remote-invoker';
import { ADDONS } from '@/config/constants';
import { extractErrorMessage } from '@/lib/errors';
import { bashCommand } from '@/lib/shell';
import { Failure, Success, type Result } from '@/types';

export interface ReadinessWait {
  attempts: number;
  intervalSeconds: number;
}

export function externalSecretsInstallCommand(): string {
  const eso = ADDONS.externalSecrets;
  return bashCommand(
    [
      `helm repo add ${eso.repoName} ${eso.repoUrl}`,
      'helm repo update',
      `helm upgrade --install ${eso.release} ${eso.chart} --namespace ${eso.namespace} --create-namespace --set installCRDs=true --wait --timeout=${eso.timeout}`,
    ].join(' && '),
  );
}

export function ingressNginxInstallCommand(): string {
  const nginx = ADDONS.ingressNginx;
  return bashCommand(
    [
      `helm repo add ${nginx.repoName} ${nginx.repoUrl}`,
      'helm repo update',
      `helm upgrade --install ${nginx.release} ${nginx.chart} -n ${nginx.namespace} --create-namespace --set controller.replicaCount=${nginx.replicaCount}`,
    ].join(' && '),
  );
}

/**
 * Poll for the controller service on the cluster side, exiting 0 once it exists.
 */
export function ingressReadinessCommand(wait: ReadinessWait): string {
  const nginx = ADDONS.ingressNginx;
  return bashCommand(
    `for i in $(seq 1 ${wait.attempts}); do kubectl -n ${nginx.namespace} get svc ${nginx.service} >/dev/null 2>&1 && exit 0; sleep ${wait.intervalSeconds}; done; exit 1`,
  );
}

export function ingressAnnotateCommand(): string {
  const nginx = ADDONS.ingressNginx;
  return `kubectl -n ${nginx.namespace} annotate svc ${nginx.service} ${nginx.internalAnnotation} --overwrite`;
}

export async function ensureExternalSecrets(invoker: RemoteInvoker, logger: Logger): Promise<string> {
  logger.info({ release: ADDONS.externalSecrets.release }, 'Ensuring External Secrets Operator');
  return invoker.invoke(externalSecretsInstallCommand());
}

export async function installIngressNginx(invoker: RemoteInvoker, logger: Logger): Promise<string> {
  logger.info({ release: ADDONS.ingressNginx.release }, 'Installing ingress-nginx');
  return invoker.invoke(ingressNginxInstallCommand());
}

/**
 * Mark the ingress controller's load balancer as internal. Best effort: the
 * service may still be propagating, so a timeout comes back as a Failure.
 */
export async function annotateIngressInternal(
  invoker: RemoteInvoker,
  wait: ReadinessWait,
): Promise<Result<string>> {
  try {
    await invoker.invoke(ingressReadinessCommand(wait));
  } catch (error) {
    return Failure(`Ingress controller service not ready: ${extractErrorMessage(error)}`, {
      message: 'Ingress controller service not ready',
      hint: `${ADDONS.ingressNginx.service} did not appear after ${wait.attempts} attempts`,
      resolution: `Annotate it later with: ${ingressAnnotateCommand()}`,
    });
  }

  try {
    return Success(await invoker.invoke(ingressAnnotateCommand()));
  } catch (error) {
    return Failure(`Failed to annotate ingress service: ${extractErrorMessage(error)}`);
  }
}
