/**
 * Grant the cluster's kubelet identity read access to the vault so the
 * External Secrets Operator can fetch synchronized secrets.
 *
 * Best effort: every outcome comes back as a Result and nothing is thrown.
 */

import type { Logger } from 'pino';
import type { ResourceDiscovery } from '@/infra/azure/resources';
import { VAULT_READER_ROLE } from '@/config/constants';
import { ERROR_MESSAGES, extractErrorMessage } from '@/lib/errors';
import { Failure, Success, type Result } from '@/types';

export type RbacGrantStatus = 'granted' | 'already-granted' | 'skipped';

export interface RbacGrantOutcome {
  status: RbacGrantStatus;
  principalObjectId?: string;
  scope?: string;
  reason?: string;
}

export interface RbacGrantRequest {
  resourceGroup?: string | undefined;
  clusterName?: string | undefined;
  vault?: string | undefined;
}

export function vaultScope(subscriptionId: string, resourceGroup: string, vault: string): string {
  return `/subscriptions/${subscriptionId}/resourceGroups/${resourceGroup}/providers/Microsoft.KeyVault/vaults/${vault}`;
}

/**
 * Subscription id from an ARM resource id (`/subscriptions/<id>/...`).
 */
export function subscriptionFromResourceId(resourceId: string): string | undefined {
  const segments = resourceId.split('/');
  return segments[1]?.toLowerCase() === 'subscriptions' && segments[2] ? segments[2] : undefined;
}

export async function grantVaultReadAccess(
  discovery: ResourceDiscovery,
  request: RbacGrantRequest,
  logger: Logger,
): Promise<Result<RbacGrantOutcome>> {
  const { resourceGroup, clusterName, vault } = request;
  if (!resourceGroup || !clusterName || !vault) {
    const reason = 'resource group, cluster name and vault are all required';
    logger.warn({ resourceGroup, clusterName, vault }, `Skipping vault role assignment: ${reason}`);
    return Success({ status: 'skipped', reason });
  }

  try {
    const cluster = await discovery.showCluster({ resourceGroup, clusterName });
    const principalObjectId = cluster.identityProfile?.kubeletidentity?.objectId ?? undefined;
    if (!principalObjectId) {
      logger.warn({ clusterName }, 'Cluster has no kubelet identity; skipping vault role assignment');
      return Success({ status: 'skipped', reason: 'cluster has no kubelet identity' });
    }

    const subscriptionId = subscriptionFromResourceId(cluster.id);
    if (!subscriptionId) {
      return Failure(ERROR_MESSAGES.RBAC_GRANT_FAILED(`cannot read subscription from ${cluster.id}`));
    }

    const assignment = {
      principalObjectId,
      role: VAULT_READER_ROLE,
      scope: vaultScope(subscriptionId, resourceGroup, vault),
    };

    if (await discovery.roleAssignmentExists(assignment)) {
      logger.info({ scope: assignment.scope }, 'Vault role assignment already present');
      return Success({ status: 'already-granted', principalObjectId, scope: assignment.scope });
    }

    await discovery.createRoleAssignment(assignment);
    logger.info({ scope: assignment.scope, role: VAULT_READER_ROLE }, 'Granted vault read access');
    return Success({ status: 'granted', principalObjectId, scope: assignment.scope });
  } catch (error) {
    const message = ERROR_MESSAGES.RBAC_GRANT_FAILED(extractErrorMessage(error));
    return Failure(message, {
      message,
      hint: 'The External Secrets Operator may get 403 responses until the role is granted',
      resolution: `Assign '${VAULT_READER_ROLE}' on the vault to the cluster kubelet identity`,
    });
  }
}
