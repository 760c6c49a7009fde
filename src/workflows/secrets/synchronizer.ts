/**
 * Secret Synchronizer
 *
 * Optionally grants vault read access, resolves the secret set, then inserts
 * each secret the vault does not hold yet. Existing secrets are never
 * overwritten, so re-runs are safe.
 */

import type { Logger } from 'pino';
import type { ResourceDiscovery } from '@/infra/azure/resources';
import type { VaultClient } from '@/infra/azure/key-vault';
import type { Result, SecretSet } from '@/types';
import { createTimer } from '@/lib/logger';
import { grantVaultReadAccess, type RbacGrantOutcome } from './rbac-grant';
import { planResolvers, resolveSecrets } from './sources';

export interface SecretSyncRequest {
  vault: string;
  resourceGroup?: string | undefined;
  clusterName?: string | undefined;
  /** Values from the secrets file */
  fileValues: SecretSet;
  /** Values from configuration; the secrets file wins on conflicts */
  configValues?: SecretSet;
  generateDefaults: boolean;
  skipRoleAssignment: boolean;
}

export interface SecretSyncReport {
  created: string[];
  skipped: string[];
  rbac: Result<RbacGrantOutcome> | 'not-requested';
}

export interface SecretSynchronizerDeps {
  vault: VaultClient;
  discovery: ResourceDiscovery;
  logger: Logger;
  random?: () => string;
}

export async function upsertSecrets(
  vaultClient: VaultClient,
  vault: string,
  secrets: SecretSet,
  logger: Logger,
): Promise<Pick<SecretSyncReport, 'created' | 'skipped'>> {
  const created: string[] = [];
  const skipped: string[] = [];

  for (const name of Object.keys(secrets).sort()) {
    const value = secrets[name];
    if (value === undefined) continue;

    if (await vaultClient.secretExists(vault, name)) {
      logger.debug({ vault, name }, 'Secret exists, leaving as is');
      skipped.push(name);
      continue;
    }
    await vaultClient.setSecret(vault, name, value);
    logger.info({ vault, name }, 'Secret created');
    created.push(name);
  }

  return { created, skipped };
}

export async function synchronizeSecrets(
  deps: SecretSynchronizerDeps,
  request: SecretSyncRequest,
): Promise<SecretSyncReport> {
  const { logger } = deps;
  const timer = createTimer(logger, 'synchronize-secrets');

  let rbac: SecretSyncReport['rbac'] = 'not-requested';
  if (!request.skipRoleAssignment) {
    rbac = await grantVaultReadAccess(
      deps.discovery,
      { resourceGroup: request.resourceGroup, clusterName: request.clusterName, vault: request.vault },
      logger,
    );
    if (!rbac.ok) {
      logger.warn(
        { hint: rbac.guidance?.hint, resolution: rbac.guidance?.resolution },
        `${rbac.error}. Continuing with secret synchronization`,
      );
    }
  }

  const secrets = await resolveSecrets(
    planResolvers({
      fileValues: request.fileValues,
      ...(request.configValues ? { configValues: request.configValues } : {}),
      generateDefaults: request.generateDefaults,
      ...(request.resourceGroup ? { resourceGroup: request.resourceGroup } : {}),
      discovery: deps.discovery,
      logger,
      ...(deps.random ? { random: deps.random } : {}),
    }),
  );
  timer.checkpoint('resolved', { count: Object.keys(secrets).length });

  const { created, skipped } = await upsertSecrets(deps.vault, request.vault, secrets, logger);
  timer.end({ created: created.length, skipped: skipped.length });
  return { created, skipped, rbac };
}
