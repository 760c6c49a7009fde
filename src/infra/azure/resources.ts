/**
 * Azure resource discovery and role assignment
 *
 * Used for credential fallback resolution and the vault access grant.
 */

import { z } from 'zod';
import type { ClusterTarget } from '@/types';
import type { AzureCli } from './az-cli';

const ClusterInfoSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    provisioningState: z.string().optional(),
    kubernetesVersion: z.string().optional(),
    powerState: z.object({ code: z.string().optional() }).nullish(),
    identityProfile: z
      .object({
        kubeletidentity: z.object({ objectId: z.string().nullish() }).nullish(),
      })
      .nullish(),
  })
  .passthrough();

export type ClusterInfo = z.infer<typeof ClusterInfoSchema>;

const StorageAccountListSchema = z.array(z.object({ name: z.string() }).passthrough());
const StorageKeyListSchema = z.array(
  z.object({ keyName: z.string().optional(), value: z.string() }).passthrough(),
);
const RoleAssignmentListSchema = z.array(z.object({ id: z.string() }).passthrough());

export interface RoleAssignmentRequest {
  principalObjectId: string;
  role: string;
  scope: string;
}

export interface ResourceDiscovery {
  /** Storage account names in a resource group, in CLI order */
  listStorageAccounts: (resourceGroup: string) => Promise<string[]>;
  listStorageAccountKeys: (resourceGroup: string, accountName: string) => Promise<string[]>;
  showCluster: (target: ClusterTarget) => Promise<ClusterInfo>;
  roleAssignmentExists: (request: RoleAssignmentRequest) => Promise<boolean>;
  createRoleAssignment: (request: RoleAssignmentRequest) => Promise<void>;
}

export function createResourceDiscovery(az: AzureCli): ResourceDiscovery {
  return {
    async listStorageAccounts(resourceGroup) {
      const accounts = await az.json(
        ['storage', 'account', 'list', '-g', resourceGroup],
        StorageAccountListSchema,
      );
      return accounts.map((account) => account.name);
    },

    async listStorageAccountKeys(resourceGroup, accountName) {
      const keys = await az.json(
        ['storage', 'account', 'keys', 'list', '-n', accountName, '-g', resourceGroup],
        StorageKeyListSchema,
      );
      return keys.map((key) => key.value);
    },

    showCluster(target) {
      return az.json(
        ['aks', 'show', '-g', target.resourceGroup, '-n', target.clusterName],
        ClusterInfoSchema,
      );
    },

    async roleAssignmentExists({ principalObjectId, role, scope }) {
      const assignments = await az.json(
        ['role', 'assignment', 'list', '--assignee', principalObjectId, '--role', role, '--scope', scope],
        RoleAssignmentListSchema,
      );
      return assignments.length > 0;
    },

    async createRoleAssignment({ principalObjectId, role, scope }) {
      await az.run([
        'role',
        'assignment',
        'create',
        '--assignee-object-id',
        principalObjectId,
        '--assignee-principal-type',
        'ServicePrincipal',
        '--role',
        role,
        '--scope',
        scope,
        '-o',
        'none',
      ]);
    },
  };
}
