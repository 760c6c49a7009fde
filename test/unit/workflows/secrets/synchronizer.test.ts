/**
 * Tests for vault synchronization
 */

import { describe, it, expect } from '@jest/globals';
import { synchronizeSecrets, upsertSecrets, type SecretSyncRequest } from '@/workflows/secrets/synchronizer';
import { FakeDiscovery, FakeVault, silentLogger } from '../../../__support__/fakes';

const STORAGE = {
  'azure-storage-account-name': 'stacct',
  'azure-storage-account-key': 'test-key',
};

function request(overrides: Partial<SecretSyncRequest> = {}): SecretSyncRequest {
  return {
    vault: 'kv-test',
    resourceGroup: 'rg-test',
    clusterName: 'aks-test',
    fileValues: { ...STORAGE, 'jwt-secret': 'test-secret' },
    generateDefaults: false,
    skipRoleAssignment: true,
    ...overrides,
  };
}

describe('upsertSecrets', () => {
  it('should insert absent secrets in name order and leave existing ones', async () => {
    const vault = new FakeVault({ b: 'old' });

    const outcome = await upsertSecrets(vault, 'kv-test', { c: '3', b: 'new', a: '1' }, silentLogger());

    expect(outcome).toEqual({ created: ['a', 'c'], skipped: ['b'] });
    expect(vault.setCalls).toEqual(['a', 'c']);
    expect(vault.store.get('b')).toBe('old');
  });
});

describe('synchronizeSecrets', () => {
  it('should write nothing on a second run', async () => {
    const vault = new FakeVault();
    const deps = { vault, discovery: new FakeDiscovery(), logger: silentLogger() };

    const first = await synchronizeSecrets(deps, request());
    const callsAfterFirst = vault.setCalls.length;
    const second = await synchronizeSecrets(deps, request());

    expect(first.created).toEqual([
      'azure-storage-account-key',
      'azure-storage-account-name',
      'jwt-secret',
      'storage-connection-string',
    ]);
    expect(callsAfterFirst).toBe(4);
    expect(second.created).toEqual([]);
    expect(second.skipped).toEqual(first.created);
    expect(vault.setCalls.length).toBe(4);
  });

  it('should never overwrite a value already in the vault', async () => {
    const vault = new FakeVault({ 'jwt-secret': 'existing' });

    await synchronizeSecrets(
      { vault, discovery: new FakeDiscovery(), logger: silentLogger() },
      request(),
    );

    expect(vault.store.get('jwt-secret')).toBe('existing');
  });

  it('should report the role assignment as not requested when skipped', async () => {
    const discovery = new FakeDiscovery();

    const report = await synchronizeSecrets(
      { vault: new FakeVault(), discovery, logger: silentLogger() },
      request({ resourceGroup: undefined }),
    );

    expect(report.rbac).toBe('not-requested');
    expect(discovery.lookups).toEqual([]);
  });

  it('should report a skipped grant when the resource group is unknown', async () => {
    const vault = new FakeVault();

    const report = await synchronizeSecrets(
      { vault, discovery: new FakeDiscovery(), logger: silentLogger() },
      request({ skipRoleAssignment: false, resourceGroup: undefined }),
    );

    expect(report.rbac).toEqual({
      ok: true,
      value: { status: 'skipped', reason: 'resource group, cluster name and vault are all required' },
    });
    expect(vault.setCalls).toHaveLength(4);
  });

  it('should continue with synchronization when the role assignment fails', async () => {
    const vault = new FakeVault();
    const discovery = new FakeDiscovery({ failWith: new Error('AuthorizationFailed') });

    const report = await synchronizeSecrets(
      { vault, discovery, logger: silentLogger() },
      request({ skipRoleAssignment: false, fileValues: { ...STORAGE } }),
    );

    expect(report.rbac !== 'not-requested' && report.rbac.ok).toBe(false);
    expect(report.created).toEqual([
      'azure-storage-account-key',
      'azure-storage-account-name',
      'storage-connection-string',
    ]);
  });

  it('should use generated values with a fixed source of randomness', async () => {
    const vault = new FakeVault();

    const report = await synchronizeSecrets(
      { vault, discovery: new FakeDiscovery(), logger: silentLogger(), random: () => 'test-secret' },
      request({ fileValues: { ...STORAGE }, generateDefaults: true }),
    );

    expect(report.created).toContain('anon-key');
    expect(vault.store.get('anon-key')).toBe('test-secret');
    expect(vault.store.get('jwt-secret')).toBe('test-secret');
  });
});
