/**
 * Tests for configuration assembly from an environment record
 */
import { describe, it, expect } from '@jest/globals';
import { createAppConfig } from '@/config/app-config';

describe('createAppConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = createAppConfig({});

    expect(config.runtime).toEqual({ nodeEnv: 'production', logLevel: 'info' });
    expect(config.azure).toEqual({});
    expect(config.deploy).toEqual({
      namespace: 'supabase',
      release: 'supabase',
      installTimeout: '15m',
      manifestDir: process.cwd(),
    });
    expect(config.chart).toEqual({
      archiveUrl:
        'https://github.com/supabase-community/supabase-kubernetes/archive/refs/heads/main.zip',
      rootPrefix: 'supabase-kubernetes-',
      chartPath: 'charts/supabase',
      packagePrefix: 'supabase-',
      helmPath: 'helm',
    });
    expect(config.ingress).toEqual({ readinessAttempts: 30, readinessIntervalSeconds: 2 });
  });

  it('should read Azure and deployment settings', () => {
    const config = createAppConfig({
      AZURE_RESOURCE_GROUP: 'rg-test',
      AKS_CLUSTER_NAME: 'aks-test',
      AZURE_KEY_VAULT: 'kv-test',
      AZURE_STORAGE_ACCOUNT_NAME: 'stacct',
      AZURE_STORAGE_ACCOUNT_KEY: 'test-key',
      DEPLOY_NAMESPACE: 'supa',
      HELM_INSTALL_TIMEOUT: '30m',
      INGRESS_READY_ATTEMPTS: '5',
      LOG_LEVEL: 'debug',
    });

    expect(config.azure).toEqual({
      resourceGroup: 'rg-test',
      clusterName: 'aks-test',
      keyVault: 'kv-test',
      storageAccountName: 'stacct',
      storageAccountKey: 'test-key',
    });
    expect(config.deploy.namespace).toBe('supa');
    expect(config.deploy.installTimeout).toBe('30m');
    expect(config.ingress.readinessAttempts).toBe(5);
    expect(config.runtime.logLevel).toBe('debug');
  });

  it('should list every invalid field', () => {
    const build = (): unknown => createAppConfig({ LOG_LEVEL: 'loud', HELM_INSTALL_TIMEOUT: 'soon' });

    expect(build).toThrow('Configuration validation failed: runtime.logLevel: Invalid enum value');
    expect(build).toThrow('; deploy.installTimeout: must be a duration such as 15m');
  });

  it('should reject a chart archive that is not a URL', () => {
    expect(() => createAppConfig({ CHART_ARCHIVE_URL: 'not a url' })).toThrow('chart.archiveUrl: Invalid url');
  });
});
