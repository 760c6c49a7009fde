/**
 * Tests for cluster baseline configuration
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import path from 'node:path';
import { configureCluster, existingFiles, type ConfigureContext } from '@/workflows/configure';
import { ingressAnnotateCommand } from '@/workflows/addons';
import { createRemoteOps } from '@/infra/kubernetes/remote-ops';
import { commandFailure, createFakeInvoker, silentLogger } from '../../__support__/fakes';
import { createTestTempDir, writeTree } from '../../__support__/utilities/tmp-helpers';

describe('existingFiles', () => {
  let root: string;
  let cleanup: () => void;

  beforeEach(() => {
    const temp = createTestTempDir('configure-');
    root = temp.dir.name;
    cleanup = temp.cleanup;
  });

  afterEach(() => cleanup());

  it('should keep only present files in the given order', async () => {
    writeTree(root, { 'b.yaml': 'b', 'a.yaml': 'a' });

    await expect(existingFiles(root, ['a.yaml', 'missing.yaml', 'b.yaml'])).resolves.toEqual([
      path.join(root, 'a.yaml'),
      path.join(root, 'b.yaml'),
    ]);
  });
});

describe('configureCluster', () => {
  let root: string;
  let cleanup: () => void;

  beforeEach(() => {
    const temp = createTestTempDir('configure-');
    root = temp.dir.name;
    cleanup = temp.cleanup;
    writeTree(root, {
      'k8s/eso/secretstore.yaml': 'kind: SecretStore',
      'k8s/eso/db-externalsecret.yaml': 'kind: ExternalSecret',
    });
  });

  afterEach(() => cleanup());

  function context(respond: (command: string) => string = () => ''): {
    ctx: ConfigureContext;
    commands: () => string[];
  } {
    const invoker = createFakeInvoker(respond);
    const logger = silentLogger();
    return {
      ctx: {
        invoker,
        ops: createRemoteOps(invoker, logger),
        namespace: 'supabase',
        manifestDir: root,
        ingressReadiness: { attempts: 2, intervalSeconds: 1 },
        logger,
      },
      commands: () => invoker.calls.map((call) => call.command),
    };
  }

  it('should apply present manifests and warn about absent policies', async () => {
    const { ctx, commands } = context();

    const reports = await configureCluster(ctx);

    expect(reports.map((r) => `${r.name}:${r.status}`)).toEqual([
      'ensure-namespace:succeeded',
      'ensure-external-secrets:succeeded',
      'install-ingress-nginx:succeeded',
      'annotate-ingress-internal:succeeded',
      'apply-eso-manifests:succeeded',
      'apply-policies:warned',
    ]);
    expect(reports[5]?.warning).toBe(`No manifests found under ${root}`);
    expect(commands().filter((command) => command.startsWith('kubectl apply'))).toEqual([
      'kubectl apply -f /command-files/secretstore.yaml',
      'kubectl apply -f /command-files/db-externalsecret.yaml',
    ]);
  });

  it('should continue when the ingress service is not ready', async () => {
    const { ctx, commands } = context((command) => {
      if (command.includes('seq 1 2')) throw commandFailure();
      return '';
    });

    const reports = await configureCluster(ctx);

    expect(reports[3]).toMatchObject({ name: 'annotate-ingress-internal', status: 'warned' });
    expect(reports[4]).toMatchObject({ name: 'apply-eso-manifests', status: 'succeeded' });
    expect(commands()).not.toContain(ingressAnnotateCommand());
  });

  it('should abort when the operator install fails', async () => {
    const { ctx, commands } = context((command) => {
      if (command.includes('external-secrets')) throw commandFailure(['Error: timed out']);
      return '';
    });

    await expect(configureCluster(ctx)).rejects.toThrow('Command failed (1): az test');
    expect(commands()).toHaveLength(2);
  });
});
