/**
 * Tests for remote Kubernetes and Helm operations
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import {
  buildInstallScript,
  createRemoteOps,
  ensureNamespaceCommand,
} from '@/infra/kubernetes/remote-ops';
import { InputFileMissingError, InvalidNameError, ManifestMissingError } from '@/lib/errors';
import { createFakeInvoker, silentLogger } from '../../../__support__/fakes';
import { createTestTempDir, writeTree } from '../../../__support__/utilities/tmp-helpers';

const cleanups: Array<() => void> = [];
function tempDir(): string {
  const { dir, cleanup } = createTestTempDir('ops-');
  cleanups.push(cleanup);
  return dir.name;
}

afterEach(() => {
  while (cleanups.length > 0) cleanups.pop()?.();
});

describe('ensureNamespaceCommand', () => {
  it('should check then create in a single command', () => {
    expect(ensureNamespaceCommand('supabase')).toBe(
      "bash -lc 'kubectl get ns supabase >/dev/null 2>&1 || kubectl create ns supabase'",
    );
  });

  it('should reject names that are not DNS labels', () => {
    expect(() => ensureNamespaceCommand('Bad;Name')).toThrow(InvalidNameError);
  });
});

describe('buildInstallScript', () => {
  const script = buildInstallScript({
    namespace: 'supabase',
    release: 'supabase',
    chartFile: '/command-files/supabase-0.1.3.tgz',
    valuesFile: '/command-files/values.yaml',
    timeout: '15m',
  });

  it('should upgrade or install with the staged chart and values', () => {
    expect(script.split('\n')).toContain(
      'if ! helm upgrade --install supabase /command-files/supabase-0.1.3.tgz --namespace supabase --create-namespace -f /command-files/values.yaml --timeout 15m --wait --debug; then',
    );
  });

  it('should print status, pods and events before failing', () => {
    const lines = script.split('\n');
    const status = lines.indexOf("  echo '--- Status ---'");
    const pods = lines.indexOf("  echo '--- Pods ---'");
    const events = lines.indexOf("  echo '--- Events ---'");

    expect(status).toBeGreaterThan(0);
    expect(pods).toBeGreaterThan(status);
    expect(events).toBeGreaterThan(pods);
    expect(lines[events + 2]).toBe('  exit 1');
  });

  it('should end with release status and pod listing', () => {
    expect(script.trimEnd().split('\n').slice(-2)).toEqual([
      'helm status supabase -n supabase',
      'kubectl get pods -n supabase',
    ]);
  });
});

describe('createRemoteOps', () => {
  it('should apply each manifest through the command-files mount', async () => {
    const root = tempDir();
    const files = writeTree(root, {
      'k8s/eso/secretstore.yaml': 'kind: SecretStore',
      'k8s/s3proxy/deployment.yaml': 'kind: Deployment',
    });
    const invoker = createFakeInvoker((command) => `applied: ${command}`);
    const ops = createRemoteOps(invoker, silentLogger());

    const logs = await ops.applyManifestFiles(files);

    expect(invoker.calls).toEqual([
      { command: 'kubectl apply -f /command-files/secretstore.yaml', files: [files[0]] },
      { command: 'kubectl apply -f /command-files/deployment.yaml', files: [files[1]] },
    ]);
    expect(logs).toEqual([
      'applied: kubectl apply -f /command-files/secretstore.yaml',
      'applied: kubectl apply -f /command-files/deployment.yaml',
    ]);
  });

  it('should quote manifest names that are not shell-safe', async () => {
    const root = tempDir();
    const files = writeTree(root, { "k8s/it's here.yaml": 'kind: ConfigMap' });
    const invoker = createFakeInvoker();
    const ops = createRemoteOps(invoker, silentLogger());

    await ops.applyManifestFiles(files);

    expect(invoker.calls[0]?.command).toBe("kubectl apply -f '/command-files/it'\\''s here.yaml'");
  });

  it('should apply nothing when any manifest is missing', async () => {
    const root = tempDir();
    const [present] = writeTree(root, { 'k8s/eso/secretstore.yaml': 'kind: SecretStore' });
    const missing = path.join(root, 'k8s/eso/externalsecret.yaml');
    const invoker = createFakeInvoker();
    const ops = createRemoteOps(invoker, silentLogger());

    await expect(ops.applyManifestFiles([present ?? '', missing])).rejects.toEqual(
      new ManifestMissingError(missing),
    );
    expect(invoker.calls).toHaveLength(0);
  });

  it('should list releases from helm JSON', async () => {
    const invoker = createFakeInvoker(
      () =>
        '[{"name":"supabase","namespace":"supabase","revision":"3","status":"deployed","chart":"supabase-0.1.3"}]',
    );
    const ops = createRemoteOps(invoker, silentLogger());

    const releases = await ops.listReleases();

    expect(invoker.calls[0]?.command).toBe('helm list -A -o json');
    expect(releases).toEqual([
      {
        name: 'supabase',
        namespace: 'supabase',
        revision: '3',
        status: 'deployed',
        chart: 'supabase-0.1.3',
      },
    ]);
  });

  it('should treat empty helm output as no releases', async () => {
    const ops = createRemoteOps(createFakeInvoker(() => ''), silentLogger());

    await expect(ops.listReleases()).resolves.toEqual([]);
  });

  it('should query objects as JSON and events as a tail', async () => {
    const invoker = createFakeInvoker((command) => (command.includes('-o json') ? '{"items":[]}' : 'events'));
    const ops = createRemoteOps(invoker, silentLogger());

    await expect(ops.getJson('supabase', 'pods')).resolves.toEqual({ items: [] });
    await expect(ops.recentEvents('supabase', 20)).resolves.toBe('events');
    expect(invoker.calls.map((call) => call.command)).toEqual([
      'kubectl -n supabase get pods -o json',
      "bash -lc 'kubectl -n supabase get events --sort-by='\\''.lastTimestamp'\\'' | tail -n 20'",
    ]);
  });

  it('should stage the install script with the chart and values', async () => {
    const root = tempDir();
    const [chart, values] = writeTree(root, {
      'supabase-0.1.3.tgz': 'chart',
      'values.yaml': 'replicas: 1',
    });
    let stagedScript = '';
    const invoker = createFakeInvoker((_command, files) => {
      stagedScript = readFileSync(files[0] ?? '', 'utf-8');
      return 'STATUS: deployed';
    });
    const ops = createRemoteOps(invoker, silentLogger());

    const log = await ops.installChart({
      namespace: 'supabase',
      release: 'supabase',
      chartPackage: chart ?? '',
      valuesFile: values ?? '',
      timeout: '15m',
    });

    expect(log).toBe('STATUS: deployed');
    expect(invoker.calls[0]?.command).toBe('bash /command-files/install.sh');
    expect(invoker.calls[0]?.files.slice(1)).toEqual([chart, values]);
    expect(path.basename(invoker.calls[0]?.files[0] ?? '')).toBe('install.sh');
    expect(stagedScript).toContain('/command-files/supabase-0.1.3.tgz');
    expect(stagedScript).toContain('-f /command-files/values.yaml');
  });

  it('should refuse to install without the values file', async () => {
    const root = tempDir();
    const [chart] = writeTree(root, { 'supabase-0.1.3.tgz': 'chart' });
    const invoker = createFakeInvoker();
    const ops = createRemoteOps(invoker, silentLogger());

    await expect(
      ops.installChart({
        namespace: 'supabase',
        release: 'supabase',
        chartPackage: chart ?? '',
        valuesFile: path.join(root, 'values.yaml'),
        timeout: '15m',
      }),
    ).rejects.toBeInstanceOf(InputFileMissingError);
    expect(invoker.calls).toHaveLength(0);
  });
});
