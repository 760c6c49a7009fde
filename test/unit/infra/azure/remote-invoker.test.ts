import { describe, it, expect } from '@jest/globals';
import { buildInvokeArgs, createRemoteInvoker, mountedPath } from '@/infra/azure/remote-invoker';
import { createAzureCli } from '@/infra/azure/az-cli';
import { CommandFailedError, StagingConflictError } from '@/lib/errors';
import { TEST_TARGET, createFakeExecutor, silentLogger } from '../../../__support__/fakes';

describe('mountedPath', () => {
  it('should relocate a staged file under the command-files mount', () => {
    expect(mountedPath('/home/me/project/k8s/eso/secretstore.yaml')).toBe(
      '/command-files/secretstore.yaml',
    );
  });
});

describe('buildInvokeArgs', () => {
  it('should build the command invoke call with one --file per staged file', () => {
    expect(buildInvokeArgs(TEST_TARGET, 'kubectl get pods', ['/a/one.yaml', '/b/two.yaml'])).toEqual([
      'aks',
      'command',
      'invoke',
      '-g',
      'rg-test',
      '-n',
      'aks-test',
      '--command',
      'kubectl get pods',
      '--query',
      '{exitCode:exitCode,logs:logs}',
      '--file',
      '/a/one.yaml',
      '--file',
      '/b/two.yaml',
    ]);
  });
});

describe('createRemoteInvoker', () => {
  it('should return the remote log', async () => {
    const executor = createFakeExecutor(() =>
      JSON.stringify({ exitCode: 0, logs: 'namespace/supabase created\n' }),
    );
    const invoker = createRemoteInvoker(createAzureCli(executor, 'az'), TEST_TARGET, silentLogger());

    await expect(invoker.invoke('kubectl create ns supabase')).resolves.toBe(
      'namespace/supabase created',
    );
    expect(executor.specs[0]?.args.slice(0, 4)).toEqual(['az', 'aks', 'command', 'invoke']);
    expect(executor.specs[0]?.args.slice(-2)).toEqual(['-o', 'json']);
  });

  it('should treat a null log as empty output', async () => {
    const executor = createFakeExecutor(() => JSON.stringify({ exitCode: 0, logs: null }));
    const invoker = createRemoteInvoker(createAzureCli(executor, 'az'), TEST_TARGET, silentLogger());

    await expect(invoker.invoke('true')).resolves.toBe('');
  });

  it('should reject when the remote command exits non-zero although az succeeded', async () => {
    const logs = 'Error: INSTALLATION FAILED\n--- Status ---\nSTATUS: failed\n';
    const executor = createFakeExecutor(() => JSON.stringify({ exitCode: 1, logs }));
    const invoker = createRemoteInvoker(createAzureCli(executor, 'az'), TEST_TARGET, silentLogger());

    const error = await invoker.invoke('bash /command-files/install.sh').then(
      () => undefined,
      (reason: unknown) => reason,
    );

    expect(error).toBeInstanceOf(CommandFailedError);
    if (!(error instanceof CommandFailedError)) return;
    expect(error.exitCode).toBe(1);
    expect(error.command).toBe('bash /command-files/install.sh');
    expect(error.stdout).toBe('Error: INSTALLATION FAILED\n--- Status ---\nSTATUS: failed');
    expect(error.stderrTail).toEqual(['Error: INSTALLATION FAILED', '--- Status ---', 'STATUS: failed']);
  });

  it('should refuse files that would collide on the mount', async () => {
    const executor = createFakeExecutor();
    const invoker = createRemoteInvoker(createAzureCli(executor, 'az'), TEST_TARGET, silentLogger());

    await expect(
      invoker.invoke('true', ['/a/values.yaml', '/b/values.yaml']),
    ).rejects.toBeInstanceOf(StagingConflictError);
    expect(executor.specs).toHaveLength(0);
  });
});
