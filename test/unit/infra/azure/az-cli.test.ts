import { describe, it, expect } from '@jest/globals';
import { z } from 'zod';
import { createAzureCli, resolveAzExecutable } from '@/infra/azure/az-cli';
import { createFakeExecutor } from '../../../__support__/fakes';

describe('resolveAzExecutable', () => {
  it('should prefer the configured path', () => {
    expect(resolveAzExecutable('/opt/az/bin/az')).toBe('/opt/az/bin/az');
  });
});

describe('createAzureCli', () => {
  it('should prefix the executable and pass redactions through', async () => {
    const executor = createFakeExecutor(() => 'ok');
    const az = createAzureCli(executor, 'az');

    const output = await az.run(['account', 'show'], { redact: ['test-secret'] });

    expect(output).toBe('ok');
    expect(executor.specs[0]).toEqual({ args: ['az', 'account', 'show'], redact: ['test-secret'] });
  });

  it('should request JSON output and validate it', async () => {
    const executor = createFakeExecutor(() => '[{"name":"stacct"}]');
    const az = createAzureCli(executor, 'az');

    const accounts = await az.json(
      ['storage', 'account', 'list'],
      z.array(z.object({ name: z.string() })),
    );

    expect(accounts).toEqual([{ name: 'stacct' }]);
    expect(executor.specs[0]?.args).toEqual(['az', 'storage', 'account', 'list', '-o', 'json']);
  });

  it('should reject output that is not JSON', async () => {
    const az = createAzureCli(createFakeExecutor(() => 'not json'), 'az');

    await expect(az.json(['aks', 'show'], z.object({}))).rejects.toThrow(
      'az aks show returned invalid JSON',
    );
  });

  it('should reject JSON of the wrong shape', async () => {
    const az = createAzureCli(createFakeExecutor(() => '{"id":5}'), 'az');

    await expect(az.json(['aks', 'show'], z.object({ id: z.string() }))).rejects.toThrow(
      /^Unexpected output from az aks show: id /,
    );
  });
});
