/**
 * Tests for CDKTF provisioning steps
 */

import { describe, it, expect, afterAll } from '@jest/globals';
import path from 'node:path';
import { runInfra } from '@/workflows/infra';
import { InputFileMissingError } from '@/lib/errors';
import { createFakeExecutor, silentLogger } from '../../__support__/fakes';
import { createTestTempDir } from '../../__support__/utilities/tmp-helpers';

describe('runInfra', () => {
  const { dir, cleanup } = createTestTempDir('infra-');
  afterAll(cleanup);

  it('should fetch providers, synthesize and deploy in the project directory', async () => {
    const executor = createFakeExecutor();

    await runInfra(executor, 'deploy', dir.name, silentLogger());

    expect(executor.specs.map((spec) => spec.args.join(' '))).toEqual([
      'cdktf get',
      'cdktf synth',
      'cdktf deploy --auto-approve',
    ]);
    expect(executor.specs.every((spec) => spec.cwd === path.resolve(dir.name))).toBe(true);
  });

  it('should destroy in one step', async () => {
    const executor = createFakeExecutor();

    await runInfra(executor, 'destroy', dir.name, silentLogger());

    expect(executor.specs.map((spec) => spec.args.join(' '))).toEqual(['cdktf destroy --auto-approve']);
  });

  it('should refuse a missing project directory', async () => {
    const executor = createFakeExecutor();

    await expect(
      runInfra(executor, 'deploy', path.join(dir.name, 'absent'), silentLogger()),
    ).rejects.toBeInstanceOf(InputFileMissingError);
    expect(executor.specs).toEqual([]);
  });
});
