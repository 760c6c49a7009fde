/**
 * Infrastructure provisioning through the CDK for Terraform CLI.
 */

import path from 'node:path';
import type { Logger } from 'pino';
import type { ProcessExecutor } from '@/infra/process/executor';
import { createCommandSpec } from '@/infra/process/executor';
import { CDKTF } from '@/config/constants';
import { InputFileMissingError } from '@/lib/errors';
import { isDirectory } from '@/lib/file-utils';

export type InfraAction = 'deploy' | 'destroy';

export const INFRA_STEPS: Readonly<Record<InfraAction, readonly (readonly string[])[]>> = {
  deploy: [['get'], ['synth'], ['deploy', '--auto-approve']],
  destroy: [['destroy', '--auto-approve']],
};

export async function runInfra(
  executor: ProcessExecutor,
  action: InfraAction,
  projectDir: string,
  logger: Logger,
): Promise<void> {
  const cwd = path.resolve(projectDir);
  if (!(await isDirectory(cwd))) {
    throw new InputFileMissingError('Project directory', cwd);
  }

  for (const step of INFRA_STEPS[action]) {
    logger.info({ projectDir: cwd, step: step[0] }, `cdktf ${step.join(' ')}`);
    await executor.run(createCommandSpec([CDKTF.executable, ...step], { cwd }));
  }
}
