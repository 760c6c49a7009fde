/**
 * infra-deploy / infra-destroy commands
 */

import { Command } from 'commander';
import { CDKTF } from '@/config';
import { runInfra, type InfraAction } from '@/workflows/infra';
import { InfraOptionsSchema } from '../validation';
import { runCommand, type CommandContext } from './context';

const DESCRIPTIONS: Record<InfraAction, string> = {
  deploy: 'Deploy infrastructure via CDKTF',
  destroy: 'Destroy infrastructure via CDKTF',
};

export function createInfraCommand(ctx: CommandContext, action: InfraAction): Command {
  return new Command(`infra-${action}`)
    .description(DESCRIPTIONS[action])
    .option('--project-dir <path>', 'CDKTF project directory', CDKTF.defaultProjectDir)
    .action(async (_options: unknown, command: Command) => {
      await runCommand(ctx, command, InfraOptionsSchema, () => ({}), async (options, deps) => {
        await runInfra(deps.executor, action, options.projectDir, deps.logger);
        ctx.print(action === 'deploy' ? 'CDKTF deploy completed.' : 'Destroy completed.');
      });
    });
}
