/**
 * secrets-sync command
 */

import path from 'node:path';
import { Command } from 'commander';
import { synchronizeSecrets } from '@/workflows/secrets/synchronizer';
import { loadSecretsFile } from '@/workflows/secrets/sources';
import { renderSecretReport } from '../render';
import { SecretsSyncOptionsSchema } from '../validation';
import { runCommand, type CommandContext } from './context';
import { clusterDefaults, configSecretValues } from './deploy';

export function createSecretsSyncCommand(ctx: CommandContext): Command {
  return new Command('secrets-sync')
    .description('Synchronize secrets into Key Vault without overwriting existing ones')
    .option('--key-vault <name>', 'Key Vault name')
    .option('--resource-group <name>', 'resource group for credential lookup and role assignment')
    .option('--cluster-name <name>', 'AKS cluster whose kubelet identity gets vault read access')
    .option('--secrets-file <path>', 'JSON object of secret names to values')
    .option('--generate-default-secrets', 'generate defaults for secrets not supplied')
    .option('--skip-role-assignment', 'do not grant the kubelet identity vault read access')
    .action(async (_options: unknown, command: Command) => {
      await runCommand(ctx, command, SecretsSyncOptionsSchema, clusterDefaults, async (options, deps) => {
        const fileValues = options.secretsFile
          ? await loadSecretsFile(path.resolve(options.secretsFile))
          : {};
        const report = await synchronizeSecrets(
          { vault: deps.vault, discovery: deps.discovery, logger: deps.logger },
          {
            vault: options.keyVault,
            resourceGroup: options.resourceGroup,
            clusterName: options.clusterName,
            fileValues,
            configValues: configSecretValues(deps.config),
            generateDefaults: options.generateDefaultSecrets,
            skipRoleAssignment: options.skipRoleAssignment,
          },
        );
        renderSecretReport(report).forEach(ctx.print);
      });
    });
}
