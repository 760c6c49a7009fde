#!/usr/bin/env node
/**
 * Supabase on AKS deployment CLI
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { argv, env } from 'node:process';
import { z } from 'zod';
import { createCommandContext, type CommandContext } from './commands/context';
import { createConfigureCommand, createDiagnoseCommand, createSmokeTestCommand } from './commands/cluster';
import { createDeployChartCommand, createDeployCommand } from './commands/deploy';
import { createInfraCommand } from './commands/infra';
import { createSecretsSyncCommand } from './commands/secrets';

const PackageJsonSchema = z.object({ version: z.string() });

/** src/cli and dist/cli both sit two levels below the package root */
function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8'));
  return PackageJsonSchema.parse(raw).version;
}

export function createProgram(ctx: CommandContext, version: string): Command {
  const program = new Command()
    .name('supabase-aks')
    .description('Deploy and operate Supabase on Azure Kubernetes Service')
    .version(version)
    .option('--log-level <level>', 'logging level: fatal, error, warn, info, debug, trace, silent')
    .showHelpAfterError()
    .addHelpText(
      'after',
      `

Examples:
  $ supabase-aks aks-configure --resource-group rg --cluster-name aks
  $ supabase-aks deploy --resource-group rg --cluster-name aks --key-vault kv --values-file values.yaml --generate-default-secrets
  $ supabase-aks diagnose --resource-group rg --cluster-name aks
  $ supabase-aks smoke-test --resource-group rg --cluster-name aks --internal

Environment Variables:
  LOG_LEVEL                     Logging level
  AZURE_RESOURCE_GROUP          Default for --resource-group
  AKS_CLUSTER_NAME              Default for --cluster-name
  AZURE_KEY_VAULT               Default for --key-vault
  AZURE_STORAGE_ACCOUNT_NAME    Storage account name secret
  AZURE_STORAGE_ACCOUNT_KEY     Storage account key secret
  DEPLOY_NAMESPACE              Default for --namespace (supabase)
  DEPLOY_RELEASE                Default for --release (supabase)
  HELM_INSTALL_TIMEOUT          helm --timeout for the install (15m)
  MANIFEST_DIR                  Directory holding k8s/ manifests (current directory)
  CHART_ARCHIVE_URL             Chart source archive
`,
    );

  program.addCommand(createDeployCommand(ctx));
  program.addCommand(createConfigureCommand(ctx));
  program.addCommand(createDiagnoseCommand(ctx));
  program.addCommand(createSmokeTestCommand(ctx));
  program.addCommand(createSecretsSyncCommand(ctx));
  program.addCommand(createDeployChartCommand(ctx));
  program.addCommand(createInfraCommand(ctx, 'deploy'));
  program.addCommand(createInfraCommand(ctx, 'destroy'));

  return program;
}

async function main(): Promise<void> {
  await createProgram(createCommandContext(env), readVersion()).parseAsync(argv);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
}
