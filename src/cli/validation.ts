/**
 * CLI Options Validation Module
 * Validates merged command options (flags over configuration) with zod schemas
 */

import { z } from 'zod';
import { LogLevelSchema } from '@/config/app-config';

/**
 * Raised when command options fail validation; carries every problem found
 */
export class OptionsValidationError extends Error {
  constructor(readonly errors: string[]) {
    super(`Invalid options: ${errors.join('; ')}`);
    this.name = 'OptionsValidationError';
  }
}

const required = (flag: string, envVar?: string): z.ZodString =>
  z
    .string({
      required_error: envVar ? `${flag} is required (or set ${envVar})` : `${flag} is required`,
    })
    .min(1, `${flag} must not be empty`);

const ClusterOptionsSchema = z.object({
  resourceGroup: required('--resource-group', 'AZURE_RESOURCE_GROUP'),
  clusterName: required('--cluster-name', 'AKS_CLUSTER_NAME'),
});

export const GlobalOptionsSchema = z.object({
  logLevel: LogLevelSchema.optional(),
});

export const DeployOptionsSchema = ClusterOptionsSchema.extend({
  namespace: required('--namespace'),
  release: required('--release'),
  keyVault: required('--key-vault', 'AZURE_KEY_VAULT'),
  valuesFile: required('--values-file'),
  secretsFile: z.string().min(1).optional(),
  generateDefaultSecrets: z.boolean().default(false),
});

export const ConfigureOptionsSchema = ClusterOptionsSchema.extend({
  namespace: required('--namespace'),
});

export const DiagnoseOptionsSchema = ClusterOptionsSchema.extend({
  namespace: required('--namespace'),
  release: required('--release'),
});

export const SmokeTestOptionsSchema = z
  .object({
    resourceGroup: z.string().min(1).optional(),
    clusterName: z.string().min(1).optional(),
    namespace: required('--namespace'),
    baseUrl: z.string().url('--base-url must be a URL').optional(),
    internal: z.boolean().default(false),
  })
  .superRefine((options, ctx) => {
    const needsCluster = options.internal || !options.baseUrl;
    if (needsCluster && (!options.resourceGroup || !options.clusterName)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: options.internal
          ? '--internal needs --resource-group and --cluster-name'
          : '--resource-group and --cluster-name are required unless --base-url is given',
      });
    }
  });

export const SecretsSyncOptionsSchema = z.object({
  keyVault: required('--key-vault', 'AZURE_KEY_VAULT'),
  resourceGroup: z.string().min(1).optional(),
  clusterName: z.string().min(1).optional(),
  secretsFile: z.string().min(1).optional(),
  generateDefaultSecrets: z.boolean().default(false),
  skipRoleAssignment: z.boolean().default(false),
});

export const DeployChartOptionsSchema = ClusterOptionsSchema.extend({
  namespace: required('--namespace'),
  release: required('--release'),
  chartTgz: required('--chart-tgz'),
  valuesFile: required('--values-file'),
});

export const InfraOptionsSchema = z.object({
  projectDir: required('--project-dir'),
});

/**
 * Parse options against a schema, collecting every issue
 *
 * @throws OptionsValidationError
 */
export function parseOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new OptionsValidationError(result.error.issues.map((issue) => issue.message));
  }
  return result.data;
}
