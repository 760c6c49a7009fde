/**
 * Application Configuration
 *
 * Single configuration object threaded through every component. The CLI
 * builds it once from `process.env`; nothing else reads the environment.
 */

import { z } from 'zod';
import { DEFAULT_CHART, DEFAULT_DEPLOY, INGRESS_READINESS } from './constants';
import { parseIntEnv, parseOptionalEnv, type EnvRecord } from './env-utils';

const NodeEnvSchema = z.enum(['development', 'production', 'test']).default('production');
export const LogLevelSchema = z
  .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  .default('info');

const AppConfigSchema = z.object({
  runtime: z.object({
    nodeEnv: NodeEnvSchema,
    logLevel: LogLevelSchema,
  }),
  azure: z.object({
    cliPath: z.string().min(1).optional(),
    resourceGroup: z.string().min(1).optional(),
    clusterName: z.string().min(1).optional(),
    keyVault: z.string().min(1).optional(),
    storageAccountName: z.string().min(1).optional(),
    storageAccountKey: z.string().min(1).optional(),
  }),
  deploy: z.object({
    namespace: z.string().min(1).default(DEFAULT_DEPLOY.namespace),
    release: z.string().min(1).default(DEFAULT_DEPLOY.release),
    installTimeout: z
      .string()
      .regex(/^\d+[smh]$/, 'must be a duration such as 15m')
      .default(DEFAULT_DEPLOY.installTimeout),
    manifestDir: z.string().min(1).default(() => process.cwd()),
  }),
  chart: z.object({
    archiveUrl: z.string().url().default(DEFAULT_CHART.archiveUrl),
    rootPrefix: z.string().min(1).default(DEFAULT_CHART.rootPrefix),
    chartPath: z.string().min(1).default(DEFAULT_CHART.chartPath),
    packagePrefix: z.string().min(1).default(DEFAULT_CHART.packagePrefix),
    helmPath: z.string().min(1).default('helm'),
  }),
  ingress: z.object({
    readinessAttempts: z.number().int().positive().default(INGRESS_READINESS.attempts),
    readinessIntervalSeconds: z
      .number()
      .int()
      .positive()
      .default(INGRESS_READINESS.intervalSeconds),
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Create configuration from an environment record with validation
 *
 * @throws Error listing every invalid field
 */
export function createAppConfig(env: EnvRecord): AppConfig {
  const rawConfig = {
    runtime: {
      nodeEnv: parseOptionalEnv(env, 'NODE_ENV'),
      logLevel: parseOptionalEnv(env, 'LOG_LEVEL'),
    },
    azure: {
      cliPath: parseOptionalEnv(env, 'AZ_CLI_PATH'),
      resourceGroup: parseOptionalEnv(env, 'AZURE_RESOURCE_GROUP'),
      clusterName: parseOptionalEnv(env, 'AKS_CLUSTER_NAME'),
      keyVault: parseOptionalEnv(env, 'AZURE_KEY_VAULT'),
      storageAccountName: parseOptionalEnv(env, 'AZURE_STORAGE_ACCOUNT_NAME'),
      storageAccountKey: parseOptionalEnv(env, 'AZURE_STORAGE_ACCOUNT_KEY'),
    },
    deploy: {
      namespace: parseOptionalEnv(env, 'DEPLOY_NAMESPACE'),
      release: parseOptionalEnv(env, 'DEPLOY_RELEASE'),
      installTimeout: parseOptionalEnv(env, 'HELM_INSTALL_TIMEOUT'),
      manifestDir: parseOptionalEnv(env, 'MANIFEST_DIR'),
    },
    chart: {
      archiveUrl: parseOptionalEnv(env, 'CHART_ARCHIVE_URL'),
      helmPath: parseOptionalEnv(env, 'HELM_PATH'),
    },
    ingress: {
      readinessAttempts: parseIntEnv(env, 'INGRESS_READY_ATTEMPTS', INGRESS_READINESS.attempts),
      readinessIntervalSeconds: parseIntEnv(
        env,
        'INGRESS_READY_INTERVAL_SECONDS',
        INGRESS_READINESS.intervalSeconds,
      ),
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Configuration validation failed: ${issues}`);
  }

  return result.data;
}
