/**
 * Programmatic API for deploying and operating Supabase on AKS
 */

/** @public */
export { createDependencies, type Dependencies } from './container';
/** @public */
export { createAppConfig, type AppConfig } from './config';

/** @public */
export type {
  ClusterTarget,
  CommandResult,
  CommandSpec,
  ErrorGuidance,
  RemoteLogLine,
  Result,
  SecretSet,
  SecretSourceKind,
} from './types';
export { Success, Failure } from './types';

export * from './lib/errors';
export { createLogger, createTimer, type Logger } from './lib/logger';

export {
  createCommandSpec,
  createConsoleEcho,
  createProcessExecutor,
  renderCommand,
  type LineSink,
  type ProcessExecutor,
} from './infra/process/executor';
export { createRemoteInvoker, mountedPath, type RemoteInvoker } from './infra/azure/remote-invoker';
export { createChartPackager, type ChartPackager, type ChartSource } from './infra/helm/chart-packager';
export { createRemoteOps, type RemoteOps } from './infra/kubernetes/remote-ops';

export { runStages, type PipelineStage, type StageReport } from './workflows/pipeline';
export { deploy, DEPLOY_STAGES, type DeployContext } from './workflows/deploy';
export { configureCluster, CONFIGURE_STAGES } from './workflows/configure';
export { synchronizeSecrets, type SecretSyncReport } from './workflows/secrets/synchronizer';
export { resolveSecrets } from './workflows/secrets/sources';
export { grantVaultReadAccess } from './workflows/secrets/rbac-grant';
export { runDiagnostics, renderDiagnostics } from './workflows/diagnostics';
