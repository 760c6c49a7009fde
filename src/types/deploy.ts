/**
 * Data model of the command execution and deployment pipeline.
 */

/**
 * One external command invocation. Frozen by `createCommandSpec`.
 */
export interface CommandSpec {
  /** Executable followed by its arguments */
  readonly args: readonly string[];
  readonly cwd?: string;
  /** Local files staged alongside a remote execution */
  readonly files?: readonly string[];
  /** Argument values masked as `***` wherever the command line is rendered */
  readonly redact?: readonly string[];
}

export interface CommandResult {
  /** Trimmed standard output. Standard error is never part of it. */
  stdout: string;
  exitCode: number;
}

export type LogStream = 'stdout' | 'stderr';

/**
 * A single output line tagged with its source stream. Echoed live, never persisted.
 */
export interface RemoteLogLine {
  source: LogStream;
  text: string;
}

/**
 * Secret name to value. Assembled once per synchronization run.
 */
export type SecretSet = Readonly<Record<string, string>>;

/**
 * Where a secret value came from, in precedence order.
 */
export type SecretSourceKind = 'explicit' | 'generated' | 'cloud' | 'derived';

/**
 * Addressing pair for the cluster-side executor.
 */
export interface ClusterTarget {
  resourceGroup: string;
  clusterName: string;
}
