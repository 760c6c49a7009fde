/**
 * Remote Invoker
 *
 * The only channel to the cluster: `az aks command invoke` submits one
 * self-contained command (plus staged files) to the cluster-side executor and
 * returns its log. No shell state survives between invocations, so multi-step
 * logic has to be expressed inside the single command string.
 */

import path from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { ClusterTarget } from '@/types';
import { COMMAND_FILES_MOUNT } from '@/config/constants';
import { CommandFailedError, StagingConflictError } from '@/lib/errors';
import type { AzureCli } from './az-cli';

export interface RemoteInvoker {
  readonly target: ClusterTarget;
  /**
   * Run `command` on the cluster and return the remote log.
   * Rejects with {@link CommandFailedError} when the remote command exits non-zero.
   * Staged files are addressed through {@link mountedPath}, not their local path.
   */
  invoke: (command: string, files?: readonly string[]) => Promise<string>;
}

/**
 * Path under which the remote executor exposes a staged local file.
 */
export function mountedPath(localPath: string): string {
  return path.posix.join(COMMAND_FILES_MOUNT, path.basename(localPath));
}

function assertUniqueBaseNames(files: readonly string[]): void {
  const seen = new Map<string, number>();
  for (const file of files) {
    const name = path.basename(file);
    seen.set(name, (seen.get(name) ?? 0) + 1);
  }
  const duplicates = [...seen.entries()].filter(([, count]) => count > 1).map(([name]) => name);
  if (duplicates.length > 0) {
    throw new StagingConflictError(duplicates);
  }
}

/** `az aks command invoke` exits 0 whatever the remote exit code was */
export const InvokeResultSchema = z.object({
  exitCode: z.number().int(),
  logs: z.string().nullable(),
});

const REMOTE_LOG_TAIL_LINES = 20;

function tailLines(logs: string): string[] {
  return logs.split(/\r?\n/).filter((line) => line.length > 0).slice(-REMOTE_LOG_TAIL_LINES);
}

/**
 * Argument list for one `az aks command invoke` call; the output format is added by {@link AzureCli.json}.
 */
export function buildInvokeArgs(
  target: ClusterTarget,
  command: string,
  files: readonly string[] = [],
): string[] {
  const args = [
    'aks',
    'command',
    'invoke',
    '-g',
    target.resourceGroup,
    '-n',
    target.clusterName,
    '--command',
    command,
    '--query',
    '{exitCode:exitCode,logs:logs}',
  ];
  for (const file of files) {
    args.push('--file', file);
  }
  return args;
}

export function createRemoteInvoker(
  az: AzureCli,
  target: ClusterTarget,
  logger: Logger,
): RemoteInvoker {
  const log = logger.child({ cluster: target.clusterName, resourceGroup: target.resourceGroup });

  return {
    target,
    async invoke(command, files = []) {
      assertUniqueBaseNames(files);
      log.debug({ command, files: files.map((f) => path.basename(f)) }, 'Invoking remote command');
      const result = await az.json(buildInvokeArgs(target, command, files), InvokeResultSchema);
      const logs = (result.logs ?? '').trim();
      if (result.exitCode !== 0) {
        log.debug({ command, exitCode: result.exitCode }, 'Remote command failed');
        throw new CommandFailedError(result.exitCode, command, logs, tailLines(logs));
      }
      return logs;
    },
  };
}
