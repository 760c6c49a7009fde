/**
 * Azure CLI adapter over the Process Executor
 */

import type { z } from 'zod';
import type { ProcessExecutor } from '@/infra/process/executor';
import { createCommandSpec } from '@/infra/process/executor';

export interface AzRunOptions {
  /** Values masked in logs and errors */
  redact?: readonly string[];
}

export interface AzureCli {
  /** Run `az <args>` and return its standard output */
  run: (args: readonly string[], options?: AzRunOptions) => Promise<string>;
  /** Run `az <args> -o json` and validate the parsed output */
  json: <T>(args: readonly string[], schema: z.ZodType<T, z.ZodTypeDef, unknown>) => Promise<T>;
}

export function resolveAzExecutable(configured?: string): string {
  if (configured) return configured;
  return process.platform === 'win32' ? 'az.cmd' : 'az';
}

export function createAzureCli(executor: ProcessExecutor, cliPath?: string): AzureCli {
  const az = resolveAzExecutable(cliPath);

  const run = async (args: readonly string[], options: AzRunOptions = {}): Promise<string> => {
    const spec = createCommandSpec([az, ...args], options.redact ? { redact: options.redact } : {});
    const { stdout } = await executor.run(spec);
    return stdout;
  };

  const json = async <T>(
    args: readonly string[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> => {
    const stdout = await run([...args, '-o', 'json']);
    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout);
    } catch (error) {
      throw new Error(`az ${args.slice(0, 3).join(' ')} returned invalid JSON`, { cause: error });
    }
    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new Error(
        `Unexpected output from az ${args.slice(0, 3).join(' ')}: ${result.error.issues
          .map((issue) => `${issue.path.join('.')} ${issue.message}`)
          .join('; ')}`,
      );
    }
    return result.data;
  };

  return { run, json };
}
