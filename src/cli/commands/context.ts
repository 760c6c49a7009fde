/**
 * Shared plumbing for subcommands: configuration from the environment record
 * plus global flags, option validation, dependency creation and error exit.
 */

import type { Command } from 'commander';
import type { z } from 'zod';
import type { Logger } from 'pino';
import { createAppConfig, type AppConfig, type EnvRecord } from '@/config';
import { createDependencies, type Dependencies } from '@/container';
import { handleCommandError } from '../error-formatting';
import { GlobalOptionsSchema, parseOptions } from '../validation';

export interface CommandContext {
  env: EnvRecord;
  createDeps: (config: AppConfig) => Dependencies;
  /** Command results go to standard output */
  print: (line: string) => void;
  fail: (error: unknown, logger?: Logger) => void;
}

export function createCommandContext(env: EnvRecord): CommandContext {
  return {
    env,
    createDeps: (config) => createDependencies(config),
    print: (line) => console.info(line),
    fail: handleCommandError,
  };
}

function definedEntries(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Flags win over configuration defaults. The global `--log-level` flag wins
 * over `LOG_LEVEL`.
 */
export async function runCommand<T>(
  ctx: CommandContext,
  command: Command,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  defaults: (config: AppConfig) => Record<string, unknown>,
  handler: (options: T, deps: Dependencies) => Promise<void>,
): Promise<void> {
  let logger: Logger | undefined;
  try {
    const flags = command.optsWithGlobals<Record<string, unknown>>();
    const globals = parseOptions(GlobalOptionsSchema, flags);
    const config = createAppConfig(
      globals.logLevel ? { ...ctx.env, LOG_LEVEL: globals.logLevel } : ctx.env,
    );
    const options = parseOptions(schema, { ...definedEntries(defaults(config)), ...definedEntries(flags) });
    const deps = ctx.createDeps(config);
    logger = deps.logger;
    await handler(options, deps);
  } catch (error) {
    ctx.fail(error, logger);
  }
}
