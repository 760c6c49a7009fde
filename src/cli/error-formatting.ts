/**
 * Centralized error formatting for CLI commands
 * Ensures consistent error messages and exit behavior
 */

import type { Logger } from 'pino';
import { extractAzureErrorGuidance } from '@/infra/azure/errors';
import { extractErrorMessage, isDeployError } from '@/lib/errors';
import { OptionsValidationError } from './validation';

/**
 * Standard error formatting for CLI commands
 */
export function formatError(message: string, error?: unknown): string {
  const prefix = '❌';
  const baseMessage = `${prefix} ${message}`;

  if (error === undefined) {
    return baseMessage;
  }

  return `${baseMessage}: ${extractErrorMessage(error)}`;
}

/**
 * Lines printed to standard error for a failed command
 */
export function describeError(error: unknown): string[] {
  if (error instanceof OptionsValidationError) {
    return [
      formatError('Invalid options:'),
      ...error.errors.map((problem) => `  • ${problem}`),
      '',
      'Use --help for usage information',
    ];
  }

  const guidance = extractAzureErrorGuidance(error);
  const lines = [formatError(extractErrorMessage(error))];
  if (guidance.hint) {
    lines.push(`   Hint: ${guidance.hint}`);
  }
  if (guidance.resolution) {
    lines.push(`   Resolution: ${guidance.resolution}`);
  }
  return lines;
}

/**
 * Print the failure and exit with status 1. Stacks of unexpected errors are
 * only logged at debug level.
 */
export function handleCommandError(error: unknown, logger?: Logger): never {
  if (logger && !isDeployError(error) && !(error instanceof OptionsValidationError)) {
    logger.debug({ err: error }, 'Unexpected error');
  }
  for (const line of describeError(error)) {
    console.error(line);
  }
  process.exit(1);
}
