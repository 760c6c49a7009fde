/**
 * Shell text helpers for commands submitted to the remote executor.
 *
 * Every remote operation is a single self-contained command string, so values
 * embedded in it must be validated and quoted here.
 */

import { Failure, Success, type Result } from '@/types';
import { ERROR_MESSAGES, InvalidNameError } from './errors';

const DNS_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const MAX_LABEL_LENGTH = 63;

/**
 * Wrap a value in single quotes for POSIX shells.
 */
export function shellQuote(value: string): string {
  if (value !== '' && /^[A-Za-z0-9_@%+=:,./-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, "'\\''")}'`;
}

/**
 * Run a multi-statement script through `bash -lc` as one command string.
 */
export function bashCommand(script: string): string {
  return `bash -lc ${shellQuote(script)}`;
}

/**
 * Validate a Kubernetes object name (namespace, release) as a DNS-1123 label.
 */
export function validateKubernetesName(kind: string, name: string): Result<string> {
  if (!DNS_LABEL.test(name)) {
    return Failure(ERROR_MESSAGES.INVALID_NAME(kind, name), {
      message: ERROR_MESSAGES.INVALID_NAME(kind, name),
      hint: 'Kubernetes names must be DNS-1123 labels',
      resolution:
        'Use only lowercase letters (a-z), numbers (0-9), and hyphens (-). Start and end with alphanumeric characters',
    });
  }

  if (name.length > MAX_LABEL_LENGTH) {
    return Failure(`${kind} too long: "${name}". Must be ${MAX_LABEL_LENGTH} characters or less.`, {
      message: `${kind} too long: "${name}"`,
      hint: `Kubernetes names have a maximum length of ${MAX_LABEL_LENGTH} characters`,
    });
  }

  return Success(name);
}

/**
 * Throwing variant for call sites that sit inside a pipeline stage.
 */
export function requireKubernetesName(kind: string, name: string): string {
  const result = validateKubernetesName(kind, name);
  if (!result.ok) {
    throw new InvalidNameError(kind, name, result.guidance?.hint);
  }
  return result.value;
}
