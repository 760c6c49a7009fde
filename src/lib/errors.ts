/**
 * Error handling utilities, message templates and the deployment error taxonomy
 *
 * Every stage-level function either returns cleanly or throws one of the
 * `DeployError` subclasses below. Best-effort steps report through `Result`
 * instead (see `@/types`).
 */

import type { ErrorGuidance } from '@/types';

// ============================================================================
// Error Message Templates
// ============================================================================

export const ERROR_MESSAGES = {
  LAUNCH_FAILED: (command: string, reason: string) =>
    `Failed to start command: ${command} (${reason})`,
  COMMAND_FAILED: (exitCode: number, command: string, stdout: string) =>
    `Command failed (${exitCode}): ${command}\nSTDOUT:\n${stdout}`,
  CHART_NOT_FOUND: (location: string) => `Chart directory not found at ${location}`,
  PACKAGE_NOT_PRODUCED: (dir: string, pattern: string) =>
    `Packaged chart matching ${pattern} not found in ${dir}`,
  MISSING_CREDENTIALS: (names: readonly string[]) =>
    `Missing credentials: ${names.map((n) => `'${n}'`).join(', ')}`,
  EMPTY_SECRET_VALUE: (name: string) => `Secret '${name}' has empty value`,
  MANIFEST_MISSING: (path: string) => `Manifest missing: ${path}`,
  INPUT_FILE_MISSING: (label: string, path: string) => `${label} not found: ${path}`,
  STAGING_CONFLICT: (names: readonly string[]) =>
    `Staged files share a name on the remote mount: ${names.join(', ')}`,
  INVALID_NAME: (kind: string, name: string) =>
    `Invalid ${kind}: "${name}". Must contain only lowercase letters, numbers, and hyphens.`,
  SMOKE_TEST_FAILED: (detail: string) => `Smoke test failed: ${detail}`,
  RBAC_GRANT_FAILED: (reason: string) =>
    `Failed to assign 'Key Vault Secrets User' to the kubelet identity: ${reason}`,
} as const;

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Safely extracts error message from unknown error types.
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Create error guidance with context
 */
export function createErrorGuidance(
  message: string,
  hint?: string,
  resolution?: string,
  details?: Record<string, unknown>,
): ErrorGuidance {
  const guidance: ErrorGuidance = { message };
  if (hint !== undefined) guidance.hint = hint;
  if (resolution !== undefined) guidance.resolution = resolution;
  if (details !== undefined) guidance.details = details;
  return guidance;
}

// ============================================================================
// Error Taxonomy
// ============================================================================

export enum DeployErrorCode {
  LAUNCH_FAILED = 'LAUNCH_FAILED',
  COMMAND_FAILED = 'COMMAND_FAILED',
  CHART_NOT_FOUND = 'CHART_NOT_FOUND',
  PACKAGE_NOT_PRODUCED = 'PACKAGE_NOT_PRODUCED',
  MISSING_CREDENTIALS = 'MISSING_CREDENTIALS',
  EMPTY_SECRET_VALUE = 'EMPTY_SECRET_VALUE',
  MANIFEST_MISSING = 'MANIFEST_MISSING',
  INPUT_FILE_MISSING = 'INPUT_FILE_MISSING',
  STAGING_CONFLICT = 'STAGING_CONFLICT',
  INVALID_NAME = 'INVALID_NAME',
  SMOKE_TEST_FAILED = 'SMOKE_TEST_FAILED',
}

/**
 * Base class for expected failure kinds. The CLI prints these without a stack.
 */
export abstract class DeployError extends Error {
  abstract readonly code: DeployErrorCode;
  readonly guidance: ErrorGuidance;

  protected constructor(message: string, guidance: Omit<ErrorGuidance, 'message'> = {}) {
    super(message);
    this.name = new.target.name;
    this.guidance = { message, ...guidance };
  }
}

export function isDeployError(error: unknown): error is DeployError {
  return error instanceof DeployError;
}

export class LaunchFailedError extends DeployError {
  readonly code = DeployErrorCode.LAUNCH_FAILED;

  constructor(
    readonly command: string,
    reason: string,
  ) {
    super(ERROR_MESSAGES.LAUNCH_FAILED(command, reason), {
      hint: 'The executable could not be started',
      resolution: 'Check that the tool is installed and on PATH',
    });
  }
}

export class CommandFailedError extends DeployError {
  readonly code = DeployErrorCode.COMMAND_FAILED;

  /**
   * @param stdout - standard output accumulated before exit; standard error is not included
   * @param stderrTail - last standard error lines, kept apart for guidance lookup only
   */
  constructor(
    readonly exitCode: number,
    readonly command: string,
    readonly stdout: string,
    readonly stderrTail: readonly string[] = [],
  ) {
    super(ERROR_MESSAGES.COMMAND_FAILED(exitCode, command, stdout), {
      details: { exitCode },
    });
  }
}

export class ChartNotFoundError extends DeployError {
  readonly code = DeployErrorCode.CHART_NOT_FOUND;

  constructor(readonly location: string) {
    super(ERROR_MESSAGES.CHART_NOT_FOUND(location), {
      hint: 'The downloaded archive does not contain the expected chart directory',
      resolution: 'Verify the archive URL and the configured chart path',
    });
  }
}

export class PackageNotProducedError extends DeployError {
  readonly code = DeployErrorCode.PACKAGE_NOT_PRODUCED;

  constructor(
    readonly directory: string,
    readonly pattern: string,
  ) {
    super(ERROR_MESSAGES.PACKAGE_NOT_PRODUCED(directory, pattern), {
      hint: 'helm package completed without writing the expected archive',
    });
  }
}

export class MissingCredentialsError extends DeployError {
  readonly code = DeployErrorCode.MISSING_CREDENTIALS;

  constructor(readonly names: readonly string[]) {
    super(ERROR_MESSAGES.MISSING_CREDENTIALS(names), {
      hint: 'The credentials were not supplied and could not be discovered',
      resolution:
        'Provide them via --secrets-file or ensure the Azure CLI can list storage account keys in the resource group',
    });
  }
}

export class EmptySecretValueError extends DeployError {
  readonly code = DeployErrorCode.EMPTY_SECRET_VALUE;

  constructor(readonly secretName: string) {
    super(ERROR_MESSAGES.EMPTY_SECRET_VALUE(secretName), {
      resolution: 'Remove the key from the secrets file or give it a value',
    });
  }
}

export class ManifestMissingError extends DeployError {
  readonly code = DeployErrorCode.MANIFEST_MISSING;

  constructor(readonly path: string) {
    super(ERROR_MESSAGES.MANIFEST_MISSING(path), {
      hint: 'No manifest was applied',
      resolution: 'Run from the repository root or set MANIFEST_DIR',
    });
  }
}

export class InputFileMissingError extends DeployError {
  readonly code = DeployErrorCode.INPUT_FILE_MISSING;

  constructor(
    readonly label: string,
    readonly path: string,
  ) {
    super(ERROR_MESSAGES.INPUT_FILE_MISSING(label, path));
  }
}

export class StagingConflictError extends DeployError {
  readonly code = DeployErrorCode.STAGING_CONFLICT;

  constructor(readonly names: readonly string[]) {
    super(ERROR_MESSAGES.STAGING_CONFLICT(names), {
      hint: 'Staged files are relocated by base name, so duplicates overwrite each other',
    });
  }
}

export class InvalidNameError extends DeployError {
  readonly code = DeployErrorCode.INVALID_NAME;

  constructor(kind: string, name: string, hint?: string) {
    super(ERROR_MESSAGES.INVALID_NAME(kind, name), {
      hint: hint ?? 'Kubernetes names must be DNS-1123 labels',
      resolution:
        'Use only lowercase letters (a-z), numbers (0-9), and hyphens (-). Start and end with alphanumeric characters',
    });
  }
}

export class SmokeTestFailedError extends DeployError {
  readonly code = DeployErrorCode.SMOKE_TEST_FAILED;

  constructor(detail: string) {
    super(ERROR_MESSAGES.SMOKE_TEST_FAILED(detail));
  }
}
