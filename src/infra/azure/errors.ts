/**
 * Azure CLI error guidance
 */

import type { ErrorGuidance } from '@/types';
import { CommandFailedError, extractErrorMessage, isDeployError } from '@/lib/errors';
import { createErrorGuidanceBuilder, customPattern, type ErrorPattern } from '@/lib/error-guidance';

/**
 * The Azure CLI reports errors on standard error, which the executor keeps
 * apart from captured output as a short tail.
 */
function searchableText(error: unknown): string {
  if (error instanceof CommandFailedError) {
    return error.stderrTail.join('\n').toLowerCase();
  }
  return extractErrorMessage(error).toLowerCase();
}

function textPattern(needles: string[], guidance: ErrorGuidance): ErrorPattern {
  return customPattern((error) => {
    const text = searchableText(error);
    return needles.some((needle) => text.includes(needle));
  }, guidance);
}

const azErrorPatterns: ErrorPattern[] = [
  textPattern(['az login', 'please run', 'no subscription found'], {
    message: 'Azure CLI is not logged in',
    hint: 'The Azure CLI has no active session',
    resolution: 'Run `az login` and select the subscription with `az account set`',
  }),

  textPattern(['authorizationfailed', 'does not have authorization', 'forbidden'], {
    message: 'Azure authorization failed',
    hint: 'The signed-in identity lacks a required role',
    resolution: 'Ask a subscription owner to grant the needed role on the resource group',
  }),

  textPattern(['resourcegroupnotfound', 'resourcenotfound', 'was not found'], {
    message: 'Azure resource not found',
    hint: 'The resource group, cluster or vault name does not exist in this subscription',
    resolution: 'Verify names with `az resource list -g <group>` and the active subscription',
  }),

  textPattern(['runcommand', 'disableruncommand'], {
    message: 'AKS run command failed',
    hint: 'The cluster-side executor rejected or could not run the command',
    resolution: 'Check that run command is enabled on the cluster and that the cluster is running',
  }),

  textPattern(['keyvault', 'key vault'], {
    message: 'Key Vault operation failed',
    hint: 'The vault rejected the request',
    resolution: 'Check the vault name and that your identity has the Key Vault Secrets Officer role',
  }),
];

function defaultGuidance(error: unknown): ErrorGuidance {
  if (isDeployError(error)) {
    return error.guidance;
  }
  return {
    message: extractErrorMessage(error),
    hint: 'An unexpected error occurred',
    resolution: 'Re-run with --log-level debug for more detail',
  };
}

const builder = createErrorGuidanceBuilder(azErrorPatterns, defaultGuidance);

/**
 * Guidance for a failure surfaced at the CLI. Typed errors that already carry
 * a hint keep it; failed Azure CLI calls are matched against known patterns.
 */
export function extractAzureErrorGuidance(error: unknown): ErrorGuidance {
  if (isDeployError(error) && !(error instanceof CommandFailedError)) {
    return error.guidance;
  }
  return builder(error);
}
