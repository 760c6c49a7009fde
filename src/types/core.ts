/**
 * Core type definitions shared by every deployment workflow.
 */

// ===== RESULT TYPE SYSTEM =====

/**
 * Structured error information with actionable guidance
 */
export interface ErrorGuidance {
  /** Primary error message */
  message: string;
  /** What went wrong, in operator terms */
  hint?: string;
  /** Steps that usually fix the problem */
  resolution?: string;
  details?: Record<string, unknown>;
}

/**
 * Result type for outcomes the caller is expected to branch on
 * (best-effort steps, probes, input validation).
 *
 * Hard failures are thrown as `DeployError` subclasses instead.
 *
 * @example
 * ```typescript
 * const grant = await grantVaultReadAccess(request);
 * if (!grant.ok) {
 *   logger.warn({ hint: grant.guidance?.hint }, grant.error);
 * }
 * ```
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; guidance?: ErrorGuidance };

/** Create a success result */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failure result with optional guidance
 */
export const Failure = <T>(error: string, guidance?: ErrorGuidance): Result<T> => {
  const resultGuidance = guidance ? { ...guidance, message: guidance.message || error } : undefined;
  return resultGuidance ? { ok: false, error, guidance: resultGuidance } : { ok: false, error };
};
