/**
 * Error guidance pattern matching for consistent, reusable error handling
 */

import type { ErrorGuidance } from '@/types';
import { extractErrorMessage } from './errors';

/**
 * Pattern definition for matching errors and generating guidance
 */
export interface ErrorPattern {
  match: (error: unknown) => boolean;
  guidance: (error: unknown) => ErrorGuidance;
}

/**
 * Create error guidance builder with pattern matching
 *
 * Patterns are checked in order; the first match wins.
 *
 * @example
 * ```typescript
 * const extract = createErrorGuidanceBuilder([
 *   customPattern((e) => e instanceof TimeoutError, { message: 'Timed out' }),
 * ]);
 * const guidance = extract(error);
 * ```
 */
export function createErrorGuidanceBuilder(
  patterns: ErrorPattern[],
  defaultGuidance?: (error: unknown) => ErrorGuidance,
) {
  return function extractGuidance(error: unknown): ErrorGuidance {
    for (const pattern of patterns) {
      if (pattern.match(error)) {
        return pattern.guidance(error);
      }
    }

    if (defaultGuidance) {
      return defaultGuidance(error);
    }

    return {
      message: extractErrorMessage(error),
      hint: 'An unexpected error occurred',
      resolution: 'Check the error message and logs for more details',
    };
  };
}

/**
 * Create pattern with custom match function
 */
export function customPattern(
  matchFn: (error: unknown) => boolean,
  guidance: ErrorGuidance | ((error: unknown) => ErrorGuidance),
): ErrorPattern {
  return {
    match: matchFn,
    guidance: typeof guidance === 'function' ? guidance : () => guidance,
  };
}
