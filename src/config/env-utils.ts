/**
 * Environment Variable Parsing Utilities
 *
 * Each helper reads from an explicit environment record so callers decide
 * which environment is consulted. Empty values count as unset.
 */

export type EnvRecord = Readonly<Record<string, string | undefined>>;

/**
 * Parse integer from environment variable with default
 *
 * @example
 * parseIntEnv(env, 'INGRESS_READY_ATTEMPTS', 30) // 30 if unset or not a number
 */
export function parseIntEnv(env: EnvRecord, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse string from environment variable, `undefined` when unset or empty
 */
export function parseOptionalEnv(env: EnvRecord, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}
