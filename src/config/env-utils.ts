/**
 * Environment Variable Parsing Utilities
 *
 * Every parser takes the environment as its last argument so config can be
 * built from a plain object in tests.
 */

export type Env = Record<string, string | undefined>;

/**
 * Parse integer from environment variable with default
 *
 * @example
 * parseIntEnv('TUNNEL_RETRY_LIMIT', 3) // Returns 3 if TUNNEL_RETRY_LIMIT not set or invalid
 */
export function parseIntEnv(key: string, defaultValue: number, env: Env = process.env): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse string from environment variable with default
 *
 * @example
 * parseStringEnv('LOG_LEVEL', 'info') // Returns 'info' if LOG_LEVEL not set
 */
export function parseStringEnv(key: string, defaultValue: string, env: Env = process.env): string {
  const value = env[key];
  return value === undefined ? defaultValue : value;
}
