/**
 * Environment variable access.
 *
 * @param key - Environment variable name
 * @returns Environment variable value or undefined
 *
 * @example
 * ```typescript
 * const level = getEnv('ACCORDO_LOG_LEVEL')
 * ```
 */
export function getEnv(key: string): string | undefined {
  if (globalThis.process?.env) {
    return globalThis.process.env[key]
  }
  // Browser / other - no env vars
  return undefined
}

/**
 * Read a boolean flag from the environment. `1`, `true`, `yes` and `on`
 * (any case) count as true; unset falls back to `fallback`.
 */
export function getEnvFlag(key: string, fallback = false): boolean {
  const raw = getEnv(key)
  if (raw === undefined || raw.trim() === '') {
    return fallback
  }
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase())
}
