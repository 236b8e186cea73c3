/**
 * Secret masking for CLI output and Pino logger redaction.
 *
 * Hook environments routinely carry tokens (model registry credentials,
 * storage keys). Their values never appear in logs or in `svcward plan`.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Pino redaction paths. Hook specs are logged with their `env` objects, so
 * every env value is redacted, along with common credential field names.
 */
export const PINO_REDACT_PATHS: string[] = [
  'env.*',
  '*.env.*',
  'token',
  'password',
  'secret',
  '*.token',
  '*.password',
  '*.secret',
]

/** Env var names whose values are shown masked */
const SECRET_NAME_PATTERN = /(TOKEN|SECRET|PASSWORD|PASSWD|API_KEY|ACCESS_KEY|PRIVATE_KEY|CREDENTIALS?)$/i

// ---------------------------------------------------------------------------
// Env masking
// ---------------------------------------------------------------------------

/**
 * Return true when an environment variable name looks like it holds a secret.
 */
export function isSecretName(name: string): boolean {
  return SECRET_NAME_PATTERN.test(name)
}

/**
 * Copy an env map, replacing the values of secret-looking variables with `***`.
 *
 * @example
 * maskEnv({ HF_TOKEN: 'test-secret', CUDA_VISIBLE_DEVICES: '0' })
 * // => { HF_TOKEN: '***', CUDA_VISIBLE_DEVICES: '0' }
 */
export function maskEnv(env: Record<string, string>): Record<string, string> {
  const masked: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    masked[key] = isSecretName(key) ? MASKED_VALUE : value
  }
  return masked
}
