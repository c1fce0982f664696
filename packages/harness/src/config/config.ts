/**
 * Harness Configuration
 *
 * Environment-driven settings, validated with zod.
 */

import { z } from 'zod'
import { ConfigurationError } from '../errors'

export const harnessConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
  /** Root directory for backends that persist graphs to disk */
  dataDir: z.string().min(1).optional(),
  /** Property every fixture element carries as its unique name */
  nameProperty: z.string().min(1).default('name'),
})

export type HarnessConfig = z.infer<typeof harnessConfigSchema>
export type HarnessConfigInput = z.input<typeof harnessConfigSchema>

export type Environment = Record<string, string | undefined>

/**
 * Validate a configuration object, throwing ConfigurationError with every issue.
 */
export function parseHarnessConfig(input: unknown = {}): HarnessConfig {
  const result = harnessConfigSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigurationError(`Invalid harness configuration: ${issues.join('; ')}`, issues)
  }
  return result.data
}

/**
 * Read harness configuration from environment variables.
 *
 * - `GRAPHCHECK_LOG_LEVEL`
 * - `GRAPHCHECK_DATA_DIR`
 * - `GRAPHCHECK_NAME_PROPERTY`
 */
export function loadHarnessConfig(env: Environment = process.env): HarnessConfig {
  return parseHarnessConfig({
    logLevel: emptyToUndefined(env.GRAPHCHECK_LOG_LEVEL),
    dataDir: emptyToUndefined(env.GRAPHCHECK_DATA_DIR),
    nameProperty: emptyToUndefined(env.GRAPHCHECK_NAME_PROPERTY),
  })
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value
}
