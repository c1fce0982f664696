/**
 * Bolt Configuration
 */

import { ConfigurationError, type Environment } from "@graphcheck/harness"
import { z } from "zod"

export const boltConfigSchema = z.object({
  uri: z.string().url(),
  username: z.string().min(1).optional(),
  password: z.string().optional(),
  database: z.string().min(1).optional(),
  /**
   * Function returning element ids: `elementId` on Neo4j 5, `id` on servers
   * without it (Memgraph).
   */
  idFunction: z.enum(["elementId", "id"]).default("elementId"),
  pool: z
    .object({
      maxSize: z.number().int().positive().optional(),
      acquisitionTimeout: z.number().int().positive().optional(),
    })
    .optional(),
})

export type BoltConfig = z.infer<typeof boltConfigSchema>
export type IdFunction = BoltConfig["idFunction"]

export function parseBoltConfig(input: unknown): BoltConfig {
  const result = boltConfigSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    throw new ConfigurationError(`Invalid bolt configuration: ${issues.join("; ")}`, issues)
  }
  return result.data
}

/**
 * Read Bolt settings from environment variables.
 *
 * - `GRAPHCHECK_BOLT_URI` (required)
 * - `GRAPHCHECK_BOLT_USER`
 * - `GRAPHCHECK_BOLT_PASSWORD`
 * - `GRAPHCHECK_BOLT_DATABASE`
 * - `GRAPHCHECK_BOLT_ID_FUNCTION`
 */
export function loadBoltConfig(env: Environment = process.env): BoltConfig {
  return parseBoltConfig({
    uri: present(env.GRAPHCHECK_BOLT_URI),
    username: present(env.GRAPHCHECK_BOLT_USER),
    password: env.GRAPHCHECK_BOLT_PASSWORD,
    database: present(env.GRAPHCHECK_BOLT_DATABASE),
    idFunction: present(env.GRAPHCHECK_BOLT_ID_FUNCTION),
  })
}

function present(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value
}
