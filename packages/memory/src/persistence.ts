/**
 * On-disk form of a persistent memory graph.
 */

import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs"
import { dirname } from "node:path"
import { z } from "zod"
import type { StoreData } from "./store"

const elementIdSchema = z.union([z.string(), z.number()])
const propertiesSchema = z.record(z.unknown())

export const persistedGraphSchema = z.object({
  version: z.literal(1),
  nextId: z.number().int().positive(),
  vertices: z.array(
    z.object({
      id: elementIdSchema,
      label: z.string(),
      properties: propertiesSchema,
    }),
  ),
  edges: z.array(
    z.object({
      id: elementIdSchema,
      label: z.string(),
      outId: elementIdSchema,
      inId: elementIdSchema,
      properties: propertiesSchema,
    }),
  ),
  variables: propertiesSchema,
})

export type PersistedGraph = z.infer<typeof persistedGraphSchema>

export function readPersistedGraph(location: string): PersistedGraph | undefined {
  if (!existsSync(location)) return undefined
  const raw: unknown = JSON.parse(readFileSync(location, "utf8"))
  return persistedGraphSchema.parse(raw)
}

export function writePersistedGraph(location: string, nextId: number, data: StoreData): void {
  mkdirSync(dirname(location), { recursive: true })
  const persisted: PersistedGraph = { version: 1, nextId, ...data }
  writeFileSync(location, JSON.stringify(persisted))
}

/**
 * Remove persisted state. Succeeds when there is none.
 */
export function removePersistedGraph(location: string): void {
  rmSync(location, { force: true })
}
