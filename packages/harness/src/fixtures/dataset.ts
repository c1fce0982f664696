/**
 * Fixture Datasets
 *
 * The data behind a fixture, stored as JSON named after the fixture. Edges
 * refer to their endpoints by the vertices' unique name property.
 */

import { existsSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { HarnessError } from '../errors'
import type { FixtureSpec } from '../requirements'

/** Datasets bundled with the harness */
export const DEFAULT_FIXTURES_DIR = fileURLToPath(new URL('../../fixtures/', import.meta.url))

const elementIdSchema = z.union([z.string(), z.number()])
const propertiesSchema = z.record(z.unknown())

export const fixtureDatasetSchema = z.object({
  variables: propertiesSchema.optional(),
  vertices: z.array(
    z.object({
      label: z.string().min(1),
      id: elementIdSchema.optional(),
      properties: propertiesSchema,
    }),
  ),
  edges: z
    .array(
      z.object({
        label: z.string().min(1),
        id: elementIdSchema.optional(),
        out: z.string(),
        in: z.string(),
        properties: propertiesSchema.optional(),
      }),
    )
    .default([]),
})

export type FixtureDataset = z.infer<typeof fixtureDatasetSchema>

/**
 * Fixture error.
 * Thrown when a fixture's dataset is missing or malformed.
 */
export class FixtureDataError extends HarnessError {
  constructor(
    public readonly fixture: string,
    message: string,
    cause?: Error,
  ) {
    super(`Fixture ${fixture}: ${message}`, cause)
    this.name = 'FixtureDataError'
  }
}

export function readFixtureDataset(fixture: FixtureSpec, fixturesDir = DEFAULT_FIXTURES_DIR): FixtureDataset {
  const file = join(fixturesDir, `${fixture.name}.json`)
  if (!existsSync(file)) {
    throw new FixtureDataError(fixture.name, `no dataset at ${file}`)
  }

  const result = fixtureDatasetSchema.safeParse(JSON.parse(readFileSync(file, 'utf8')))
  if (!result.success) {
    throw new FixtureDataError(fixture.name, `invalid dataset: ${result.error.message}`, result.error)
  }
  return result.data
}

/**
 * Check the dataset's names are usable for lookups: every vertex has a string
 * name, names are unique, and every edge names existing vertices.
 */
export function validateDatasetNames(fixture: string, dataset: FixtureDataset, nameProperty: string): void {
  const names = new Set<string>()

  for (const vertex of dataset.vertices) {
    const name = vertex.properties[nameProperty]
    if (typeof name !== 'string') {
      throw new FixtureDataError(fixture, `every vertex needs a string ${nameProperty} property`)
    }
    if (names.has(name)) {
      throw new FixtureDataError(fixture, `duplicate vertex ${nameProperty}: ${name}`)
    }
    names.add(name)
  }

  for (const edge of dataset.edges) {
    if (!names.has(edge.out) || !names.has(edge.in)) {
      throw new FixtureDataError(fixture, `edge ${edge.out} -[${edge.label}]-> ${edge.in} names an unknown vertex`)
    }
  }
}

/**
 * Name of a vertex in a dataset that passed validateDatasetNames.
 */
export function datasetVertexName(vertex: FixtureDataset['vertices'][number], nameProperty: string): string {
  return String(vertex.properties[nameProperty])
}
