/**
 * Fixture Loading
 *
 * Writes a fixture's dataset into a MemoryGraph.
 */

import {
  datasetVertexName,
  DEFAULT_NAME_PROPERTY,
  readFixtureDataset,
  validateDatasetNames,
  type ElementId,
  type FixtureSpec,
} from "@graphcheck/harness"
import type { MemoryGraph } from "./graph"

export interface FixtureLoadOptions {
  fixturesDir?: string
  nameProperty?: string
}

/**
 * Write a fixture's dataset into a graph and commit it when the graph has transactions.
 */
export function loadFixtureDataset(graph: MemoryGraph, fixture: FixtureSpec, options: FixtureLoadOptions = {}): void {
  const dataset = readFixtureDataset(fixture, options.fixturesDir)
  const nameProperty = options.nameProperty ?? DEFAULT_NAME_PROPERTY
  validateDatasetNames(fixture.name, dataset, nameProperty)

  const idsByName = new Map<string, ElementId>()

  for (const [key, value] of Object.entries(dataset.variables ?? {})) {
    graph.setVariable(key, value)
  }

  for (const vertex of dataset.vertices) {
    const created = graph.addVertex(vertex.label, vertex.properties, vertex.id)
    idsByName.set(datasetVertexName(vertex, nameProperty), created.id)
  }

  for (const edge of dataset.edges) {
    const outId = idsByName.get(edge.out)
    const inId = idsByName.get(edge.in)
    if (outId === undefined || inId === undefined) continue
    graph.addEdge(edge.label, outId, inId, edge.properties ?? {}, edge.id)
  }

  if (graph.features.supportsTransactions()) {
    graph.tx().commit()
  }
}
