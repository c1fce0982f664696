/**
 * Identifier Lookup Helpers
 *
 * Fixture elements carry a unique name property, so tests can refer to them by
 * name and resolve the ids the backend assigned.
 */

import { ElementNotFoundError } from '../errors'
import type { ElementId, EdgeRef, TestGraph, VertexRef } from '../provider'

export const DEFAULT_NAME_PROPERTY = 'name'

export interface LookupOptions {
  nameProperty?: string
}

export async function vertexByName(graph: TestGraph, name: string, options: LookupOptions = {}): Promise<VertexRef> {
  const property = options.nameProperty ?? DEFAULT_NAME_PROPERTY
  const [vertex] = await graph.findVertices(property, name)
  if (!vertex) {
    throw new ElementNotFoundError('vertex', `${property}=${JSON.stringify(name)}`)
  }
  return vertex
}

export async function vertexIdByName(graph: TestGraph, name: string, options: LookupOptions = {}): Promise<ElementId> {
  const vertex = await vertexByName(graph, name, options)
  return vertex.id
}

/**
 * Id of the edge labelled `label` from the vertex named `outName` to the vertex named `inName`.
 */
export async function edgeByNames(
  graph: TestGraph,
  outName: string,
  label: string,
  inName: string,
  options: LookupOptions = {},
): Promise<EdgeRef> {
  const property = options.nameProperty ?? DEFAULT_NAME_PROPERTY
  const criteria = `${JSON.stringify(outName)} -[${label}]-> ${JSON.stringify(inName)}`

  for (const outVertex of await graph.findVertices(property, outName)) {
    for (const edge of await graph.outEdges(outVertex.id, label)) {
      const inVertex = await graph.vertex(edge.inId)
      if (inVertex && inVertex.properties[property] === inName) {
        return edge
      }
    }
  }

  throw new ElementNotFoundError('edge', criteria)
}

export async function edgeIdByNames(
  graph: TestGraph,
  outName: string,
  label: string,
  inName: string,
  options: LookupOptions = {},
): Promise<ElementId> {
  const edge = await edgeByNames(graph, outName, label, inName, options)
  return edge.id
}
