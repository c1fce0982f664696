/**
 * Bolt Value Conversion
 *
 * Turns driver values into plain JavaScript. Nodes and relationships are
 * recognised by shape so the conversion runs without the driver loaded.
 */

import type { EdgeRef, ElementId, VertexRef } from "@graphcheck/harness"
import type { IdFunction } from "./config"

interface BoltInteger {
  toNumber(): number
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function isBoltInteger(value: unknown): value is BoltInteger {
  return typeof value === "object" && value !== null && "toNumber" in value && typeof value.toNumber === "function"
}

function isNode(value: unknown): value is Record<string, unknown> & { labels: unknown[]; properties: Record<string, unknown> } {
  return isRecord(value) && Array.isArray(value.labels) && isRecord(value.properties)
}

function isRelationship(
  value: unknown,
): value is Record<string, unknown> & { type: string; properties: Record<string, unknown> } {
  return isRecord(value) && typeof value.type === "string" && isRecord(value.properties)
}

/**
 * Convert a single value: integers to numbers, lists and maps recursively.
 */
export function convertValue(value: unknown): unknown {
  if (isBoltInteger(value)) {
    return value.toNumber()
  }
  if (Array.isArray(value)) {
    return value.map(convertValue)
  }
  if (isRecord(value)) {
    return convertProperties(value)
  }
  return value
}

export function convertProperties(properties: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(properties)) {
    result[key] = convertValue(value)
  }
  return result
}

function idOf(value: Record<string, unknown>, ids: IdFunction, elementKey: string, legacyKey: string): ElementId | undefined {
  if (ids === "elementId") {
    const id = value[elementKey]
    return typeof id === "string" ? id : undefined
  }
  const id = convertValue(value[legacyKey])
  return typeof id === "number" ? id : undefined
}

/**
 * A node as a vertex, or undefined when the value is not a node.
 */
export function toVertex(value: unknown, ids: IdFunction): VertexRef | undefined {
  if (!isNode(value)) return undefined
  const id = idOf(value, ids, "elementId", "identity")
  if (id === undefined) return undefined

  const [label] = value.labels
  return {
    id,
    label: typeof label === "string" ? label : "",
    properties: convertProperties(value.properties),
  }
}

/**
 * A relationship as an edge, or undefined when the value is not a relationship.
 */
export function toEdge(value: unknown, ids: IdFunction): EdgeRef | undefined {
  if (!isRelationship(value)) return undefined
  const id = idOf(value, ids, "elementId", "identity")
  const outId = idOf(value, ids, "startNodeElementId", "start")
  const inId = idOf(value, ids, "endNodeElementId", "end")
  if (id === undefined || outId === undefined || inId === undefined) return undefined

  return {
    id,
    label: value.type,
    outId,
    inId,
    properties: convertProperties(value.properties),
  }
}

/**
 * Backtick-quote a label or relationship type for use in Cypher.
 */
export function quoteIdentifier(name: string): string {
  return `\`${name.replace(/`/g, "``")}\``
}
