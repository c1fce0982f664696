/**
 * In-Memory Graph Store Types
 *
 * Core data structures for the in-memory graph.
 */

import type { ElementId } from "@graphcheck/harness"

/**
 * Stored vertex with all properties.
 */
export interface StoredVertex {
  /** Unique identifier */
  id: ElementId
  /** Vertex label */
  label: string
  /** Vertex properties (excluding id) */
  properties: Record<string, unknown>
}

/**
 * Stored edge with endpoints and properties.
 */
export interface StoredEdge {
  /** Unique identifier */
  id: ElementId
  /** Edge label */
  label: string
  /** Outgoing (source) vertex ID */
  outId: ElementId
  /** Incoming (target) vertex ID */
  inId: ElementId
  /** Edge properties (excluding id) */
  properties: Record<string, unknown>
}

/**
 * Serializable form of a whole store.
 */
export interface StoreData {
  vertices: StoredVertex[]
  edges: StoredEdge[]
  variables: Record<string, unknown>
}

/**
 * Transaction snapshot for rollback support.
 */
export interface TransactionSnapshot {
  vertices: Map<ElementId, StoredVertex>
  edges: Map<ElementId, StoredEdge>
  outEdges: Map<ElementId, Set<ElementId>>
  inEdges: Map<ElementId, Set<ElementId>>
  variables: Map<string, unknown>
}
