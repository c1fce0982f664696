/**
 * Features declared by the in-memory graph.
 */

import type { FeatureDeclaration } from "@graphcheck/harness"

const ALL_DATA_TYPES = {
  BooleanValues: true,
  IntegerValues: true,
  DoubleValues: true,
  StringValues: true,
  ListValues: true,
  MapValues: true,
} as const

export const MEMORY_GRAPH_FEATURES: FeatureDeclaration = {
  graph: {
    Transactions: true,
    Persistence: false,
    Computer: false,
    ThreadedTransactions: false,
  },
  variables: { Variables: true, ...ALL_DATA_TYPES },
  vertex: {
    AddVertices: true,
    RemoveVertices: true,
    UserSuppliedIds: true,
    NumericIds: true,
    StringIds: true,
    AddProperty: true,
    RemoveProperty: true,
    MetaProperties: false,
    MultiProperties: false,
  },
  vertexProperty: { Properties: true, ...ALL_DATA_TYPES },
  edge: {
    AddEdges: true,
    RemoveEdges: true,
    UserSuppliedIds: true,
    NumericIds: true,
    StringIds: true,
    AddProperty: true,
    RemoveProperty: true,
  },
  edgeProperty: { Properties: true, ...ALL_DATA_TYPES },
}

/** Reported instead when a graph persists to disk */
export const PERSISTENT_FEATURES: FeatureDeclaration = {
  graph: { Persistence: true },
}
