/**
 * Features declared by Bolt graphs.
 */

import type { FeatureDeclaration } from "@graphcheck/harness"
import type { IdFunction } from "./config"

// Map values cannot be stored as node or relationship properties
const PROPERTY_TYPES = {
  Properties: true,
  BooleanValues: true,
  IntegerValues: true,
  DoubleValues: true,
  StringValues: true,
  ListValues: true,
  MapValues: false,
} as const

export function boltGraphFeatures(ids: IdFunction): FeatureDeclaration {
  const idKinds = { UserSuppliedIds: false, NumericIds: ids === "id", StringIds: ids === "elementId" }

  return {
    graph: {
      Transactions: true,
      Persistence: true,
      Computer: false,
      ThreadedTransactions: false,
    },
    variables: { Variables: false },
    vertex: {
      AddVertices: true,
      RemoveVertices: true,
      AddProperty: true,
      RemoveProperty: true,
      MetaProperties: false,
      MultiProperties: false,
      ...idKinds,
    },
    vertexProperty: PROPERTY_TYPES,
    edge: {
      AddEdges: true,
      RemoveEdges: true,
      AddProperty: true,
      RemoveProperty: true,
      ...idKinds,
    },
    edgeProperty: PROPERTY_TYPES,
  }
}
