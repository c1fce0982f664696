/**
 * Provider Module
 */

export type {
  Awaitable,
  ElementId,
  GraphFeatures,
  GraphTransaction,
  VertexRef,
  EdgeRef,
  TestGraph,
  TestIdentity,
  GraphConfiguration,
  GraphStrategy,
  GraphProvider,
} from './types'
