/**
 * Bolt Graph
 *
 * A test graph backed by one session on a Bolt server. Every statement runs in
 * the graph's explicit transaction, begun on first use and ended by commit or
 * rollback.
 *
 * Graphs share a database. Each node carries its graph's name under
 * `SCOPE_PROPERTY` and every statement matches on it, so graphs of different
 * configurations never see or delete each other's nodes.
 */

import {
  FeatureTable,
  GraphClosedError,
  type ElementId,
  type EdgeRef,
  type FeatureDeclaration,
  type FeatureOverride,
  type GraphTransaction,
  type TestGraph,
  type VertexRef,
} from "@graphcheck/harness"
import type { IdFunction } from "./config"
import { UnexpectedResultError } from "./errors"
import { boltGraphFeatures } from "./features"
import type { CypherParams, CypherRecord, CypherSession, CypherTransaction } from "./session"
import { quoteIdentifier, toEdge, toVertex } from "./values"

/** Node property naming the graph a node belongs to. Hidden from vertex properties. */
export const SCOPE_PROPERTY = "__graphcheck_graph"

const SCOPE = quoteIdentifier(SCOPE_PROPERTY)

export interface BoltGraphOptions {
  graphName: string
  session: CypherSession
  idFunction?: IdFunction
  /** Declared on top of the default Bolt features */
  features?: FeatureDeclaration
  featureOverrides?: readonly FeatureOverride[]
}

export class BoltGraph implements TestGraph {
  readonly graphName: string
  readonly features: FeatureTable
  readonly featureOverrides: readonly FeatureOverride[]
  readonly idFunction: IdFunction

  private readonly session: CypherSession
  private readonly transaction: GraphTransaction
  private current: CypherTransaction | null = null
  private closed = false

  constructor(options: BoltGraphOptions) {
    this.graphName = options.graphName
    this.session = options.session
    this.idFunction = options.idFunction ?? "elementId"
    this.features = new FeatureTable(boltGraphFeatures(this.idFunction), options.features ?? {})
    this.featureOverrides = Object.freeze([...(options.featureOverrides ?? [])])
    this.transaction = {
      commit: () => this.commit(),
      rollback: () => this.rollback(),
    }
  }

  /**
   * Run a statement in the graph's transaction.
   */
  async run(query: string, params: CypherParams = {}): Promise<CypherRecord[]> {
    this.ensureOpen()
    if (!this.current) {
      this.current = this.session.beginTransaction()
    }
    return this.current.run(query, params)
  }

  tx(): GraphTransaction {
    this.ensureOpen()
    return this.transaction
  }

  // ===========================================================================
  // READS
  // ===========================================================================

  async vertex(id: ElementId): Promise<VertexRef | undefined> {
    const query = `MATCH (v) WHERE ${this.idFunction}(v) = $id AND v.${SCOPE} = $graph RETURN v`
    const [record] = await this.run(query, { id, graph: this.graphName })
    return record ? this.requireVertex(record, query) : undefined
  }

  async findVertices(property: string, value: unknown): Promise<VertexRef[]> {
    const query = `MATCH (v) WHERE v.${SCOPE} = $graph AND v[$property] = $value RETURN v`
    const records = await this.run(query, { property, value, graph: this.graphName })
    return records.map((record) => this.requireVertex(record, query))
  }

  async outEdges(vertexId: ElementId, label?: string): Promise<EdgeRef[]> {
    const query =
      `MATCH (v)-[e]->() WHERE ${this.idFunction}(v) = $id AND v.${SCOPE} = $graph ` +
      `AND ($label IS NULL OR type(e) = $label) RETURN e`
    const records = await this.run(query, { id: vertexId, label: label ?? null, graph: this.graphName })
    return records.map((record) => this.requireEdge(record, query))
  }

  // ===========================================================================
  // WRITES
  // ===========================================================================

  async addVertex(label: string, properties: Record<string, unknown> = {}): Promise<VertexRef> {
    const query = `CREATE (v:${quoteIdentifier(label)}) SET v = $properties, v.${SCOPE} = $graph RETURN v`
    const records = await this.run(query, { properties, graph: this.graphName })
    return this.requireVertex(records[0], query)
  }

  async addEdge(
    label: string,
    outId: ElementId,
    inId: ElementId,
    properties: Record<string, unknown> = {},
  ): Promise<EdgeRef> {
    const fn = this.idFunction
    const query =
      `MATCH (a), (b) WHERE ${fn}(a) = $outId AND ${fn}(b) = $inId AND a.${SCOPE} = $graph AND b.${SCOPE} = $graph ` +
      `CREATE (a)-[e:${quoteIdentifier(label)}]->(b) SET e = $properties RETURN e`
    const records = await this.run(query, { outId, inId, properties, graph: this.graphName })
    return this.requireEdge(records[0], query)
  }

  // ===========================================================================
  // TRANSACTIONS & LIFECYCLE
  // ===========================================================================

  /**
   * Roll back uncommitted work and close the session. Closing twice is a no-op.
   */
  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    try {
      await this.endTransaction("rollback")
    } finally {
      await this.session.close()
    }
  }

  isClosed(): boolean {
    return this.closed
  }

  private async commit(): Promise<void> {
    this.ensureOpen()
    await this.endTransaction("commit")
  }

  private async rollback(): Promise<void> {
    this.ensureOpen()
    await this.endTransaction("rollback")
  }

  private async endTransaction(action: "commit" | "rollback"): Promise<void> {
    const transaction = this.current
    this.current = null
    if (!transaction || !transaction.isOpen()) return
    await (action === "commit" ? transaction.commit() : transaction.rollback())
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new GraphClosedError(this.graphName)
    }
  }

  private requireVertex(record: CypherRecord | undefined, query: string): VertexRef {
    const vertex = record ? toVertex(record.v, this.idFunction) : undefined
    if (!vertex) throw new UnexpectedResultError("node", query)
    return { ...vertex, properties: withoutScope(vertex.properties) }
  }

  private requireEdge(record: CypherRecord | undefined, query: string): EdgeRef {
    const edge = record ? toEdge(record.e, this.idFunction) : undefined
    if (!edge) throw new UnexpectedResultError("relationship", query)
    return edge
  }
}

function withoutScope(properties: Readonly<Record<string, unknown>>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(properties).filter(([key]) => key !== SCOPE_PROPERTY))
}
