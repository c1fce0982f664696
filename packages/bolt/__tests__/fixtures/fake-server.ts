/**
 * Fake Bolt Server
 *
 * Answers the handful of statements the Bolt backend issues against an
 * in-process node and relationship list, and records every session event.
 */

import type { CypherParams, CypherRecord, CypherSession, CypherTransaction, SessionFactory } from "../../src"

export interface FakeInteger {
  low: number
  high: number
  toNumber(): number
}

export interface FakeNode {
  identity: FakeInteger
  elementId: string
  labels: string[]
  properties: Record<string, unknown>
}

export interface FakeRelationship {
  identity: FakeInteger
  elementId: string
  start: FakeInteger
  end: FakeInteger
  startNodeElementId: string
  endNodeElementId: string
  type: string
  properties: Record<string, unknown>
}

export function int(value: number): FakeInteger {
  return { low: value, high: 0, toNumber: () => value }
}

const CREATE_NODE = /^CREATE \(v:`((?:[^`]|``)+)`\) SET v = \$properties, v\.`__graphcheck_graph` = \$graph RETURN v$/
const CREATE_RELATIONSHIP =
  /^MATCH \(a\), \(b\) WHERE (\w+)\(a\) = \$outId AND \w+\(b\) = \$inId AND a\.`__graphcheck_graph` = \$graph AND b\.`__graphcheck_graph` = \$graph CREATE \(a\)-\[e:`((?:[^`]|``)+)`\]->\(b\) SET e = \$properties RETURN e$/
const FIND_BY_PROPERTY = /^MATCH \(v\) WHERE v\.`__graphcheck_graph` = \$graph AND v\[\$property\] = \$value RETURN v$/
const OUT_EDGES =
  /^MATCH \(v\)-\[e\]->\(\) WHERE (\w+)\(v\) = \$id AND v\.`__graphcheck_graph` = \$graph AND \(\$label IS NULL OR type\(e\) = \$label\) RETURN e$/
const BY_ID = /^MATCH \(v\) WHERE (\w+)\(v\) = \$id AND v\.`__graphcheck_graph` = \$graph RETURN v$/
const CLEAR_GRAPH = "MATCH (n) WHERE n.`__graphcheck_graph` = $graph DETACH DELETE n"
const SCOPE = "__graphcheck_graph"

function unquote(name: string): string {
  return name.replace(/``/g, "`")
}

function isProperties(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export class FakeBoltServer {
  readonly nodes: FakeNode[] = []
  readonly relationships: FakeRelationship[] = []
  readonly events: string[] = []
  private nextId = 0

  execute(query: string, params: CypherParams): CypherRecord[] {
    if (query === CLEAR_GRAPH) {
      const doomed = new Set(this.nodes.filter((node) => this.inGraph(node, params)).map((node) => node.elementId))
      this.remove(this.nodes, (node) => doomed.has(node.elementId))
      this.remove(
        this.relationships,
        (rel) => doomed.has(rel.startNodeElementId) || doomed.has(rel.endNodeElementId),
      )
      return []
    }

    const createNode = CREATE_NODE.exec(query)
    if (createNode?.[1]) {
      const id = this.nextId++
      const node: FakeNode = {
        identity: int(id),
        elementId: `4:fake:${id}`,
        labels: [unquote(createNode[1])],
        properties: { ...(isProperties(params.properties) ? params.properties : {}), [SCOPE]: params.graph },
      }
      this.nodes.push(node)
      return [{ v: node }]
    }

    const createRelationship = CREATE_RELATIONSHIP.exec(query)
    if (createRelationship?.[1] && createRelationship[2]) {
      const fn = createRelationship[1]
      const start = this.nodes.find((node) => this.idOf(node, fn) === params.outId && this.inGraph(node, params))
      const end = this.nodes.find((node) => this.idOf(node, fn) === params.inId && this.inGraph(node, params))
      if (!start || !end) return []

      const id = this.nextId++
      const relationship: FakeRelationship = {
        identity: int(id),
        elementId: `5:fake:${id}`,
        start: start.identity,
        end: end.identity,
        startNodeElementId: start.elementId,
        endNodeElementId: end.elementId,
        type: unquote(createRelationship[2]),
        properties: isProperties(params.properties) ? { ...params.properties } : {},
      }
      this.relationships.push(relationship)
      return [{ e: relationship }]
    }

    if (FIND_BY_PROPERTY.test(query)) {
      const property = String(params.property)
      return this.nodes
        .filter((node) => this.inGraph(node, params) && node.properties[property] === params.value)
        .map((node) => ({ v: node }))
    }

    const outEdges = OUT_EDGES.exec(query)
    if (outEdges?.[1]) {
      const fn = outEdges[1]
      const label = params.label
      return this.relationships
        .filter((rel) => {
          const start = this.nodes.find((node) => node.elementId === rel.startNodeElementId)
          return (
            start !== undefined &&
            this.inGraph(start, params) &&
            this.idOf(start, fn) === params.id &&
            (label === null || rel.type === label)
          )
        })
        .map((rel) => ({ e: rel }))
    }

    const byId = BY_ID.exec(query)
    if (byId?.[1]) {
      const fn = byId[1]
      return this.nodes
        .filter((node) => this.inGraph(node, params) && this.idOf(node, fn) === params.id)
        .map((node) => ({ v: node }))
    }

    throw new Error(`Unsupported statement: ${query}`)
  }

  sessions(): FakeSessionFactory {
    return new FakeSessionFactory(this)
  }

  private inGraph(node: FakeNode, params: CypherParams): boolean {
    return node.properties[SCOPE] === params.graph
  }

  private remove<T>(items: T[], doomed: (item: T) => boolean): void {
    for (let i = items.length - 1; i >= 0; i--) {
      const item = items[i]
      if (item !== undefined && doomed(item)) items.splice(i, 1)
    }
  }

  private idOf(node: FakeNode, fn: string): string | number {
    return fn === "id" ? node.identity.toNumber() : node.elementId
  }
}

export class FakeSession implements CypherSession {
  constructor(
    private readonly server: FakeBoltServer,
    readonly label: string,
  ) {}

  async run(query: string, params: CypherParams = {}): Promise<CypherRecord[]> {
    this.server.events.push(`${this.label} run`)
    return this.server.execute(query, params)
  }

  beginTransaction(): CypherTransaction {
    const { server, label } = this
    let open = true
    server.events.push(`${label} begin`)

    return {
      run: async (query, params = {}) => server.execute(query, params),
      commit: async () => {
        open = false
        server.events.push(`${label} commit`)
      },
      rollback: async () => {
        open = false
        server.events.push(`${label} rollback`)
      },
      isOpen: () => open,
    }
  }

  async close(): Promise<void> {
    this.server.events.push(`${this.label} close`)
  }
}

export class FakeSessionFactory implements SessionFactory {
  readonly databases: (string | undefined)[] = []
  closed = false

  constructor(private readonly server: FakeBoltServer) {}

  openSession(database?: string): FakeSession {
    this.databases.push(database)
    return new FakeSession(this.server, `s${this.databases.length}`)
  }

  close(): void {
    this.closed = true
  }
}
