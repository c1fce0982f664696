/**
 * Bolt Graph Provider
 *
 * Provides a graph per test on a Bolt server. Tests share the configured
 * database; clearing a configuration deletes only the nodes of its graph.
 */

import {
  createLogger,
  datasetVertexName,
  DEFAULT_NAME_PROPERTY,
  FixtureDataError,
  graphNameFor,
  readFixtureDataset,
  validateDatasetNames,
  type ElementId,
  type FeatureDeclaration,
  type FeatureOverride,
  type FixtureSpec,
  type GraphConfiguration,
  type GraphProvider,
  type GraphStrategy,
  type HarnessConfig,
  type Logger,
  type TestIdentity,
} from "@graphcheck/harness"
import type { BoltConfig, IdFunction } from "./config"
import { BoltConnection } from "./connection"
import { BoltGraph, SCOPE_PROPERTY } from "./graph"
import type { SessionFactory } from "./session"
import { quoteIdentifier } from "./values"

export interface BoltGraphConfiguration extends GraphConfiguration {
  readonly database?: string
}

export interface BoltGraphProviderOptions {
  sessions: SessionFactory
  database?: string
  idFunction?: IdFunction
  /** Declared on top of the default Bolt features */
  features?: FeatureDeclaration
  featureOverrides?: readonly FeatureOverride[]
  fixturesDir?: string
  nameProperty?: string
  logger?: Logger
}

export class BoltGraphProvider implements GraphProvider<BoltGraph, BoltGraphConfiguration> {
  readonly name = "bolt"
  private readonly logger: Logger
  private readonly nameProperty: string

  constructor(private readonly options: BoltGraphProviderOptions) {
    this.logger = (options.logger ?? createLogger()).child(this.name)
    this.nameProperty = options.nameProperty ?? DEFAULT_NAME_PROPERTY
  }

  /**
   * Provider on a new connection, configured from harness and Bolt settings.
   */
  static fromConfig(
    harness: HarnessConfig,
    bolt: BoltConfig,
    options: Partial<BoltGraphProviderOptions> = {},
  ): BoltGraphProvider {
    return new BoltGraphProvider({
      sessions: new BoltConnection(bolt),
      database: bolt.database,
      idFunction: bolt.idFunction,
      nameProperty: harness.nameProperty,
      logger: createLogger({ level: harness.logLevel }),
      ...options,
    })
  }

  configurationFor(identity: TestIdentity): BoltGraphConfiguration {
    const graphName = graphNameFor(identity)
    const { database } = this.options
    return database ? { graphName, database } : { graphName }
  }

  async clear(configuration: BoltGraphConfiguration): Promise<void> {
    this.logger.debug(`Clearing database for ${configuration.graphName}`, { database: configuration.database })
    const session = await this.options.sessions.openSession(configuration.database)
    try {
      await session.run(`MATCH (n) WHERE n.${quoteIdentifier(SCOPE_PROPERTY)} = $graph DETACH DELETE n`, {
        graph: configuration.graphName,
      })
    } finally {
      await session.close()
    }
  }

  async open(configuration: BoltGraphConfiguration, strategy?: GraphStrategy<BoltGraph>): Promise<BoltGraph> {
    const session = await this.options.sessions.openSession(configuration.database)
    const graph = new BoltGraph({
      graphName: configuration.graphName,
      session,
      idFunction: this.options.idFunction,
      features: this.options.features,
      featureOverrides: this.options.featureOverrides,
    })
    this.logger.debug(`Opened ${configuration.graphName}`, { strategy: strategy?.name })
    return strategy ? strategy.decorate(graph) : graph
  }

  /**
   * Write a fixture's dataset with parameterized CREATE statements and commit.
   */
  async loadFixture(graph: BoltGraph, fixture: FixtureSpec): Promise<void> {
    const dataset = readFixtureDataset(fixture, this.options.fixturesDir)
    validateDatasetNames(fixture.name, dataset, this.nameProperty)

    if (Object.keys(dataset.variables ?? {}).length > 0 && !graph.features.supports("variables", "Variables")) {
      throw new FixtureDataError(fixture.name, "graph variables are not supported over Bolt")
    }

    const idsByName = new Map<string, ElementId>()
    for (const vertex of dataset.vertices) {
      if (vertex.id !== undefined) {
        throw new FixtureDataError(fixture.name, "user supplied ids are not supported over Bolt")
      }
      const created = await graph.addVertex(vertex.label, vertex.properties)
      idsByName.set(datasetVertexName(vertex, this.nameProperty), created.id)
    }

    for (const edge of dataset.edges) {
      const outId = idsByName.get(edge.out)
      const inId = idsByName.get(edge.in)
      if (outId === undefined || inId === undefined) continue
      await graph.addEdge(edge.label, outId, inId, edge.properties ?? {})
    }

    await graph.tx().commit()
    this.logger.debug(`Loaded ${fixture.name} into ${graph.graphName}`, {
      vertices: dataset.vertices.length,
      edges: dataset.edges.length,
    })
  }

  async clearGraph(graph: BoltGraph, configuration: BoltGraphConfiguration): Promise<void> {
    await graph.close()
    await this.clear(configuration)
  }

  /**
   * Release the session factory, closing the driver when it owns one.
   */
  async close(): Promise<void> {
    await this.options.sessions.close?.()
  }
}
