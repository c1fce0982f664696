/**
 * Memory Graph Provider
 *
 * Provides a fresh MemoryGraph per test. With a data directory, each graph is
 * persisted to its own JSON file so stale state from an interrupted run can be
 * found and cleared.
 */

import { join } from "node:path"
import {
  createLogger,
  DEFAULT_NAME_PROPERTY,
  graphNameFor,
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
import { loadFixtureDataset } from "./fixtures"
import { MemoryGraph, type PropertyGraph } from "./graph"
import { removePersistedGraph } from "./persistence"

export interface MemoryGraphConfiguration extends GraphConfiguration {
  /** JSON file backing the graph, when persistent */
  readonly location?: string
}

export interface MemoryGraphProviderOptions {
  /** Persist every graph under this directory */
  dataDir?: string
  /** Declared on top of the default in-memory features */
  features?: FeatureDeclaration
  featureOverrides?: readonly FeatureOverride[]
  fixturesDir?: string
  nameProperty?: string
  logger?: Logger
}

export class MemoryGraphProvider implements GraphProvider<PropertyGraph, MemoryGraphConfiguration> {
  readonly name = "memory"
  private readonly logger: Logger
  private readonly nameProperty: string

  constructor(private readonly options: MemoryGraphProviderOptions = {}) {
    this.logger = (options.logger ?? createLogger()).child(this.name)
    this.nameProperty = options.nameProperty ?? DEFAULT_NAME_PROPERTY
  }

  /**
   * Provider configured from harness settings.
   */
  static fromConfig(config: HarnessConfig, options: MemoryGraphProviderOptions = {}): MemoryGraphProvider {
    return new MemoryGraphProvider({
      dataDir: config.dataDir,
      nameProperty: config.nameProperty,
      logger: createLogger({ level: config.logLevel }),
      ...options,
    })
  }

  configurationFor(identity: TestIdentity): MemoryGraphConfiguration {
    const graphName = graphNameFor(identity)
    const { dataDir } = this.options
    return dataDir ? { graphName, location: join(dataDir, `${graphName}.json`) } : { graphName }
  }

  clear(configuration: MemoryGraphConfiguration): void {
    if (configuration.location) {
      this.logger.debug(`Clearing ${configuration.location}`)
      removePersistedGraph(configuration.location)
    }
  }

  open(configuration: MemoryGraphConfiguration, strategy?: GraphStrategy<PropertyGraph>): PropertyGraph {
    const graph = MemoryGraph.open({
      graphName: configuration.graphName,
      location: configuration.location,
      features: this.options.features,
      featureOverrides: this.options.featureOverrides,
      indexes: [this.nameProperty],
    })
    this.logger.debug(`Opened ${configuration.graphName}`, { strategy: strategy?.name })
    return strategy ? strategy.decorate(graph) : graph
  }

  loadFixture(graph: PropertyGraph, fixture: FixtureSpec): void {
    loadFixtureDataset(graph.baseGraph(), fixture, {
      fixturesDir: this.options.fixturesDir,
      nameProperty: this.nameProperty,
    })
  }

  clearGraph(graph: PropertyGraph, configuration: MemoryGraphConfiguration): void {
    graph.close()
    this.clear(configuration)
  }
}
