/**
 * Test Context
 *
 * State owned by exactly one test invocation. The graph and its configuration
 * are only reachable between provisioning and teardown.
 */

import { LifecycleStateError } from '../errors'
import type { GraphConfiguration, GraphStrategy, TestGraph, TestIdentity } from '../provider'
import type { FeatureRequirement, FixtureSpec } from '../requirements'

export class GraphTestContext<G extends TestGraph = TestGraph, C extends GraphConfiguration = GraphConfiguration> {
  private currentGraph: G | null = null
  private currentConfiguration: C | null = null
  private currentStrategy: GraphStrategy<G> | null

  requirements: readonly FeatureRequirement[] = []
  fixture: FixtureSpec | null = null

  constructor(
    readonly identity: TestIdentity,
    strategy?: GraphStrategy<G>,
  ) {
    this.currentStrategy = strategy ?? null
  }

  get testName(): string {
    return this.identity.test
  }

  get graph(): G {
    if (!this.currentGraph) {
      throw new LifecycleStateError('closed', ['ready'])
    }
    return this.currentGraph
  }

  get configuration(): C {
    if (!this.currentConfiguration) {
      throw new LifecycleStateError('unconfigured', ['provisioning', 'ready'])
    }
    return this.currentConfiguration
  }

  get strategy(): GraphStrategy<G> | null {
    return this.currentStrategy
  }

  hasGraph(): boolean {
    return this.currentGraph !== null
  }

  hasConfiguration(): boolean {
    return this.currentConfiguration !== null
  }

  /** @internal */
  attachConfiguration(configuration: C): void {
    this.currentConfiguration = configuration
  }

  /** @internal */
  attachGraph(graph: G): void {
    this.currentGraph = graph
  }

  /**
   * Drop every reference held for the invocation.
   */
  release(): void {
    this.currentGraph = null
    this.currentConfiguration = null
    this.currentStrategy = null
    this.requirements = []
    this.fixture = null
  }
}
