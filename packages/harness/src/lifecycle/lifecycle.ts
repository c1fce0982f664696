/**
 * Graph Test Lifecycle
 *
 * Drives one test invocation through
 * idle → provisioning → gating → fixture-loading → ready → tearing-down → idle,
 * with `skipped` as the gate's other exit. Create one lifecycle per invocation.
 */

import {
  LifecycleStateError,
  ProvisioningError,
  TeardownError,
  toError,
  type ProvisioningStep,
} from '../errors'
import { createLogger, type Logger } from '../logging'
import type { Awaitable, GraphConfiguration, GraphProvider, GraphStrategy, TestGraph } from '../provider'
import { requirementKey, type GraphTestDeclaration } from '../requirements'
import {
  collectRequirements,
  DEFAULT_REGISTRY,
  describeOutcome,
  resolveRequirements,
  toSkipSignal,
  type RequirementRegistry,
  type Resolution,
  type SkipSignal,
} from '../resolver'
import { GraphTestContext } from './context'
import { normalizeTestName } from './names'

// =============================================================================
// TYPES
// =============================================================================

export type LifecycleState =
  | 'idle'
  | 'provisioning'
  | 'gating'
  | 'fixture-loading'
  | 'ready'
  | 'skipped'
  | 'tearing-down'

export type PrepareGraph<G extends TestGraph, C extends GraphConfiguration> = (
  graph: G,
  context: GraphTestContext<G, C>,
) => Awaitable<void>

export interface GraphTestLifecycleOptions<G extends TestGraph, C extends GraphConfiguration> {
  provider: GraphProvider<G, C>
  /** Suite the tests belong to, passed to the provider with each test name */
  suite: string
  /** Decorator applied to every graph this lifecycle opens */
  strategy?: GraphStrategy<G>
  registry?: RequirementRegistry
  /** Runs after fixture loading, before the test body */
  prepare?: PrepareGraph<G, C>
  logger?: Logger
}

export type BeforeTestResult<G extends TestGraph, C extends GraphConfiguration> =
  | { readonly status: 'ready'; readonly context: GraphTestContext<G, C> }
  | { readonly status: 'skipped'; readonly signal: SkipSignal; readonly context: GraphTestContext<G, C> }

export interface TestOutcome {
  /** Whether the test body failed before teardown ran */
  readonly failed: boolean
}

const STEP_LABELS: Record<ProvisioningStep, string> = {
  configure: 'configure a graph',
  clear: 'clear stale state',
  open: 'open a graph',
  'load-fixture': 'load fixture',
  prepare: 'prepare the graph',
}

// =============================================================================
// LIFECYCLE
// =============================================================================

export class GraphTestLifecycle<G extends TestGraph = TestGraph, C extends GraphConfiguration = GraphConfiguration> {
  private currentState: LifecycleState = 'idle'
  private currentContext: GraphTestContext<G, C> | null = null
  private readonly logger: Logger

  constructor(private readonly options: GraphTestLifecycleOptions<G, C>) {
    this.logger = (options.logger ?? createLogger()).child(options.provider.name)
  }

  get state(): LifecycleState {
    return this.currentState
  }

  get context(): GraphTestContext<G, C> | null {
    return this.currentContext
  }

  /**
   * Provision a graph for the test and check its requirements.
   *
   * Declaration errors are thrown before anything is opened. Once a graph is
   * open, `afterTest` must run whatever this returns or throws.
   */
  async beforeTest(declaration: GraphTestDeclaration): Promise<BeforeTestResult<G, C>> {
    this.expectState(['idle'])

    const { provider, strategy, registry = DEFAULT_REGISTRY } = this.options
    const identity = { suite: this.options.suite, test: normalizeTestName(declaration.name) }
    const context = new GraphTestContext<G, C>(identity, strategy)
    this.currentContext = context
    this.transition('provisioning')

    try {
      const collected = collectRequirements(declaration, registry)
      context.requirements = collected.requirements
      context.fixture = collected.fixture ?? null

      const configuration = await this.step('configure', () => provider.configurationFor(identity))
      context.attachConfiguration(configuration)

      // leftovers from a run that never reached teardown
      await this.step('clear', () => provider.clear(configuration))

      this.transition('gating')
      const graph = await this.step('open', () => provider.open(configuration, context.strategy ?? undefined))
      context.attachGraph(graph)

      const resolution = resolveRequirements(context.requirements, graph)
      if (!resolution.satisfied) {
        const signal = toSkipSignal(resolution)
        this.logger.info(`Skipping ${identity.test}: ${signal.reason}`)
        this.transition('skipped')
        return { status: 'skipped', signal, context }
      }

      this.transition('fixture-loading')
      const fixture = context.fixture
      if (fixture) {
        this.warnOnOverriddenFixtureFeatures(resolution, context)
        await this.step('load-fixture', () => provider.loadFixture(graph, fixture))
      }

      const prepare = this.options.prepare
      if (prepare) {
        await this.step('prepare', () => prepare(graph, context))
      }

      this.transition('ready')
      return { status: 'ready', context }
    } catch (error) {
      if (!context.hasGraph()) this.reset()
      throw error
    }
  }

  /**
   * Clear the graph and release the context. Safe to call when nothing was provisioned.
   *
   * A teardown failure is thrown only when the test itself did not fail, so it
   * never hides the test's own error.
   */
  async afterTest(outcome: TestOutcome = { failed: false }): Promise<void> {
    const context = this.currentContext
    if (this.currentState === 'idle' || !context) return
    this.expectState(['provisioning', 'gating', 'fixture-loading', 'ready', 'skipped'])
    this.transition('tearing-down')

    try {
      if (context.hasGraph()) {
        await this.clearGraph(context, outcome)
      }
    } finally {
      this.reset()
    }
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async clearGraph(context: GraphTestContext<G, C>, outcome: TestOutcome): Promise<void> {
    const configuration = context.configuration
    try {
      await this.options.provider.clearGraph(context.graph, configuration)
    } catch (error) {
      const cause = toError(error)
      this.logger.error(`Teardown of ${context.testName} failed: ${cause.message}`, {
        graph: configuration.graphName,
        testFailed: outcome.failed,
      })
      if (!outcome.failed) {
        throw new TeardownError(
          `Failed to clear graph ${configuration.graphName} after ${context.testName}: ${cause.message}`,
          configuration.graphName,
          cause,
        )
      }
    }
  }

  private async step<T>(step: ProvisioningStep, run: () => Awaitable<T>): Promise<T> {
    try {
      return await run()
    } catch (error) {
      const cause = toError(error)
      const test = this.currentContext?.testName ?? 'unknown test'
      throw new ProvisioningError(
        `Provider ${this.options.provider.name} failed to ${STEP_LABELS[step]} for ${test}: ${cause.message}`,
        step,
        cause,
      )
    }
  }

  /**
   * Fixture loading trusts the gate. When an override is what satisfied one of
   * the fixture's requirements, the load may still fail on the real graph.
   */
  private warnOnOverriddenFixtureFeatures(resolution: Resolution, context: GraphTestContext<G, C>): void {
    const fixture = context.fixture
    if (!fixture) return

    const fixtureKeys = new Set(fixture.requirements.map(requirementKey))
    const forced = resolution.outcomes.filter(
      (outcome) => outcome.source === 'override' && fixtureKeys.has(requirementKey(outcome.requirement)),
    )
    if (forced.length > 0) {
      this.logger.warn(
        `Fixture ${fixture.name} relies on overridden features: ${forced.map(describeOutcome).join(', ')}`,
      )
    }
  }

  private transition(next: LifecycleState): void {
    this.logger.debug(`${this.currentState} -> ${next}`, { test: this.currentContext?.testName })
    this.currentState = next
  }

  private expectState(expected: LifecycleState[]): void {
    if (!expected.includes(this.currentState)) {
      throw new LifecycleStateError(this.currentState, expected)
    }
  }

  private reset(): void {
    this.currentContext?.release()
    this.currentContext = null
    this.currentState = 'idle'
  }
}
