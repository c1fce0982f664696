/**
 * Vitest Adapter
 *
 * Registers declared graph tests as Vitest tests. Each test gets its own
 * lifecycle, so suites may run concurrently.
 *
 * @example
 * ```typescript
 * import { defineGraphSuite } from '@graphcheck/harness/vitest'
 * import { feature, vertexIdByName } from '@graphcheck/harness'
 *
 * defineGraphSuite({ name: 'lookups', provider }, (suite) => {
 *   suite.test(
 *     { name: 'finds a vertex by name', fixture: 'grateful-dead', requirements: [feature('vertex', 'AddVertices')] },
 *     async (graph) => {
 *       expect(await vertexIdByName(graph, 'Garcia')).toBeDefined()
 *     },
 *   )
 * })
 * ```
 */

import { describe, it, type TestContext } from 'vitest'
import {
  GraphTestLifecycle,
  runGraphTest,
  type GraphTestBody,
  type GraphTestLifecycleOptions,
} from '../lifecycle'
import type { GraphConfiguration, TestGraph } from '../provider'
import type { GraphTestDeclaration } from '../requirements'

export interface GraphSuiteOptions<G extends TestGraph, C extends GraphConfiguration>
  extends Omit<GraphTestLifecycleOptions<G, C>, 'suite'> {
  name: string
  /** Register tests with `it.concurrent` */
  concurrent?: boolean
}

export interface GraphSuite<G extends TestGraph, C extends GraphConfiguration> {
  test(declaration: GraphTestDeclaration | string, body: GraphTestBody<G, C>): void
}

export function defineGraphSuite<G extends TestGraph, C extends GraphConfiguration>(
  options: GraphSuiteOptions<G, C>,
  register: (suite: GraphSuite<G, C>) => void,
): void {
  const { name, concurrent = false, ...lifecycleOptions } = options

  describe(name, () => {
    register({
      test(declaration, body) {
        const declared = typeof declaration === 'string' ? { name: declaration } : declaration

        const run = async (context: TestContext): Promise<void> => {
          const lifecycle = new GraphTestLifecycle<G, C>({ ...lifecycleOptions, suite: name })
          await runGraphTest(lifecycle, declared, body, (signal) => context.skip(signal.reason))
        }

        if (concurrent) {
          it.concurrent(declared.name, run)
        } else {
          it(declared.name, run)
        }
      },
    })
  })
}
