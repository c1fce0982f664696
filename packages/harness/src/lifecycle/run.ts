/**
 * Runner-agnostic execution of one declared graph test.
 */

import type { Awaitable, GraphConfiguration, TestGraph } from '../provider'
import type { GraphTestDeclaration } from '../requirements'
import type { SkipSignal } from '../resolver'
import type { GraphTestContext } from './context'
import type { GraphTestLifecycle } from './lifecycle'

export type GraphTestBody<G extends TestGraph, C extends GraphConfiguration> = (
  graph: G,
  context: GraphTestContext<G, C>,
) => Awaitable<void>

/**
 * Provision, gate, run the body and tear down. Teardown runs exactly once,
 * whether the body passes, fails or never runs. `skip` is called after
 * teardown, since runners signal a skip by throwing.
 */
export async function runGraphTest<G extends TestGraph, C extends GraphConfiguration>(
  lifecycle: GraphTestLifecycle<G, C>,
  declaration: GraphTestDeclaration,
  body: GraphTestBody<G, C>,
  skip: (signal: SkipSignal) => void,
): Promise<void> {
  let signal: SkipSignal | undefined
  let failed = false

  try {
    const result = await lifecycle.beforeTest(declaration)
    if (result.status === 'skipped') {
      signal = result.signal
    } else {
      await body(result.context.graph, result.context)
    }
  } catch (error) {
    failed = true
    throw error
  } finally {
    await lifecycle.afterTest({ failed })
  }

  if (signal) skip(signal)
}
