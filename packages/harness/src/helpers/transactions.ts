/**
 * Transaction Helpers
 *
 * Let one test body run against backends with and without transactions.
 */

import type { Awaitable, TestGraph } from '../provider'

export type GraphAssertion<G extends TestGraph> = (graph: G) => Awaitable<void>

/**
 * Commit if the graph supports transactions.
 *
 * With an assertion, it runs once before the commit attempt and, when a commit
 * happened, once more after it. The assertion is expected to hold both times.
 */
export async function commitIfSupported<G extends TestGraph>(graph: G, assertion?: GraphAssertion<G>): Promise<void> {
  if (assertion) await assertion(graph)
  if (!graph.features.supportsTransactions()) return

  await graph.tx().commit()
  if (assertion) await assertion(graph)
}

/**
 * Roll back if the graph supports transactions.
 */
export async function rollbackIfSupported(graph: TestGraph): Promise<void> {
  if (graph.features.supportsTransactions()) {
    await graph.tx().rollback()
  }
}
