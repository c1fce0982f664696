/**
 * Lifecycle Module
 */

export { GraphTestLifecycle } from './lifecycle'
export type {
  LifecycleState,
  PrepareGraph,
  GraphTestLifecycleOptions,
  BeforeTestResult,
  TestOutcome,
} from './lifecycle'
export { GraphTestContext } from './context'
export { normalizeTestName, graphNameFor } from './names'
export { runGraphTest } from './run'
export type { GraphTestBody } from './run'
