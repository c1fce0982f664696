export { defineGraphSuite } from './suite'
export type { GraphSuiteOptions, GraphSuite } from './suite'
