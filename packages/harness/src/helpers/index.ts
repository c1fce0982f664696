/**
 * Helpers Module
 */

export { commitIfSupported, rollbackIfSupported } from './transactions'
export type { GraphAssertion } from './transactions'
export { DEFAULT_NAME_PROPERTY, vertexByName, vertexIdByName, edgeByNames, edgeIdByNames } from './lookup'
export type { LookupOptions } from './lookup'
