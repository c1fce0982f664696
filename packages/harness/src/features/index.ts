/**
 * Features Module
 */

export { FEATURE_CATALOG, FEATURE_CLASSES, isFeatureClass, isKnownFeature, featureKey } from './catalog'
export type { FeatureClass, FeatureName, DataTypeFeature } from './catalog'
export { FeatureTable } from './table'
export type { FeatureDeclaration } from './table'
