/**
 * Memory Graph Errors
 */

import { HarnessError, type FeatureClass, type FeatureName } from "@graphcheck/harness"

/**
 * Thrown when an operation needs a feature the graph does not support.
 */
export class UnsupportedOperationError extends HarnessError {
  constructor(
    public readonly operation: string,
    public readonly featureClass: FeatureClass,
    public readonly feature: FeatureName,
  ) {
    super(`Graph does not support ${operation} (${featureClass}.${feature})`)
    this.name = "UnsupportedOperationError"
  }
}

/**
 * Thrown when a property or variable value is of a kind the graph cannot store.
 */
export class UnsupportedPropertyValueError extends HarnessError {
  constructor(
    public readonly key: string,
    public readonly kind: string,
  ) {
    super(`Property ${key} holds an unsupported value kind: ${kind}`)
    this.name = "UnsupportedPropertyValueError"
  }
}
