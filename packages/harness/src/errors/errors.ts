/**
 * Custom Error Classes
 */

import type { FeatureClass } from '../features'

/**
 * Base error for all harness errors.
 */
export class HarnessError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = 'HarnessError'
    this.cause = cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === 'function') {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

/**
 * Declaration error.
 * Thrown when a test declares a requirement, set or fixture that does not exist.
 * This is a broken test, never an instance limitation.
 */
export class FeatureDeclarationError extends HarnessError {
  constructor(
    message: string,
    public readonly featureClass?: string,
    public readonly feature?: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = 'FeatureDeclarationError'
  }
}

/**
 * Unknown feature error.
 * Thrown by a graph's feature surface when asked about a feature it does not expose.
 */
export class UnknownFeatureError extends HarnessError {
  constructor(
    public readonly featureClass: FeatureClass,
    public readonly feature: string,
  ) {
    super(`[supports${feature}] is not a valid feature on ${featureClass}`)
    this.name = 'UnknownFeatureError'
  }
}

export type ProvisioningStep = 'configure' | 'clear' | 'open' | 'load-fixture' | 'prepare'

/**
 * Provisioning error.
 * Thrown when the provider fails to configure, clear, open or populate a graph.
 */
export class ProvisioningError extends HarnessError {
  constructor(
    message: string,
    public readonly step: ProvisioningStep,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = 'ProvisioningError'
  }
}

/**
 * Teardown error.
 * Thrown when clearing a graph fails after a test that otherwise passed.
 */
export class TeardownError extends HarnessError {
  constructor(
    message: string,
    public readonly graphName?: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = 'TeardownError'
  }
}

/**
 * Lifecycle state error.
 * Thrown when a hook is invoked out of order.
 */
export class LifecycleStateError extends HarnessError {
  constructor(
    public readonly state: string,
    public readonly expected: string[],
  ) {
    super(`Invalid lifecycle state: ${state} (expected ${expected.join(' or ')})`)
    this.name = 'LifecycleStateError'
  }
}

/**
 * Element not found error.
 * Thrown when a lookup by name matches nothing.
 */
export class ElementNotFoundError extends HarnessError {
  constructor(
    public readonly kind: 'vertex' | 'edge',
    public readonly criteria: string,
  ) {
    super(`No ${kind} found for ${criteria}`)
    this.name = 'ElementNotFoundError'
  }
}

/**
 * Configuration error.
 * Thrown when harness configuration fails validation.
 */
export class ConfigurationError extends HarnessError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/**
 * Closed graph error.
 * Thrown when a graph is used after it was closed.
 */
export class GraphClosedError extends HarnessError {
  constructor(public readonly graphName: string) {
    super(`Graph ${graphName} is closed`)
    this.name = 'GraphClosedError'
  }
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}
