/**
 * Errors Module
 */

export {
  HarnessError,
  FeatureDeclarationError,
  UnknownFeatureError,
  ProvisioningError,
  TeardownError,
  LifecycleStateError,
  ElementNotFoundError,
  ConfigurationError,
  GraphClosedError,
  toError,
} from './errors'
export type { ProvisioningStep } from './errors'
