export { harnessConfigSchema, parseHarnessConfig, loadHarnessConfig } from './config'
export type { HarnessConfig, HarnessConfigInput, Environment } from './config'
