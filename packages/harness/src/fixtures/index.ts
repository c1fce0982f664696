/**
 * Fixtures Module
 */

export {
  DEFAULT_FIXTURES_DIR,
  fixtureDatasetSchema,
  FixtureDataError,
  readFixtureDataset,
  validateDatasetNames,
  datasetVertexName,
} from './dataset'
export type { FixtureDataset } from './dataset'
