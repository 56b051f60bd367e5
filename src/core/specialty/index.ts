export { SpecialtyTable } from './specialty-table'
export type { SpecialtyMappingRow } from './specialty-table'
export {
  InMemorySpecialtyMappingLoader,
  CsvSpecialtyMappingLoader,
  parseSpecialtyMapping,
  SPECIALTY_MAPPING_COLUMNS,
} from './loaders'
export type {
  SpecialtyMappingLoader,
  CsvSpecialtyMappingLoaderOptions,
} from './loaders'
