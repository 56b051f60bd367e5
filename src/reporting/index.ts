export { StatsAggregator } from './aggregator'
export type {
  AggregateOptions,
  ClassificationFigures,
  ReconciliationStats,
  SpecialtyFigures,
} from './types'
