export { AggregationEngine } from './aggregation-engine';
export type { AggregationEngineDependencies, PopularityPolicy } from './types';
