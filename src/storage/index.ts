export { Database } from './database';
export { PredictionCache } from './prediction-cache';
export { CountryCache } from './country-cache';
export { PopularityCounter } from './popularity-counter';
export type {
  CachedCountry,
  CountryCacheStore,
  CountryDetail,
  NationalityCandidate,
  PopularName,
  PopularityCounterStore,
  PredictionCacheStore,
  PredictionEntry,
  PredictionRecord
} from './types';
