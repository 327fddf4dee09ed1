import type { PopularityConfig, RetryConfig } from '../config';
import type {
  CountryCacheStore,
  PopularityCounterStore,
  PredictionCacheStore
} from '../storage/types';
import type { UpstreamClient } from '../upstream/types';
import type { Logger } from '../utils/logger';

export type PopularityPolicy = Pick<PopularityConfig, 'scope' | 'count_cache_hits'>;

export interface AggregationEngineDependencies {
  logger: Logger;
  upstream: UpstreamClient;
  predictions: PredictionCacheStore;
  countries?: CountryCacheStore;
  popularity: PopularityCounterStore;
  retry: RetryConfig;
  popularityPolicy: PopularityPolicy;
  clock?: () => number;
}
