import type { AxiosAdapter } from 'axios';

import type { CountryDetail, NationalityCandidate } from '../storage/types';
import type { Logger } from '../utils/logger';

// one bounded attempt per call; retries are left to the caller
export interface UpstreamClient {
  fetchCandidates(name: string): Promise<NationalityCandidate[]>;
  fetchCountryDetail(countryCode: string): Promise<CountryDetail>;
}

export interface UpstreamClientOptions {
  logger: Logger;
  nationalizeBaseUrl: string;
  countryBaseUrl: string;
  timeoutMs: number;
  userAgent: string;
  adapter?: AxiosAdapter;
}
