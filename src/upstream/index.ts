import type { CountryDetail, NationalityCandidate } from '../storage/types';
import { createHttpClient } from './http';
import { NationalizeSource } from './nationalize';
import { RestCountriesSource } from './rest-countries';
import type { UpstreamClient, UpstreamClientOptions } from './types';

class HttpUpstreamClient implements UpstreamClient {
  constructor(
    private readonly nationalize: NationalizeSource,
    private readonly countries: RestCountriesSource
  ) {}

  fetchCandidates(name: string): Promise<NationalityCandidate[]> {
    return this.nationalize.fetchCandidates(name);
  }

  fetchCountryDetail(countryCode: string): Promise<CountryDetail> {
    return this.countries.fetchCountryDetail(countryCode);
  }
}

export function createUpstreamClient(options: UpstreamClientOptions): UpstreamClient {
  const shared = {
    timeoutMs: options.timeoutMs,
    userAgent: options.userAgent,
    adapter: options.adapter
  };

  return new HttpUpstreamClient(
    new NationalizeSource(createHttpClient({ ...shared, baseUrl: options.nationalizeBaseUrl }), options.logger),
    new RestCountriesSource(createHttpClient({ ...shared, baseUrl: options.countryBaseUrl }))
  );
}

export { compareCandidates, NationalizeSource } from './nationalize';
export { RestCountriesSource } from './rest-countries';
export type { UpstreamClient, UpstreamClientOptions } from './types';
