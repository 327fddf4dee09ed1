import type {
  CountryDetail,
  NationalityCandidate,
  PredictionCacheStore,
  PredictionRecord
} from '../storage/types';
import type { UpstreamClient } from '../upstream/types';
import { countryDetail } from './fixtures';

export interface StubUpstreamOptions {
  candidates?: (name: string, call: number) => NationalityCandidate[] | Promise<NationalityCandidate[]>;
  country?: (countryCode: string, call: number) => CountryDetail | Promise<CountryDetail>;
}

export class StubUpstream implements UpstreamClient {
  readonly candidateCalls: string[] = [];
  readonly countryCalls: string[] = [];

  constructor(private readonly options: StubUpstreamOptions = {}) {}

  async fetchCandidates(name: string): Promise<NationalityCandidate[]> {
    this.candidateCalls.push(name);
    return this.options.candidates ? this.options.candidates(name, this.candidateCalls.length) : [];
  }

  async fetchCountryDetail(countryCode: string): Promise<CountryDetail> {
    this.countryCalls.push(countryCode);
    return this.options.country
      ? this.options.country(countryCode, this.countryCalls.length)
      : countryDetail(countryCode);
  }

  get totalCalls(): number {
    return this.candidateCalls.length + this.countryCalls.length;
  }
}

export class AlwaysMissCache implements PredictionCacheStore {
  readonly writes: PredictionRecord[] = [];

  async get(): Promise<PredictionRecord | null> {
    return null;
  }

  async put(_normalizedName: string, record: PredictionRecord): Promise<void> {
    this.writes.push(record);
  }

  isFresh(): boolean {
    return false;
  }
}
