import type { Logger } from '../utils/logger';
import { errorMessage } from '../errors';
import type { Database } from './database';
import { CountryDetailSchema } from './types';
import type { CachedCountry, CountryCacheStore, CountryDetail } from './types';

interface CountryCacheOptions {
  db: Database;
  logger: Logger;
  ttlSeconds: number | null;
}

interface CountryRow {
  payload: string;
  fetched_ts: number;
}

export class CountryCache implements CountryCacheStore {
  private readonly db: Database;
  private readonly logger: Logger;
  private readonly ttlMs: number | null;

  constructor(options: CountryCacheOptions) {
    this.db = options.db;
    this.logger = options.logger;
    this.ttlMs = options.ttlSeconds === null ? null : options.ttlSeconds * 1000;
  }

  async get(countryCode: string): Promise<CachedCountry | null> {
    const row = await this.db.get<CountryRow>(
      'SELECT payload, fetched_ts FROM countries WHERE country_code = ?',
      [countryCode]
    );
    if (!row) {
      return null;
    }

    try {
      const parsed = CountryDetailSchema.safeParse(JSON.parse(row.payload));
      if (parsed.success) {
        return { detail: parsed.data, fetchedAt: row.fetched_ts };
      }
      this.logger.warn('Cached country payload has an unexpected shape; refetching', { countryCode });
    } catch (error) {
      this.logger.warn('Cached country payload is not valid JSON; refetching', {
        countryCode,
        error: errorMessage(error)
      });
    }
    return null;
  }

  async put(detail: CountryDetail, fetchedAt: number): Promise<void> {
    await this.db.run(
      `INSERT INTO countries (country_code, payload, fetched_ts)
       VALUES (?, ?, ?)
       ON CONFLICT(country_code) DO UPDATE SET
         payload=excluded.payload,
         fetched_ts=excluded.fetched_ts`,
      [detail.countryCode, JSON.stringify(detail), fetchedAt]
    );
  }

  isFresh(entry: CachedCountry, now: number): boolean {
    return this.ttlMs === null || now - entry.fetchedAt < this.ttlMs;
  }
}
