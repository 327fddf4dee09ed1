import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { countryDetail } from '../testing/fixtures';
import { silentLogger } from '../testing/logger';
import { CountryCache } from './country-cache';
import { Database } from './database';

describe('CountryCache', () => {
  let db: Database;
  let cache: CountryCache;

  beforeEach(async () => {
    db = await Database.open(':memory:', silentLogger);
    cache = new CountryCache({ db, logger: silentLogger, ttlSeconds: 10 });
  });

  afterEach(async () => {
    await db.close();
  });

  it('stores details by country code with their fetch time', async () => {
    const detail = countryDetail('IE', { capitalName: 'Dublin', borders: ['GBR'] });

    await cache.put(detail, 500);

    await expect(cache.get('IE')).resolves.toEqual({ detail, fetchedAt: 500 });
    await expect(cache.get('GB')).resolves.toBeNull();
  });

  it('overwrites an older copy', async () => {
    await cache.put(countryDetail('IE', { population: 1 }), 500);
    await cache.put(countryDetail('IE', { population: 2 }), 900);

    const cached = await cache.get('IE');

    expect(cached?.detail.population).toBe(2);
    expect(cached?.fetchedAt).toBe(900);
  });

  it('applies its own ttl', () => {
    const entry = { detail: countryDetail('IE'), fetchedAt: 0 };

    expect(cache.isFresh(entry, 9_999)).toBe(true);
    expect(cache.isFresh(entry, 10_000)).toBe(false);
  });

  it('ignores payloads that no longer parse', async () => {
    await db.run('INSERT INTO countries (country_code, payload, fetched_ts) VALUES (?, ?, ?)', [
      'IE',
      JSON.stringify({ countryCode: 'IE' }),
      0
    ]);

    await expect(cache.get('IE')).resolves.toBeNull();
  });
});
