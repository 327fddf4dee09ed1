import type { Database } from './database';
import type { PopularName, PopularityCounterStore } from './types';

interface PopularityRow {
  normalized_name: string;
  count: number;
}

export class PopularityCounter implements PopularityCounterStore {
  constructor(private readonly db: Database, private readonly clock: () => number = Date.now) {}

  async increment(countryCode: string, normalizedName: string): Promise<void> {
    const timestamp = this.clock();
    await this.db.run(
      `INSERT INTO name_popularity (country_code, normalized_name, count, first_seen_ts, last_seen_ts)
       VALUES (?, ?, 1, ?, ?)
       ON CONFLICT(country_code, normalized_name) DO UPDATE SET
         count=name_popularity.count + 1,
         last_seen_ts=excluded.last_seen_ts`,
      [countryCode, normalizedName, timestamp, timestamp]
    );
  }

  async topN(countryCode: string, limit: number): Promise<PopularName[]> {
    const rows = await this.db.all<PopularityRow>(
      `SELECT normalized_name, count FROM name_popularity
        WHERE country_code = ?
        ORDER BY count DESC, normalized_name ASC
        LIMIT ?`,
      [countryCode, limit]
    );

    return rows.map((row) => ({ name: row.normalized_name, count: row.count }));
  }

  async getCount(countryCode: string, normalizedName: string): Promise<number> {
    const row = await this.db.get<{ count: number }>(
      'SELECT count FROM name_popularity WHERE country_code = ? AND normalized_name = ?',
      [countryCode, normalizedName]
    );
    return row?.count ?? 0;
  }
}
