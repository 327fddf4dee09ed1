import type { Logger } from '../utils/logger';
import { errorMessage } from '../errors';
import type { Database } from './database';
import { PredictionRecordSchema } from './types';
import type { PredictionCacheStore, PredictionRecord } from './types';

interface PredictionCacheOptions {
  db: Database;
  logger: Logger;
  // null keeps records forever
  ttlSeconds: number | null;
}

interface PredictionRow {
  payload: string;
  fetched_ts: number;
}

export class PredictionCache implements PredictionCacheStore {
  private readonly db: Database;
  private readonly logger: Logger;
  private readonly ttlMs: number | null;

  constructor(options: PredictionCacheOptions) {
    this.db = options.db;
    this.logger = options.logger;
    this.ttlMs = options.ttlSeconds === null ? null : options.ttlSeconds * 1000;
  }

  async get(normalizedName: string): Promise<PredictionRecord | null> {
    const row = await this.db.get<PredictionRow>(
      'SELECT payload, fetched_ts FROM predictions WHERE normalized_name = ?',
      [normalizedName]
    );
    if (!row) {
      return null;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(row.payload);
    } catch (error) {
      this.logger.warn('Cached prediction payload is not valid JSON; treating as a miss', {
        normalizedName,
        error: errorMessage(error)
      });
      return null;
    }

    const parsed = PredictionRecordSchema.safeParse(decoded);
    if (!parsed.success) {
      this.logger.warn('Cached prediction payload has an unexpected shape; treating as a miss', {
        normalizedName,
        issues: parsed.error.issues.length
      });
      return null;
    }

    return parsed.data;
  }

  async put(normalizedName: string, record: PredictionRecord): Promise<void> {
    await this.db.run(
      `INSERT INTO predictions (normalized_name, payload, fetched_ts)
       VALUES (?, ?, ?)
       ON CONFLICT(normalized_name) DO UPDATE SET
         payload=excluded.payload,
         fetched_ts=excluded.fetched_ts`,
      [normalizedName, JSON.stringify(record), record.fetchedAt]
    );
  }

  isFresh(record: PredictionRecord, now: number): boolean {
    if (this.ttlMs === null) {
      return true;
    }
    return now - record.fetchedAt < this.ttlMs;
  }

  async evict(normalizedName: string): Promise<boolean> {
    const changes = await this.db.run('DELETE FROM predictions WHERE normalized_name = ?', [normalizedName]);
    return changes > 0;
  }

  async pruneExpired(now: number): Promise<number> {
    if (this.ttlMs === null) {
      return 0;
    }
    const removed = await this.db.run('DELETE FROM predictions WHERE fetched_ts <= ?', [now - this.ttlMs]);
    if (removed > 0) {
      this.logger.info('Pruned expired predictions', { removed });
    }
    return removed;
  }
}
