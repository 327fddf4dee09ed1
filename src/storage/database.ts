import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

import sqlite3 from 'sqlite3';

import { StoreFailureError, errorMessage } from '../errors';
import type { Logger } from '../utils/logger';

const OPEN_FLAGS = sqlite3.OPEN_READWRITE | sqlite3.OPEN_CREATE;
const IN_MEMORY = ':memory:';

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS predictions (
     normalized_name TEXT PRIMARY KEY,
     payload TEXT NOT NULL,
     fetched_ts INTEGER NOT NULL
   )`,
  `CREATE TABLE IF NOT EXISTS countries (
     country_code TEXT PRIMARY KEY,
     payload TEXT NOT NULL,
     fetched_ts INTEGER NOT NULL
   )`,
  `CREATE TABLE IF NOT EXISTS name_popularity (
     country_code TEXT NOT NULL,
     normalized_name TEXT NOT NULL,
     count INTEGER NOT NULL,
     first_seen_ts INTEGER NOT NULL,
     last_seen_ts INTEGER NOT NULL,
     PRIMARY KEY(country_code, normalized_name)
   )`,
  'CREATE INDEX IF NOT EXISTS idx_predictions_fetched ON predictions(fetched_ts)',
  'CREATE INDEX IF NOT EXISTS idx_popularity_rank ON name_popularity(country_code, count DESC, normalized_name)'
];

function storeFailure(action: string, error: unknown): StoreFailureError {
  return new StoreFailureError(`SQLite ${action} failed: ${errorMessage(error)}`, { cause: error });
}

// one connection shared by both caches and the popularity counter
export class Database {
  private constructor(private readonly db: sqlite3.Database, private readonly logger: Logger) {}

  static async open(dbFile: string, logger: Logger): Promise<Database> {
    const target = dbFile === IN_MEMORY ? IN_MEMORY : resolve(process.cwd(), dbFile);
    if (target !== IN_MEMORY) {
      try {
        mkdirSync(dirname(target), { recursive: true });
      } catch (error) {
        throw storeFailure('open', error);
      }
    }

    const connection = await new Promise<sqlite3.Database>((resolveDb, rejectDb) => {
      const db = new sqlite3.Database(target, OPEN_FLAGS, (err) => {
        if (err) {
          rejectDb(storeFailure('open', err));
          return;
        }
        resolveDb(db);
      });
    });

    const database = new Database(connection, logger);
    await database.bootstrap();
    logger.debug('SQLite store ready', { file: target });
    return database;
  }

  private async bootstrap(): Promise<void> {
    for (const statement of SCHEMA) {
      await this.exec(statement);
    }
  }

  exec(sql: string): Promise<void> {
    return new Promise((resolveExec, rejectExec) => {
      this.db.exec(sql, (err) => {
        if (err) {
          rejectExec(storeFailure('exec', err));
          return;
        }
        resolveExec();
      });
    });
  }

  run(sql: string, params: unknown[]): Promise<number> {
    return new Promise((resolveRun, rejectRun) => {
      this.db.run(sql, params, function runCallback(err) {
        if (err) {
          rejectRun(storeFailure('write', err));
          return;
        }
        resolveRun(this.changes ?? 0);
      });
    });
  }

  get<T>(sql: string, params: unknown[] = []): Promise<T | undefined> {
    return new Promise((resolveGet, rejectGet) => {
      this.db.get(sql, params, (err, row) => {
        if (err) {
          rejectGet(storeFailure('read', err));
          return;
        }
        resolveGet(row as T | undefined);
      });
    });
  }

  all<T>(sql: string, params: unknown[] = []): Promise<T[]> {
    return new Promise((resolveAll, rejectAll) => {
      this.db.all(sql, params, (err, rows) => {
        if (err) {
          rejectAll(storeFailure('read', err));
          return;
        }
        resolveAll(rows as T[]);
      });
    });
  }

  async close(): Promise<void> {
    await new Promise<void>((resolveClose, rejectClose) => {
      this.db.close((err) => {
        if (err) {
          rejectClose(storeFailure('close', err));
          return;
        }
        resolveClose();
      });
    });
    this.logger.debug('SQLite store closed');
  }
}
