#!/usr/bin/env node
import { parseArgs } from './cli';
import type { CliCommand } from './cli';
import { applyEnvOverrides, loadEnvConfig, loadSettings } from './config';
import type { Settings } from './config';
import { errorMessage, exitCodeFor, isNationalityError } from './errors';
import { PopularityQuery } from './popularity';
import { AggregationEngine } from './prediction';
import { CountryCache, Database, PopularityCounter, PredictionCache } from './storage';
import { createUpstreamClient } from './upstream';
import { Logger } from './utils/logger';
import { normalizeCountryCode } from './utils/text';

interface Services {
  engine: AggregationEngine;
  popularity: PopularityQuery;
  predictions: PredictionCache;
}

function writeResult(result: unknown) {
  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
}

function createServices(settings: Settings, logger: Logger, db: Database): Services {
  const predictions = new PredictionCache({ db, logger, ttlSeconds: settings.cache.ttl_seconds });
  const countries = new CountryCache({ db, logger, ttlSeconds: settings.cache.country_ttl_seconds });
  const counter = new PopularityCounter(db);

  const upstream = createUpstreamClient({
    logger,
    nationalizeBaseUrl: settings.upstream.nationalize_base_url,
    countryBaseUrl: settings.upstream.country_base_url,
    timeoutMs: settings.upstream.request_timeout_ms,
    userAgent: settings.upstream.user_agent
  });

  const engine = new AggregationEngine({
    logger,
    upstream,
    predictions,
    countries,
    popularity: counter,
    retry: settings.retry,
    popularityPolicy: settings.popularity
  });

  const popularity = new PopularityQuery({
    counter,
    logger,
    defaultLimit: settings.popularity.default_limit
  });

  return { engine, popularity, predictions };
}

async function execute(command: CliCommand, services: Services): Promise<unknown> {
  switch (command.command) {
    case 'predict':
      return services.engine.predict(command.name);
    case 'popular': {
      const names = await services.popularity.mostPopular(command.countryCode, command.limit);
      return { countryCode: normalizeCountryCode(command.countryCode), names };
    }
    case 'prune': {
      const removed = await services.predictions.pruneExpired(Date.now());
      return { removed };
    }
  }
}

async function bootstrap() {
  const settings = applyEnvOverrides(loadSettings(), loadEnvConfig());
  const logger = new Logger({ level: settings.logging.level, format: settings.logging.format });

  let db: Database | null = null;

  try {
    const command = parseArgs({ logger });

    db = await Database.open(settings.paths.db_file, logger);

    const result = await execute(command, createServices(settings, logger, db));
    writeResult(result);
  } catch (error) {
    logger.error('Command failed', {
      kind: isNationalityError(error) ? error.kind : 'Unexpected',
      error: errorMessage(error)
    });
    process.exitCode = exitCodeFor(error);
  } finally {
    if (db) {
      await db.close().catch((error) => {
        logger.warn('Failed to close SQLite store cleanly', {
          error: errorMessage(error)
        });
      });
    }
  }
}

bootstrap().catch((error) => {
  // eslint-disable-next-line no-console
  console.error('Bootstrap failed', error);
  process.exitCode = exitCodeFor(error);
});
