import {
  InvalidInputError,
  PredictionUnavailableError,
  UpstreamMalformedError,
  UpstreamUnavailableError,
  errorMessage
} from '../errors';
import type {
  CountryDetail,
  NationalityCandidate,
  PredictionEntry,
  PredictionRecord
} from '../storage/types';
import type { Logger } from '../utils/logger';
import { normalizeName, sleep } from '../utils/text';
import type { AggregationEngineDependencies } from './types';

function isUpstreamFailure(error: unknown): error is UpstreamUnavailableError | UpstreamMalformedError {
  return error instanceof UpstreamUnavailableError || error instanceof UpstreamMalformedError;
}

function failureMetadata(error: unknown): Record<string, unknown> {
  if (error instanceof UpstreamUnavailableError) {
    return { kind: error.kind, service: error.service, status: error.status, error: error.message };
  }
  if (error instanceof UpstreamMalformedError) {
    return { kind: error.kind, service: error.service, error: error.message };
  }
  return { error: errorMessage(error) };
}

export class AggregationEngine {
  private readonly clock: () => number;

  constructor(private readonly deps: AggregationEngineDependencies) {
    this.clock = deps.clock ?? Date.now;
  }

  async predict(rawName: string): Promise<PredictionRecord> {
    const normalizedName = normalizeName(rawName);
    if (!normalizedName) {
      throw new InvalidInputError('Name must contain at least one non-whitespace character');
    }

    const { predictions, popularityPolicy } = this.deps;
    const logger = this.deps.logger.child({ name: normalizedName });

    const cached = await predictions.get(normalizedName);
    if (cached && predictions.isFresh(cached, this.clock())) {
      logger.debug('Serving prediction from cache', { fetchedAt: cached.fetchedAt });
      if (popularityPolicy.count_cache_hits) {
        await this.recordPopularity(cached);
      }
      return cached;
    }

    logger.debug(cached ? 'Cached prediction is stale; refetching' : 'Prediction cache miss');

    const candidates = await this.fetchCandidates(rawName, normalizedName, logger);

    const entries: PredictionEntry[] = [];
    for (const candidate of candidates) {
      entries.push(await this.resolveEntry(candidate, logger));
    }

    const record: PredictionRecord = {
      normalizedName,
      entries,
      fetchedAt: this.clock()
    };

    await predictions.put(normalizedName, record);
    await this.recordPopularity(record);

    logger.info('Prediction fetched from upstream', {
      candidates: entries.length,
      metadataUnavailable: entries.filter((entry) => entry.status === 'metadata_unavailable').length
    });

    return record;
  }

  private async withRetry<T>(operation: () => Promise<T>, logger: Logger, label: string): Promise<T> {
    const { attempts, backoff_ms: backoffMs } = this.deps.retry;

    for (let attempt = 1; ; attempt += 1) {
      try {
        return await operation();
      } catch (error) {
        if (!(error instanceof UpstreamUnavailableError) || attempt >= attempts) {
          throw error;
        }
        logger.debug('Retrying upstream call', { label, attempt, ...failureMetadata(error) });
        await sleep(backoffMs * attempt);
      }
    }
  }

  private async fetchCandidates(
    rawName: string,
    normalizedName: string,
    logger: Logger
  ): Promise<NationalityCandidate[]> {
    try {
      return await this.withRetry(() => this.deps.upstream.fetchCandidates(rawName), logger, 'candidates');
    } catch (error) {
      if (!isUpstreamFailure(error)) {
        throw error;
      }
      logger.warn('Nationality prediction failed', failureMetadata(error));
      throw new PredictionUnavailableError(
        normalizedName,
        `Nationality prediction is unavailable for "${normalizedName}"; try again later`,
        { cause: error }
      );
    }
  }

  private async resolveEntry(candidate: NationalityCandidate, logger: Logger): Promise<PredictionEntry> {
    const { countries, upstream } = this.deps;
    const { countryCode } = candidate;

    if (countries) {
      const cached = await countries.get(countryCode);
      if (cached && countries.isFresh(cached, this.clock())) {
        return { candidate, status: 'resolved', detail: cached.detail };
      }
    }

    let detail: CountryDetail;
    try {
      detail = await this.withRetry(() => upstream.fetchCountryDetail(countryCode), logger, 'country');
    } catch (error) {
      if (!isUpstreamFailure(error)) {
        throw error;
      }
      logger.warn('Country metadata unavailable', { countryCode, ...failureMetadata(error) });
      return { candidate, status: 'metadata_unavailable', detail: null };
    }

    if (countries) {
      await countries.put(detail, this.clock());
    }
    return { candidate, status: 'resolved', detail };
  }

  private async recordPopularity(record: PredictionRecord): Promise<void> {
    const [top] = record.entries;
    if (!top) {
      return;
    }

    const counted = this.deps.popularityPolicy.scope === 'all' ? record.entries : [top];
    for (const entry of counted) {
      await this.deps.popularity.increment(entry.candidate.countryCode, record.normalizedName);
    }
  }
}
