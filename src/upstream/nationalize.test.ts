import { describe, expect, it } from 'vitest';

import { UpstreamMalformedError, UpstreamUnavailableError } from '../errors';
import { createTestLogger, silentLogger } from '../testing/logger';
import { createStubAdapter, networkError, timeoutError } from '../testing/stub-adapter';
import type { StubHandler } from '../testing/stub-adapter';
import { createHttpClient } from './http';
import { NationalizeSource } from './nationalize';

function sourceFor(handler: StubHandler, logger = silentLogger) {
  const { adapter, requests } = createStubAdapter(handler);
  const http = createHttpClient({
    baseUrl: 'https://nationalize.test/',
    timeoutMs: 1000,
    userAgent: 'nationality-lookup-test',
    adapter
  });
  return { source: new NationalizeSource(http, logger), requests };
}

describe('NationalizeSource', () => {
  it('sends the raw name and returns candidates by probability, then code', async () => {
    const { source, requests } = sourceFor(() => ({
      status: 200,
      data: {
        count: 120,
        name: ' Alice ',
        country: [
          { country_id: 'us', probability: 0.2 },
          { country_id: 'GB', probability: 0.5 },
          { country_id: 'IE', probability: 0.2 }
        ]
      }
    }));

    const candidates = await source.fetchCandidates(' Alice ');

    expect(candidates).toEqual([
      { countryCode: 'GB', probability: 0.5 },
      { countryCode: 'IE', probability: 0.2 },
      { countryCode: 'US', probability: 0.2 }
    ]);
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('');
    expect(requests[0].params).toEqual({ name: ' Alice ' });
    expect(requests[0].headers['User-Agent']).toBe('nationality-lookup-test');
  });

  it('treats an empty or missing country list as no candidates', async () => {
    const empty = sourceFor(() => ({ status: 200, data: { count: 0, name: 'zzxq', country: [] } }));
    const missing = sourceFor(() => ({ status: 200, data: { name: 'zzxq', country: null } }));

    await expect(empty.source.fetchCandidates('zzxq')).resolves.toEqual([]);
    await expect(missing.source.fetchCandidates('zzxq')).resolves.toEqual([]);
  });

  it('skips malformed and duplicate entries', async () => {
    const { logger, entries } = createTestLogger();
    const { source } = sourceFor(
      () => ({
        status: 200,
        data: {
          country: [
            { country_id: 'US' },
            { country_id: 'X1', probability: 0.3 },
            { country_id: 'DE', probability: 0.4 },
            { country_id: 'de', probability: 0.1 }
          ]
        }
      }),
      logger
    );

    await expect(source.fetchCandidates('hans')).resolves.toEqual([{ countryCode: 'DE', probability: 0.4 }]);
    expect(
      entries().filter((entry) => entry.message === 'Skipping malformed Nationalize.io country entry')
    ).toHaveLength(2);
  });

  it('keeps the higher probability when a lower duplicate comes first', async () => {
    const { source } = sourceFor(() => ({
      status: 200,
      data: {
        country: [
          { country_id: 'de', probability: 0.1 },
          { country_id: 'DE', probability: 0.4 },
          { country_id: 'AT', probability: 0.2 }
        ]
      }
    }));

    await expect(source.fetchCandidates('hans')).resolves.toEqual([
      { countryCode: 'DE', probability: 0.4 },
      { countryCode: 'AT', probability: 0.2 }
    ]);
  });

  it('reports rate limiting as unavailable with the status', async () => {
    const { source } = sourceFor(() => ({ status: 429, data: { error: 'Request limit reached' } }));

    const error = await source.fetchCandidates('alice').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UpstreamUnavailableError);
    expect(error).toMatchObject({
      kind: 'UpstreamUnavailable',
      service: 'nationalize',
      status: 429,
      message: 'Nationalize.io responded with rate limit exceeded'
    });
  });

  it('reports server errors as unavailable', async () => {
    const { source } = sourceFor(() => ({ status: 502, data: null }));

    await expect(source.fetchCandidates('alice')).rejects.toMatchObject({
      kind: 'UpstreamUnavailable',
      status: 502,
      message: 'Nationalize.io responded with HTTP 502'
    });
  });

  it('reports timeouts and transport errors as unavailable', async () => {
    const timedOut = sourceFor((config) => {
      throw timeoutError(config);
    });
    const refused = sourceFor((config) => {
      throw networkError(config);
    });

    await expect(timedOut.source.fetchCandidates('alice')).rejects.toMatchObject({
      kind: 'UpstreamUnavailable',
      status: null,
      message: 'Nationalize.io request timed out'
    });
    await expect(refused.source.fetchCandidates('alice')).rejects.toMatchObject({
      kind: 'UpstreamUnavailable',
      message: 'Nationalize.io request failed: connect ECONNREFUSED 127.0.0.1:9'
    });
  });

  it('rejects a body that does not look like a prediction', async () => {
    const { source } = sourceFor(() => ({ status: 200, data: { country: 'IE' } }));

    const error = await source.fetchCandidates('alice').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UpstreamMalformedError);
    expect(error).toMatchObject({
      service: 'nationalize',
      message: 'Nationalize.io payload was in an unexpected format for "alice"'
    });
  });
});
