import type { AxiosInstance } from 'axios';
import { z } from 'zod';

import { UpstreamMalformedError } from '../errors';
import type { NationalityCandidate } from '../storage/types';
import type { Logger } from '../utils/logger';
import { normalizeCountryCode } from '../utils/text';
import { toUnavailable } from './http';

const NationalizeResponseSchema = z.object({
  count: z.number().nullish(),
  name: z.string().nullish(),
  country: z.array(z.unknown()).nullish()
});

const NationalizeCountrySchema = z.object({
  country_id: z.string(),
  probability: z.number().min(0).max(1)
});

export function compareCandidates(a: NationalityCandidate, b: NationalityCandidate): number {
  if (b.probability !== a.probability) {
    return b.probability - a.probability;
  }
  if (a.countryCode === b.countryCode) {
    return 0;
  }
  return a.countryCode < b.countryCode ? -1 : 1;
}

export class NationalizeSource {
  constructor(private readonly http: AxiosInstance, private readonly logger: Logger) {}

  async fetchCandidates(name: string): Promise<NationalityCandidate[]> {
    let payload: unknown;
    try {
      const response = await this.http.get<unknown>('', { params: { name } });
      payload = response.data;
    } catch (error) {
      throw toUnavailable('nationalize', error);
    }

    const parsed = NationalizeResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new UpstreamMalformedError(
        'nationalize',
        `Nationalize.io payload was in an unexpected format for "${name}"`,
        { cause: parsed.error }
      );
    }

    // the same code can appear twice with different casing; the higher probability wins
    const best = new Map<string, number>();

    for (const raw of parsed.data.country ?? []) {
      const entry = NationalizeCountrySchema.safeParse(raw);
      const countryCode = entry.success ? normalizeCountryCode(entry.data.country_id) : null;
      if (!entry.success || !countryCode) {
        this.logger.debug('Skipping malformed Nationalize.io country entry', { name, entry: raw });
        continue;
      }

      const previous = best.get(countryCode);
      if (previous === undefined || entry.data.probability > previous) {
        best.set(countryCode, entry.data.probability);
      }
    }

    const candidates: NationalityCandidate[] = Array.from(best, ([countryCode, probability]) => ({
      countryCode,
      probability
    }));

    if (candidates.length === 0) {
      this.logger.debug('Nationalize.io returned no candidates', { name });
    }

    return candidates.sort(compareCandidates);
  }
}
