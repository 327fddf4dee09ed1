import { InvalidInputError } from '../errors';
import type { PopularName, PopularityCounterStore } from '../storage/types';
import type { Logger } from '../utils/logger';
import { normalizeCountryCode } from '../utils/text';

export interface PopularityQueryDependencies {
  counter: PopularityCounterStore;
  logger: Logger;
  defaultLimit: number;
}

export class PopularityQuery {
  constructor(private readonly deps: PopularityQueryDependencies) {}

  async mostPopular(countryCode: string, limit: number = this.deps.defaultLimit): Promise<PopularName[]> {
    const code = normalizeCountryCode(countryCode);
    if (!code) {
      throw new InvalidInputError(`Country code must be two letters (ISO 3166-1 alpha-2), got "${countryCode}"`);
    }
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new InvalidInputError(`Limit must be a positive integer, got ${limit}`);
    }

    const names = await this.deps.counter.topN(code, limit);
    this.deps.logger.debug('Popular names loaded', { countryCode: code, limit, returned: names.length });
    return names;
  }
}
