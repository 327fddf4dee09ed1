import { config as loadEnv } from 'dotenv';
import { resolve } from 'node:path';

import type { EnvConfig } from './types';

let cachedEnv: EnvConfig | null = null;

function presentOrUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function readEnvConfig(source: NodeJS.ProcessEnv): EnvConfig {
  return {
    nationalizeBaseUrl: presentOrUndefined(source.NATIONALIZE_BASE_URL),
    countryBaseUrl: presentOrUndefined(source.COUNTRY_BASE_URL),
    cacheTtl: presentOrUndefined(source.CACHE_TTL),
    requestTimeout: presentOrUndefined(source.REQUEST_TIMEOUT),
    dbFile: presentOrUndefined(source.DB_FILE),
    logLevel: presentOrUndefined(source.LOG_LEVEL)
  };
}

export function loadEnvConfig(): EnvConfig {
  if (cachedEnv) {
    return cachedEnv;
  }

  loadEnv({ path: resolve(process.cwd(), '.env') });

  cachedEnv = readEnvConfig(process.env);
  return cachedEnv;
}
