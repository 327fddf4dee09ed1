import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';

import { LogLevelSchema, SettingsSchema } from './types';
import type { EnvConfig, Settings } from './types';

const NEVER_EXPIRES = new Set(['never', 'infinity', 'inf']);
const UrlSchema = z.string().url();

let cachedSettings: Settings | null = null;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function invalidOverride(variable: string, value: string, expectation: string): Error {
  return new Error(`Invalid ${variable} "${value}": expected ${expectation}`);
}

function parseUrlOverride(variable: string, value: string): string {
  if (!UrlSchema.safeParse(value).success) {
    throw invalidOverride(variable, value, 'an absolute URL');
  }
  return value;
}

export function parseCacheTtl(value: string): number | null {
  if (NEVER_EXPIRES.has(value.toLowerCase())) {
    return null;
  }

  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw invalidOverride('CACHE_TTL', value, 'a positive number of seconds or "never"');
  }
  return seconds;
}

export function parseRequestTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw invalidOverride('REQUEST_TIMEOUT', value, 'a positive integer of milliseconds');
  }
  return ms;
}

export function parseSettings(contents: string): Settings {
  const result = SettingsSchema.safeParse(parse(contents));
  if (!result.success) {
    throw new Error(`Invalid settings: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function applyEnvOverrides(settings: Settings, env: EnvConfig): Settings {
  const upstream = { ...settings.upstream };
  const cache = { ...settings.cache };
  const paths = { ...settings.paths };
  const logging = { ...settings.logging };

  if (env.nationalizeBaseUrl) {
    upstream.nationalize_base_url = parseUrlOverride('NATIONALIZE_BASE_URL', env.nationalizeBaseUrl);
  }
  if (env.countryBaseUrl) {
    upstream.country_base_url = parseUrlOverride('COUNTRY_BASE_URL', env.countryBaseUrl);
  }
  if (env.requestTimeout) {
    upstream.request_timeout_ms = parseRequestTimeout(env.requestTimeout);
  }
  if (env.cacheTtl) {
    cache.ttl_seconds = parseCacheTtl(env.cacheTtl);
  }
  if (env.dbFile) {
    paths.db_file = env.dbFile;
  }
  if (env.logLevel) {
    const level = LogLevelSchema.safeParse(env.logLevel.toLowerCase());
    if (!level.success) {
      throw invalidOverride('LOG_LEVEL', env.logLevel, LogLevelSchema.options.join(' | '));
    }
    logging.level = level.data;
  }

  return { ...settings, upstream, cache, paths, logging };
}

export function loadSettings(configPath = resolve(process.cwd(), 'configs', 'settings.yaml')): Settings {
  if (cachedSettings) {
    return cachedSettings;
  }

  const fileContents = readFileSync(configPath, 'utf-8');
  cachedSettings = parseSettings(fileContents);
  return cachedSettings;
}
