import { z } from 'zod';

export const UpstreamConfigSchema = z.object({
  nationalize_base_url: z.string().url(),
  country_base_url: z.string().url(),
  request_timeout_ms: z.number().int().positive(),
  user_agent: z.string().min(1)
});

export const CacheConfigSchema = z.object({
  ttl_seconds: z.number().positive().nullable(),
  country_ttl_seconds: z.number().positive().nullable()
});

export const RetryConfigSchema = z.object({
  attempts: z.number().int().min(1).max(10),
  backoff_ms: z.number().int().nonnegative()
});

export const PopularityScopeSchema = z.enum(['top', 'all']);

export const PopularityConfigSchema = z.object({
  scope: PopularityScopeSchema,
  count_cache_hits: z.boolean(),
  default_limit: z.number().int().positive()
});

export const PathsConfigSchema = z.object({
  db_file: z.string().min(1)
});

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
  format: z.enum(['json', 'pretty'])
});

export const SettingsSchema = z.object({
  upstream: UpstreamConfigSchema,
  cache: CacheConfigSchema,
  retry: RetryConfigSchema,
  popularity: PopularityConfigSchema,
  paths: PathsConfigSchema,
  logging: LoggingConfigSchema
});

export type UpstreamConfig = z.infer<typeof UpstreamConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type PopularityScope = z.infer<typeof PopularityScopeSchema>;
export type PopularityConfig = z.infer<typeof PopularityConfigSchema>;
export type PathsConfig = z.infer<typeof PathsConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type Settings = z.infer<typeof SettingsSchema>;

export interface EnvConfig {
  nationalizeBaseUrl?: string;
  countryBaseUrl?: string;
  cacheTtl?: string;
  requestTimeout?: string;
  dbFile?: string;
  logLevel?: string;
}
