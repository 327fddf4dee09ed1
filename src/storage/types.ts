import { z } from 'zod';

export const NationalityCandidateSchema = z.object({
  countryCode: z.string().regex(/^[A-Z]{2}$/),
  probability: z.number().min(0).max(1)
});

export const CountryDetailSchema = z.object({
  countryCode: z.string().regex(/^[A-Z]{2}$/),
  commonName: z.string(),
  officialName: z.string().nullable(),
  region: z.string().nullable(),
  subregion: z.string().nullable(),
  population: z.number().nullable(),
  independent: z.boolean().nullable(),
  capitalName: z.string().nullable(),
  capitalLatitude: z.number().nullable(),
  capitalLongitude: z.number().nullable(),
  flagUrl: z.string().nullable(),
  flagSvgUrl: z.string().nullable(),
  flagAltText: z.string().nullable(),
  coatOfArmsPngUrl: z.string().nullable(),
  coatOfArmsSvgUrl: z.string().nullable(),
  googleMapsUrl: z.string().nullable(),
  openStreetMapUrl: z.string().nullable(),
  borders: z.array(z.string())
});

export const PredictionEntrySchema = z.discriminatedUnion('status', [
  z.object({
    candidate: NationalityCandidateSchema,
    status: z.literal('resolved'),
    detail: CountryDetailSchema
  }),
  z.object({
    candidate: NationalityCandidateSchema,
    status: z.literal('metadata_unavailable'),
    detail: z.null()
  })
]);

export const PredictionRecordSchema = z.object({
  normalizedName: z.string().min(1),
  entries: z.array(PredictionEntrySchema),
  fetchedAt: z.number().int().nonnegative()
});

export type NationalityCandidate = z.infer<typeof NationalityCandidateSchema>;
export type CountryDetail = z.infer<typeof CountryDetailSchema>;
export type PredictionEntry = z.infer<typeof PredictionEntrySchema>;
export type PredictionRecord = z.infer<typeof PredictionRecordSchema>;

export interface PopularName {
  name: string;
  count: number;
}

export interface CachedCountry {
  detail: CountryDetail;
  fetchedAt: number;
}

export interface PredictionCacheStore {
  get(normalizedName: string): Promise<PredictionRecord | null>;
  put(normalizedName: string, record: PredictionRecord): Promise<void>;
  isFresh(record: PredictionRecord, now: number): boolean;
}

export interface CountryCacheStore {
  get(countryCode: string): Promise<CachedCountry | null>;
  put(detail: CountryDetail, fetchedAt: number): Promise<void>;
  isFresh(entry: CachedCountry, now: number): boolean;
}

export interface PopularityCounterStore {
  increment(countryCode: string, normalizedName: string): Promise<void>;
  topN(countryCode: string, limit: number): Promise<PopularName[]>;
}
