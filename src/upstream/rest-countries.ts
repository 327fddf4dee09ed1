import type { AxiosInstance } from 'axios';
import { z } from 'zod';

import { UpstreamMalformedError } from '../errors';
import type { CountryDetail } from '../storage/types';
import { ensureHttpsUrl, normalizeCountryCode } from '../utils/text';
import { responseStatus, toUnavailable } from './http';

const ImageLinksSchema = z
  .object({
    png: z.string().nullish(),
    svg: z.string().nullish(),
    alt: z.string().nullish()
  })
  .nullish();

const RestCountrySchema = z.object({
  cca2: z.string(),
  name: z.object({
    common: z.string().min(1),
    official: z.string().nullish()
  }),
  region: z.string().nullish(),
  subregion: z.string().nullish(),
  population: z.number().nullish(),
  independent: z.boolean().nullish(),
  capital: z.union([z.array(z.string()), z.string()]).nullish(),
  capitalInfo: z.object({ latlng: z.array(z.number()).nullish() }).nullish(),
  flags: ImageLinksSchema,
  coatOfArms: ImageLinksSchema,
  maps: z
    .object({
      googleMaps: z.string().nullish(),
      openStreetMaps: z.string().nullish()
    })
    .nullish(),
  borders: z.array(z.string()).nullish()
});

// /alpha/{code} answers with a one-element array; some mirrors return the bare object
const RestCountriesResponseSchema = z.union([z.array(RestCountrySchema).min(1), RestCountrySchema]);

type RestCountry = z.infer<typeof RestCountrySchema>;

function capitalOf(country: RestCountry): string | null {
  if (Array.isArray(country.capital)) {
    return country.capital[0] ?? null;
  }
  return country.capital ?? null;
}

function toCountryDetail(country: RestCountry, countryCode: string): CountryDetail {
  const latlng = country.capitalInfo?.latlng;
  const hasCapitalPosition = Array.isArray(latlng) && latlng.length === 2;

  return {
    countryCode,
    commonName: country.name.common,
    officialName: country.name.official ?? null,
    region: country.region ?? null,
    subregion: country.subregion ?? null,
    population: country.population ?? null,
    independent: country.independent ?? null,
    capitalName: capitalOf(country),
    capitalLatitude: hasCapitalPosition ? latlng[0] : null,
    capitalLongitude: hasCapitalPosition ? latlng[1] : null,
    flagUrl: ensureHttpsUrl(country.flags?.png),
    flagSvgUrl: ensureHttpsUrl(country.flags?.svg),
    flagAltText: country.flags?.alt ?? null,
    coatOfArmsPngUrl: ensureHttpsUrl(country.coatOfArms?.png),
    coatOfArmsSvgUrl: ensureHttpsUrl(country.coatOfArms?.svg),
    googleMapsUrl: ensureHttpsUrl(country.maps?.googleMaps),
    openStreetMapUrl: ensureHttpsUrl(country.maps?.openStreetMaps),
    borders: country.borders ?? []
  };
}

export class RestCountriesSource {
  constructor(private readonly http: AxiosInstance) {}

  async fetchCountryDetail(countryCode: string): Promise<CountryDetail> {
    let payload: unknown;
    try {
      const response = await this.http.get<unknown>(`alpha/${encodeURIComponent(countryCode)}`);
      payload = response.data;
    } catch (error) {
      if (responseStatus(error) === 404) {
        throw new UpstreamMalformedError('countries', `REST Countries has no record for ${countryCode}`, {
          cause: error
        });
      }
      throw toUnavailable('countries', error);
    }

    const parsed = RestCountriesResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new UpstreamMalformedError(
        'countries',
        `REST Countries payload was in an unexpected format for ${countryCode}`,
        { cause: parsed.error }
      );
    }

    const country = Array.isArray(parsed.data) ? parsed.data[0] : parsed.data;
    const resolvedCode = normalizeCountryCode(country.cca2);
    if (!resolvedCode) {
      throw new UpstreamMalformedError('countries', `REST Countries returned an invalid cca2 for ${countryCode}`);
    }
    // details are cached under the requested code
    if (resolvedCode !== countryCode.toUpperCase()) {
      throw new UpstreamMalformedError(
        'countries',
        `REST Countries answered ${resolvedCode} when asked for ${countryCode}`
      );
    }

    return toCountryDetail(country, resolvedCode);
  }
}
