import type { CountryDetail, NationalityCandidate, PredictionEntry, PredictionRecord } from '../storage/types';

const COUNTRY_NAMES: Record<string, string> = {
  US: 'United States',
  GB: 'United Kingdom',
  IE: 'Ireland',
  DE: 'Germany',
  FR: 'France',
  NG: 'Nigeria'
};

export function candidate(countryCode: string, probability: number): NationalityCandidate {
  return { countryCode, probability };
}

export function countryDetail(countryCode: string, overrides: Partial<CountryDetail> = {}): CountryDetail {
  return {
    countryCode,
    commonName: COUNTRY_NAMES[countryCode] ?? countryCode,
    officialName: null,
    region: 'Testregion',
    subregion: null,
    population: 1000,
    independent: true,
    capitalName: null,
    capitalLatitude: null,
    capitalLongitude: null,
    flagUrl: `https://flags.example.test/${countryCode.toLowerCase()}.png`,
    flagSvgUrl: null,
    flagAltText: null,
    coatOfArmsPngUrl: null,
    coatOfArmsSvgUrl: null,
    googleMapsUrl: null,
    openStreetMapUrl: null,
    borders: [],
    ...overrides
  };
}

export function resolvedRecord(
  normalizedName: string,
  candidates: NationalityCandidate[],
  fetchedAt: number
): PredictionRecord {
  return {
    normalizedName,
    fetchedAt,
    entries: candidates.map((entry): PredictionEntry => ({
      candidate: entry,
      status: 'resolved',
      detail: countryDetail(entry.countryCode)
    }))
  };
}

export function restCountryBody(countryCode: string, commonName = COUNTRY_NAMES[countryCode] ?? countryCode) {
  return [
    {
      cca2: countryCode,
      name: { common: commonName, official: `Official ${commonName}` },
      region: 'Europe',
      subregion: 'Northern Europe',
      population: 5000000,
      independent: true,
      capital: ['Capital City'],
      capitalInfo: { latlng: [53.3, -6.2] },
      flags: { png: 'https://flagcdn.com/w320/ie.png', svg: 'https://flagcdn.com/ie.svg', alt: 'A tricolour' },
      coatOfArms: {},
      maps: { googleMaps: 'goo.gl/maps/test', openStreetMaps: 'https://www.openstreetmap.org/relation/1' },
      borders: ['GBR']
    }
  ];
}
