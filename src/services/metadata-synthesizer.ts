import { lookupIncomeGroup, lookupRegion } from './country-resolver.js';
import { formatDate } from './record-cleaner.js';
import type { CleanRecord, CountryMetadata } from '../types.js';

/**
 * Builds the country reference rows from every code and name seen in the
 * cleaned datasets.
 *
 * Codes and names share one set and are told apart by length alone, so a
 * name yields a row with an empty code and a code yields a row named after
 * itself. Empty-code rows are reported by the caller, not repaired here.
 */
export function synthesizeCountryMetadata(
  datasets: ReadonlyArray<readonly CleanRecord[]>,
  now: () => Date = () => new Date()
): CountryMetadata[] {
  const seen = new Set<string>();
  for (const records of datasets) {
    for (const record of records) {
      seen.add(record.countryCode);
      seen.add(record.countryName);
    }
  }

  const lastUpdated = formatDate(now());
  return [...seen]
    .sort()
    .filter((entry) => entry.trim().length > 0)
    .map((entry) => ({
      countryCode: entry.length <= 3 ? entry : '',
      countryName: entry,
      region: lookupRegion(entry),
      incomeGroup: lookupIncomeGroup(entry),
      population: null,
      gdpPerCapita: null,
      dataAvailable: true,
      lastUpdated,
    }));
}

export function countUnkeyedCountries(metadata: readonly CountryMetadata[]): number {
  return metadata.filter((country) => country.countryCode === '').length;
}
