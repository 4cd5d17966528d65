export const DEFAULT_REGION = 'Other';
export const DEFAULT_INCOME_GROUP = 'Not Specified';

const COUNTRY_NAMES = new Map<string, string>([
  ['USA', 'United States'],
  ['GBR', 'United Kingdom'],
  ['DEU', 'Germany'],
  ['FRA', 'France'],
  ['JPN', 'Japan'],
  ['CAN', 'Canada'],
  ['AUS', 'Australia'],
  ['OECD', 'OECD Average'],
  ['EU', 'European Union'],
]);

const REGIONS = new Map<string, string>([
  ['USA', 'North America'],
  ['CAN', 'North America'],
  ['GBR', 'Europe'],
  ['DEU', 'Europe'],
  ['FRA', 'Europe'],
  ['ITA', 'Europe'],
  ['ESP', 'Europe'],
  ['JPN', 'Asia'],
  ['AUS', 'Oceania'],
]);

const HIGH_INCOME = new Set(['USA', 'GBR', 'DEU', 'FRA', 'JPN', 'CAN', 'AUS', 'OECD']);

export type ResolvedCountry = {
  code: string;
  name: string;
  region: string;
  incomeGroup: string;
};

export function lookupCountryName(token: string): string {
  const name = COUNTRY_NAMES.get(token);
  if (name === undefined) {
    return token;
  }
  return name;
}

export function lookupRegion(token: string): string {
  return REGIONS.get(token) ?? DEFAULT_REGION;
}

export function lookupIncomeGroup(token: string): string {
  if (HIGH_INCOME.has(token)) {
    return 'High Income';
  }
  return DEFAULT_INCOME_GROUP;
}

/**
 * Static lookup only: anything outside the tables above keeps its raw token
 * as the display name and falls into the default region and income group.
 */
export function resolveCountry(raw: string): ResolvedCountry {
  const token = raw.trim();
  return {
    code: token.slice(0, 3).toUpperCase(),
    name: lookupCountryName(token),
    region: lookupRegion(token),
    incomeGroup: lookupIncomeGroup(token),
  };
}
