import type {
  CountryMetadata,
  EnrollmentRecord,
  GraduationRecord,
  SpendingRecord,
} from '../types.js';
import type { CountryRow, EnrollmentRow, GraduationRow, SpendingRow } from './types.js';

type Generated = 'id' | 'created_at';

export type NewEnrollmentRow = Omit<EnrollmentRow, Generated>;
export type NewGraduationRow = Omit<GraduationRow, Generated>;
export type NewSpendingRow = Omit<SpendingRow, Generated>;
export type NewCountryRow = Omit<CountryRow, Generated>;

export const NOT_SPECIFIED = 'Not Specified';
export const ALL_LEVELS = 'All Levels';

export function toEnrollmentRow(record: EnrollmentRecord): NewEnrollmentRow {
  return {
    country_code: record.countryCode,
    country_name: record.countryName,
    year: record.year,
    enrollment_rate: record.enrollmentRate,
    education_level: record.educationLevel ?? NOT_SPECIFIED,
    gender: record.gender ?? NOT_SPECIFIED,
    data_source: record.dataSource,
    extraction_date: record.extractionDate,
  };
}

export function toGraduationRow(record: GraduationRecord): NewGraduationRow {
  return {
    country_code: record.countryCode,
    country_name: record.countryName,
    year: record.year,
    graduation_rate: record.graduationRate,
    completion_rate: record.completionRate,
    education_level: record.educationLevel ?? ALL_LEVELS,
    data_source: record.dataSource,
    extraction_date: record.extractionDate,
  };
}

export function toSpendingRow(record: SpendingRecord): NewSpendingRow {
  return {
    country_code: record.countryCode,
    country_name: record.countryName,
    year: record.year,
    spending_usd: record.spendingUsd,
    spending_per_capita: record.spendingPerCapita,
    spending_percent_gdp: null,
    currency: record.currency,
    data_source: record.dataSource,
    extraction_date: record.extractionDate,
  };
}

export function toCountryRow(record: CountryMetadata): NewCountryRow {
  return {
    country_code: record.countryCode,
    country_name: record.countryName,
    region: record.region,
    income_group: record.incomeGroup,
    population: record.population,
    gdp_per_capita: record.gdpPerCapita,
    data_available: record.dataAvailable,
    last_updated: record.lastUpdated,
  };
}
