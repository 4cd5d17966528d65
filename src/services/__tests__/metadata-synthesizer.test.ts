import { describe, it, expect } from '@jest/globals';
import { countUnkeyedCountries, synthesizeCountryMetadata } from '../metadata-synthesizer';
import type { EnrollmentRecord, SpendingRecord } from '../../types';

const now = () => new Date('2024-01-15T08:30:00Z');

function enrollment(countryCode: string, countryName: string): EnrollmentRecord {
  return {
    kind: 'enrollment',
    countryCode,
    countryName,
    year: 2020,
    enrollmentRate: 90,
    educationLevel: null,
    gender: null,
    dataSource: 'OECD',
    extractionDate: '2024-01-15',
  };
}

function spending(countryCode: string, countryName: string): SpendingRecord {
  return {
    kind: 'spending',
    countryCode,
    countryName,
    year: 2020,
    spendingUsd: 1000,
    spendingPerCapita: 1000,
    currency: 'USD',
    dataSource: 'OECD',
    extractionDate: '2024-01-15',
  };
}

describe('synthesizeCountryMetadata', () => {
  it('emits one row per distinct code or name across datasets', () => {
    const metadata = synthesizeCountryMetadata(
      [[enrollment('DEU', 'Germany')], [spending('DEU', 'Germany')]],
      now
    );

    expect(metadata).toEqual([
      {
        countryCode: 'DEU',
        countryName: 'DEU',
        region: 'Europe',
        incomeGroup: 'High Income',
        population: null,
        gdpPerCapita: null,
        dataAvailable: true,
        lastUpdated: '2024-01-15',
      },
      {
        countryCode: '',
        countryName: 'Germany',
        region: 'Other',
        incomeGroup: 'Not Specified',
        population: null,
        gdpPerCapita: null,
        dataAvailable: true,
        lastUpdated: '2024-01-15',
      },
    ]);
  });

  it('sorts entries and keeps short names as codes', () => {
    const metadata = synthesizeCountryMetadata([[enrollment('ZZZ', 'ZZZ'), enrollment('CAN', 'Canada')]], now);

    expect(metadata.map((row) => [row.countryCode, row.countryName])).toEqual([
      ['CAN', 'CAN'],
      ['', 'Canada'],
      ['ZZZ', 'ZZZ'],
    ]);
    expect(countUnkeyedCountries(metadata)).toBe(1);
  });

  it('skips blank entries and empty inputs', () => {
    expect(synthesizeCountryMetadata([[enrollment('   ', '   ')], []], now)).toEqual([]);
    expect(synthesizeCountryMetadata([], now)).toEqual([]);
  });
});
