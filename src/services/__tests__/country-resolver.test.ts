import { describe, it, expect } from '@jest/globals';
import {
  DEFAULT_INCOME_GROUP,
  DEFAULT_REGION,
  lookupCountryName,
  lookupIncomeGroup,
  lookupRegion,
  resolveCountry,
} from '../country-resolver';

describe('resolveCountry', () => {
  it('resolves a known code', () => {
    expect(resolveCountry('DEU')).toEqual({
      code: 'DEU',
      name: 'Germany',
      region: 'Europe',
      incomeGroup: 'High Income',
    });
  });

  it('falls back to the raw token for unknown codes', () => {
    expect(resolveCountry(' ZZZ ')).toEqual({
      code: 'ZZZ',
      name: 'ZZZ',
      region: DEFAULT_REGION,
      incomeGroup: DEFAULT_INCOME_GROUP,
    });
  });

  it('truncates long tokens for the code but looks up the full token', () => {
    expect(resolveCountry('OECD')).toEqual({
      code: 'OEC',
      name: 'OECD Average',
      region: 'Other',
      incomeGroup: 'High Income',
    });
  });
});

describe('lookups', () => {
  it('keeps region and income tables independent of the name table', () => {
    expect(lookupCountryName('ITA')).toBe('ITA');
    expect(lookupRegion('ITA')).toBe('Europe');
    expect(lookupIncomeGroup('ITA')).toBe('Not Specified');
    expect(lookupCountryName('EU')).toBe('European Union');
    expect(lookupRegion('EU')).toBe('Other');
  });
});
