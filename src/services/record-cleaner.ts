import { resolveCountry, type ResolvedCountry } from './country-resolver.js';
import type {
  CleanRecord,
  CleanResult,
  DatasetKind,
  DropCounts,
  DropReason,
  EnrollmentRecord,
  FlatRecord,
  GraduationRecord,
  SpendingRecord,
  YearWindow,
} from '../types.js';

export const DATA_SOURCE = 'OECD';

const INDICATOR_MARKERS: Record<DatasetKind, string> = {
  enrollment: 'ENRL',
  graduation: 'GRAD',
  spending: 'FIN',
};

export const ENROLLMENT_RANGE = { min: 0, max: 200 } as const;
export const GRADUATION_RANGE = { min: 0, max: 120 } as const;
export const SPENDING_PERCENTILES = { low: 0.01, high: 0.99 } as const;

const COLUMN_SYNONYMS = new Map<string, string>([
  ['time_period', 'year'],
  ['ref_area', 'country'],
  ['obs_value', 'value'],
  ['location', 'country_code'],
]);

// Plain decimal notation only; hex, binary and octal literals are not measures.
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const LOCATION_COLUMNS = ['country_code', 'country'];
const YEAR_COLUMNS = ['year', 'time'];
const GENDER_COLUMNS = ['sex', 'gender'];

export type CleanOptions = {
  yearWindow: YearWindow;
  now?: () => Date;
};

type NormalizedRow = Map<string, string | number>;

type PreparedRow = {
  country: ResolvedCountry;
  year: number;
  value: number;
  educationLevel: string | null;
  gender: string | null;
};

export function normalizeColumnName(name: string): string {
  const normalized = name
    .toLowerCase()
    .trim()
    .replace(/[^\p{L}\p{N}_]/gu, '_')
    .replace(/_+/g, '_');
  return COLUMN_SYNONYMS.get(normalized) ?? normalized;
}

export function emptyDropCounts(): DropCounts {
  return { missing_dimension: 0, indicator: 0, country: 0, year: 0, value: 0, range: 0 };
}

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function normalizeRow(record: FlatRecord): NormalizedRow {
  const row: NormalizedRow = new Map();
  for (const [column, value] of Object.entries(record)) {
    row.set(normalizeColumnName(column), value);
  }
  return row;
}

function firstPresent(row: NormalizedRow, columns: readonly string[]): string | number | undefined {
  for (const column of columns) {
    const value = row.get(column);
    if (value !== undefined) return value;
  }
  return undefined;
}

function parseNumber(value: string | number): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  const trimmed = value.trim();
  if (!DECIMAL.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function parseYear(value: string | number): number | null {
  const parsed = parseNumber(value);
  if (parsed === null || !Number.isInteger(parsed)) return null;
  return parsed;
}

function optionalText(value: string | number | undefined): string | null {
  if (value === undefined) return null;
  const text = String(value).trim();
  return text.length ? text : null;
}

/**
 * Shared first half of every cleaner: column normalization, indicator
 * filter, country resolution, year and value coercion. Rejected rows are
 * counted, never thrown.
 */
function prepareRows(
  raw: readonly FlatRecord[],
  kind: DatasetKind,
  yearWindow: YearWindow,
  dropped: DropCounts
): PreparedRow[] {
  const rows = raw.map(normalizeRow);
  const filterByIndicator = rows.some((row) => row.has('indicator'));
  const marker = INDICATOR_MARKERS[kind];
  const prepared: PreparedRow[] = [];

  const drop = (reason: DropReason) => {
    dropped[reason] += 1;
  };

  for (const row of rows) {
    if (filterByIndicator) {
      const indicator = row.get('indicator');
      if (indicator === undefined || !String(indicator).includes(marker)) {
        drop('indicator');
        continue;
      }
    }

    const location = firstPresent(row, LOCATION_COLUMNS);
    const rawYear = firstPresent(row, YEAR_COLUMNS);
    const rawValue = row.get('value');
    if (location === undefined || rawYear === undefined || rawValue === undefined) {
      drop('missing_dimension');
      continue;
    }

    const country = resolveCountry(String(location));
    if (!country.code.length) {
      drop('country');
      continue;
    }

    const year = parseYear(rawYear);
    if (year === null || year < yearWindow.start || year > yearWindow.end) {
      drop('year');
      continue;
    }

    const value = parseNumber(rawValue);
    if (value === null) {
      drop('value');
      continue;
    }

    prepared.push({
      country,
      year,
      value,
      educationLevel: optionalText(row.get('education_level')),
      gender: optionalText(firstPresent(row, GENDER_COLUMNS)),
    });
  }

  return prepared;
}

function withinRange(value: number, range: { min: number; max: number }): boolean {
  return value >= range.min && value <= range.max;
}

/** Linear interpolation between closest ranks, over an ascending array. */
export function quantile(sortedValues: readonly number[], q: number): number {
  if (!sortedValues.length) {
    return Number.NaN;
  }
  const position = (sortedValues.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const lowerValue = sortedValues[lower];
  return lowerValue + (sortedValues[upper] - lowerValue) * (position - lower);
}

export function cleanEnrollmentBatch(raw: readonly FlatRecord[], options: CleanOptions): CleanResult<EnrollmentRecord> {
  const dropped = emptyDropCounts();
  const extractionDate = formatDate((options.now ?? (() => new Date()))());
  const records: EnrollmentRecord[] = [];

  for (const row of prepareRows(raw, 'enrollment', options.yearWindow, dropped)) {
    if (!withinRange(row.value, ENROLLMENT_RANGE)) {
      dropped.range += 1;
      continue;
    }
    records.push({
      kind: 'enrollment',
      countryCode: row.country.code,
      countryName: row.country.name,
      year: row.year,
      enrollmentRate: row.value,
      educationLevel: row.educationLevel,
      gender: row.gender,
      dataSource: DATA_SOURCE,
      extractionDate,
    });
  }

  return { records, dropped };
}

export function cleanGraduationBatch(raw: readonly FlatRecord[], options: CleanOptions): CleanResult<GraduationRecord> {
  const dropped = emptyDropCounts();
  const extractionDate = formatDate((options.now ?? (() => new Date()))());
  const records: GraduationRecord[] = [];

  for (const row of prepareRows(raw, 'graduation', options.yearWindow, dropped)) {
    if (!withinRange(row.value, GRADUATION_RANGE)) {
      dropped.range += 1;
      continue;
    }
    records.push({
      kind: 'graduation',
      countryCode: row.country.code,
      countryName: row.country.name,
      year: row.year,
      graduationRate: row.value,
      completionRate: row.value / 100,
      educationLevel: row.educationLevel,
      dataSource: DATA_SOURCE,
      extractionDate,
    });
  }

  return { records, dropped };
}

/**
 * The accepted band is the batch's own 1st..99th percentile, so the same
 * value can survive in one batch and be trimmed in another.
 */
export function cleanSpendingBatch(raw: readonly FlatRecord[], options: CleanOptions): CleanResult<SpendingRecord> {
  const dropped = emptyDropCounts();
  const extractionDate = formatDate((options.now ?? (() => new Date()))());
  const prepared = prepareRows(raw, 'spending', options.yearWindow, dropped);

  const sorted = prepared.map((row) => row.value).sort((a, b) => a - b);
  const low = quantile(sorted, SPENDING_PERCENTILES.low);
  const high = quantile(sorted, SPENDING_PERCENTILES.high);

  const records: SpendingRecord[] = [];
  for (const row of prepared) {
    if (!withinRange(row.value, { min: low, max: high })) {
      dropped.range += 1;
      continue;
    }
    records.push({
      kind: 'spending',
      countryCode: row.country.code,
      countryName: row.country.name,
      year: row.year,
      spendingUsd: row.value,
      spendingPerCapita: row.value,
      currency: 'USD',
      dataSource: DATA_SOURCE,
      extractionDate,
    });
  }

  return { records, dropped };
}

export function cleanEnrollment(raw: readonly FlatRecord[], options: CleanOptions): EnrollmentRecord[] {
  return cleanEnrollmentBatch(raw, options).records;
}

export function cleanGraduation(raw: readonly FlatRecord[], options: CleanOptions): GraduationRecord[] {
  return cleanGraduationBatch(raw, options).records;
}

export function cleanSpending(raw: readonly FlatRecord[], options: CleanOptions): SpendingRecord[] {
  return cleanSpendingBatch(raw, options).records;
}

export function cleanDataset(
  kind: DatasetKind,
  raw: readonly FlatRecord[],
  options: CleanOptions
): CleanResult<CleanRecord> {
  switch (kind) {
    case 'enrollment':
      return cleanEnrollmentBatch(raw, options);
    case 'graduation':
      return cleanGraduationBatch(raw, options);
    case 'spending':
      return cleanSpendingBatch(raw, options);
  }
}
