export const DATASET_KINDS = ['enrollment', 'graduation', 'spending'] as const;

export type DatasetKind = (typeof DATASET_KINDS)[number];

export type DimensionValue = {
  name: string;
};

export type Dimension = {
  name: string;
  values: DimensionValue[];
};

// Keys are colon-joined dimension indices, e.g. "0:3:1".
export type ObservationMap = Record<string, Array<number | string | null>>;

export type FlatRecord = Record<string, string | number>;

export type EnrollmentRecord = {
  kind: 'enrollment';
  countryCode: string;
  countryName: string;
  year: number;
  enrollmentRate: number;
  educationLevel: string | null;
  gender: string | null;
  dataSource: string;
  extractionDate: string;
};

export type GraduationRecord = {
  kind: 'graduation';
  countryCode: string;
  countryName: string;
  year: number;
  graduationRate: number;
  completionRate: number;
  educationLevel: string | null;
  dataSource: string;
  extractionDate: string;
};

export type SpendingRecord = {
  kind: 'spending';
  countryCode: string;
  countryName: string;
  year: number;
  spendingUsd: number;
  // Equal to spendingUsd until population figures are ingested.
  spendingPerCapita: number;
  currency: 'USD';
  dataSource: string;
  extractionDate: string;
};

export type CleanRecord = EnrollmentRecord | GraduationRecord | SpendingRecord;

export type CleanRecordOf<K extends DatasetKind> = Extract<CleanRecord, { kind: K }>;

export type CountryMetadata = {
  countryCode: string;
  countryName: string;
  region: string;
  incomeGroup: string;
  population: number | null;
  gdpPerCapita: number | null;
  dataAvailable: boolean;
  lastUpdated: string;
};

export type DropReason = 'missing_dimension' | 'indicator' | 'country' | 'year' | 'value' | 'range';

export type DropCounts = Record<DropReason, number>;

export type CleanResult<T extends CleanRecord> = {
  records: T[];
  dropped: DropCounts;
};

export type YearWindow = {
  start: number;
  end: number;
};
