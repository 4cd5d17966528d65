import type { CleanRecordOf, CountryMetadata, DatasetKind } from '../types.js';

export type EnrollmentRow = {
  id: string;
  country_code: string;
  country_name: string;
  year: number;
  enrollment_rate: number;
  education_level: string;
  gender: string;
  data_source: string;
  extraction_date: string;
  created_at: Date;
};

export type GraduationRow = {
  id: string;
  country_code: string;
  country_name: string;
  year: number;
  graduation_rate: number;
  completion_rate: number;
  education_level: string;
  data_source: string;
  extraction_date: string;
  created_at: Date;
};

export type SpendingRow = {
  id: string;
  country_code: string;
  country_name: string;
  year: number;
  spending_usd: number;
  spending_per_capita: number;
  spending_percent_gdp: number | null;
  currency: string;
  data_source: string;
  extraction_date: string;
  created_at: Date;
};

export type CountryRow = {
  id: string;
  country_code: string;
  country_name: string;
  region: string;
  income_group: string;
  population: number | null;
  gdp_per_capita: number | null;
  data_available: boolean;
  last_updated: string;
  created_at: Date;
};

export type FactRows = {
  enrollment: EnrollmentRow;
  graduation: GraduationRow;
  spending: SpendingRow;
};

export type FactFilter = {
  countryCode?: string;
  fromYear?: number;
  toYear?: number;
  limit: number;
};

export type CountryFilter = {
  region?: string;
  incomeGroup?: string;
};

export type TableStats = Record<string, number>;

export type RunStatus = 'queued' | 'running' | 'completed' | 'failed';

export type RunLogLevel = 'info' | 'warn' | 'error';

export type RunLogEntry = {
  level: RunLogLevel;
  message: string;
  createdAt: Date;
};

export type PipelineRun = {
  id: string;
  status: RunStatus;
  createdAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
  summary: unknown;
  error: string | null;
  reportPath: string | null;
  logs: RunLogEntry[];
};

export type RunUpdate = {
  startedAt?: Date;
  finishedAt?: Date;
  summary?: unknown;
  error?: string | null;
  reportPath?: string | null;
};

/**
 * Persistent side of the pipeline. Fact tables are append-only; the country
 * table is the only one written with insert-or-update semantics.
 */
export interface EducationRepository {
  /** Creates missing tables; existing tables are left untouched. */
  ensureSchema(): Promise<void>;
  /** Inserts by country_code, overwriting every mutable column on conflict. */
  upsertCountries(records: readonly CountryMetadata[]): Promise<number>;
  /** Inserts every record as a new row, without duplicate checks or a wrapping transaction. */
  appendFacts<K extends DatasetKind>(kind: K, records: ReadonlyArray<CleanRecordOf<K>>): Promise<number>;
  listCountries(filter: CountryFilter): Promise<CountryRow[]>;
  listFacts<K extends DatasetKind>(kind: K, filter: FactFilter): Promise<Array<FactRows[K]>>;
  tableStats(): Promise<TableStats>;

  createRun(): Promise<string>;
  updateRun(id: string, status: RunStatus, update?: RunUpdate): Promise<void>;
  appendRunLog(id: string, level: RunLogLevel, message: string): Promise<void>;
  getRun(id: string): Promise<PipelineRun | null>;
  /** Puts runs left running by a stopped process back in the queue and lists every queued run, oldest first. */
  requeueInterruptedRuns(): Promise<string[]>;
}
