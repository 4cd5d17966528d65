import { randomUUID } from 'node:crypto';
import type { TableNames } from '../config.js';
import { StoreError } from '../errors.js';
import type { CleanRecord, CleanRecordOf, CountryMetadata, DatasetKind } from '../types.js';
import { toCountryRow, toEnrollmentRow, toGraduationRow, toSpendingRow } from './rows.js';
import type {
  CountryFilter,
  CountryRow,
  EducationRepository,
  FactFilter,
  FactRows,
  PipelineRun,
  RunLogLevel,
  RunStatus,
  RunUpdate,
  TableStats,
} from './types.js';

type FactTables = { [K in DatasetKind]: Array<FactRows[K]> };

/**
 * Process-local stand-in for the Postgres repository, used by `--dry-run`
 * and the tests. Mirrors the unique keys of the country table so upsert and
 * conflict behaviour match.
 */
export class MemoryEducationRepository implements EducationRepository {
  private schemaReady = false;
  private nextId = 1;
  private readonly facts: FactTables = { enrollment: [], graduation: [], spending: [] };
  private readonly countries = new Map<string, CountryRow>();
  private readonly runs = new Map<string, PipelineRun>();

  constructor(
    private readonly tables: TableNames,
    private readonly clock: () => Date = () => new Date()
  ) {}

  private generateId(): string {
    const id = String(this.nextId);
    this.nextId += 1;
    return id;
  }

  private requireSchema(operation: string): void {
    if (!this.schemaReady) {
      throw new StoreError(operation, new Error('schema has not been created'));
    }
  }

  async ensureSchema(): Promise<void> {
    this.schemaReady = true;
  }

  async upsertCountries(records: readonly CountryMetadata[]): Promise<number> {
    const operation = `upsert ${this.tables.countries}`;
    this.requireSchema(operation);
    for (const record of records) {
      const row = toCountryRow(record);
      for (const existing of this.countries.values()) {
        if (existing.country_name === row.country_name && existing.country_code !== row.country_code) {
          throw new StoreError(
            operation,
            new Error(`duplicate key value violates unique constraint on country_name (${row.country_name})`)
          );
        }
      }
      const current = this.countries.get(row.country_code);
      if (current) {
        this.countries.set(row.country_code, { ...current, ...row });
      } else {
        this.countries.set(row.country_code, { id: this.generateId(), ...row, created_at: this.clock() });
      }
    }
    return records.length;
  }

  async appendFacts<K extends DatasetKind>(kind: K, records: ReadonlyArray<CleanRecordOf<K>>): Promise<number> {
    this.requireSchema(`append ${this.tables[kind]}`);
    for (const item of records) {
      const record: CleanRecord = item;
      const generated = { id: this.generateId(), created_at: this.clock() };
      switch (record.kind) {
        case 'enrollment':
          this.facts.enrollment.push({ ...generated, ...toEnrollmentRow(record) });
          break;
        case 'graduation':
          this.facts.graduation.push({ ...generated, ...toGraduationRow(record) });
          break;
        case 'spending':
          this.facts.spending.push({ ...generated, ...toSpendingRow(record) });
          break;
      }
    }
    return records.length;
  }

  async listCountries(filter: CountryFilter): Promise<CountryRow[]> {
    return [...this.countries.values()]
      .filter((row) => !filter.region || row.region === filter.region)
      .filter((row) => !filter.incomeGroup || row.income_group === filter.incomeGroup)
      .sort((a, b) => (a.country_name < b.country_name ? -1 : a.country_name > b.country_name ? 1 : 0));
  }

  async listFacts<K extends DatasetKind>(kind: K, filter: FactFilter): Promise<Array<FactRows[K]>> {
    const rows: Array<FactRows[K]> = this.facts[kind];
    return rows
      .filter((row) => !filter.countryCode || row.country_code === filter.countryCode)
      .filter((row) => filter.fromYear === undefined || row.year >= filter.fromYear)
      .filter((row) => filter.toYear === undefined || row.year <= filter.toYear)
      .sort(
        (a, b) =>
          a.country_code.localeCompare(b.country_code) || a.year - b.year || Number(a.id) - Number(b.id)
      )
      .slice(0, filter.limit);
  }

  async tableStats(): Promise<TableStats> {
    return {
      [this.tables.enrollment]: this.facts.enrollment.length,
      [this.tables.graduation]: this.facts.graduation.length,
      [this.tables.spending]: this.facts.spending.length,
      [this.tables.countries]: this.countries.size,
    };
  }

  async createRun(): Promise<string> {
    const id = randomUUID();
    this.runs.set(id, {
      id,
      status: 'queued',
      createdAt: this.clock(),
      startedAt: null,
      finishedAt: null,
      summary: null,
      error: null,
      reportPath: null,
      logs: [],
    });
    return id;
  }

  private requireRun(id: string, operation: string): PipelineRun {
    const run = this.runs.get(id);
    if (!run) {
      throw new StoreError(operation, new Error(`run ${id} does not exist`));
    }
    return run;
  }

  async updateRun(id: string, status: RunStatus, update: RunUpdate = {}): Promise<void> {
    const run = this.requireRun(id, 'update run');
    run.status = status;
    if (update.startedAt !== undefined) run.startedAt = update.startedAt;
    if (update.finishedAt !== undefined) run.finishedAt = update.finishedAt;
    if (update.summary !== undefined) run.summary = update.summary;
    if (update.error !== undefined) run.error = update.error;
    if (update.reportPath !== undefined) run.reportPath = update.reportPath;
  }

  async appendRunLog(id: string, level: RunLogLevel, message: string): Promise<void> {
    this.requireRun(id, 'append run log').logs.push({ level, message, createdAt: this.clock() });
  }

  async getRun(id: string): Promise<PipelineRun | null> {
    const run = this.runs.get(id);
    if (!run) return null;
    return { ...run, logs: [...run.logs] };
  }

  async requeueInterruptedRuns(): Promise<string[]> {
    const queued: PipelineRun[] = [];
    for (const run of this.runs.values()) {
      if (run.status === 'running') {
        run.status = 'queued';
        run.startedAt = null;
      }
      if (run.status === 'queued') queued.push(run);
    }
    return queued.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime()).map((run) => run.id);
  }
}
