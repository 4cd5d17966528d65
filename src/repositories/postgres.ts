import type { QueryResult, QueryResultRow } from 'pg';
import type { TableNames } from '../config.js';
import type { Queryable } from '../db.js';
import { StoreError } from '../errors.js';
import type { CleanRecord, CleanRecordOf, CountryMetadata, DatasetKind } from '../types.js';
import { toCountryRow, toEnrollmentRow, toGraduationRow, toSpendingRow } from './rows.js';
import { RUN_LOG_TABLE, RUN_TABLE, schemaStatements } from './schema.js';
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

const FACT_SELECT: Record<DatasetKind, string> = {
  enrollment:
    'id, country_code, country_name, year, enrollment_rate, education_level, gender, data_source, extraction_date::text as extraction_date, created_at',
  graduation:
    'id, country_code, country_name, year, graduation_rate, completion_rate, education_level, data_source, extraction_date::text as extraction_date, created_at',
  spending:
    'id, country_code, country_name, year, spending_usd, spending_per_capita, spending_percent_gdp, currency, data_source, extraction_date::text as extraction_date, created_at',
};

const COUNTRY_SELECT =
  'id, country_code, country_name, region, income_group, population, gdp_per_capita, data_available, last_updated::text as last_updated, created_at';

type RunRecord = {
  id: string;
  status: RunStatus;
  created_at: Date;
  started_at: Date | null;
  finished_at: Date | null;
  summary: unknown;
  error_message: string | null;
  report_path: string | null;
};

type RunLogRecord = {
  level: RunLogLevel;
  message: string;
  created_at: Date;
};

function factRow(record: CleanRecord): Record<string, unknown> {
  switch (record.kind) {
    case 'enrollment':
      return toEnrollmentRow(record);
    case 'graduation':
      return toGraduationRow(record);
    case 'spending':
      return toSpendingRow(record);
  }
}

function insertStatement(table: string, row: Record<string, unknown>): { text: string; values: unknown[] } {
  const columns = Object.keys(row);
  const placeholders = columns.map((_, index) => `$${index + 1}`).join(', ');
  return {
    text: `insert into ${table} (${columns.join(', ')}) values (${placeholders})`,
    values: Object.values(row),
  };
}

export class PostgresEducationRepository implements EducationRepository {
  constructor(
    private readonly db: Queryable,
    private readonly tables: TableNames
  ) {}

  private async execute<T extends QueryResultRow = QueryResultRow>(
    operation: string,
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<T>> {
    try {
      return await this.db.query<T>(text, params);
    } catch (error) {
      throw new StoreError(operation, error);
    }
  }

  async ensureSchema(): Promise<void> {
    for (const statement of schemaStatements(this.tables)) {
      await this.execute('ensure schema', statement);
    }
  }

  async upsertCountries(records: readonly CountryMetadata[]): Promise<number> {
    const table = this.tables.countries;
    for (const record of records) {
      const row = toCountryRow(record);
      await this.execute(
        `upsert ${table}`,
        `insert into ${table} (country_code, country_name, region, income_group, population, gdp_per_capita, data_available, last_updated)
         values ($1, $2, $3, $4, $5, $6, $7, $8)
         on conflict (country_code) do update set
           country_name = excluded.country_name,
           region = excluded.region,
           income_group = excluded.income_group,
           population = excluded.population,
           gdp_per_capita = excluded.gdp_per_capita,
           data_available = excluded.data_available,
           last_updated = excluded.last_updated`,
        [
          row.country_code,
          row.country_name,
          row.region,
          row.income_group,
          row.population,
          row.gdp_per_capita,
          row.data_available,
          row.last_updated,
        ]
      );
    }
    return records.length;
  }

  async appendFacts<K extends DatasetKind>(kind: K, records: ReadonlyArray<CleanRecordOf<K>>): Promise<number> {
    const table = this.tables[kind];
    let written = 0;
    for (const record of records) {
      const { text, values } = insertStatement(table, factRow(record));
      await this.execute(`append ${table}`, text, values);
      written += 1;
    }
    return written;
  }

  async listCountries(filter: CountryFilter): Promise<CountryRow[]> {
    const params: unknown[] = [];
    const conditions: string[] = [];
    if (filter.region) {
      params.push(filter.region);
      conditions.push(`region = $${params.length}`);
    }
    if (filter.incomeGroup) {
      params.push(filter.incomeGroup);
      conditions.push(`income_group = $${params.length}`);
    }
    const whereClause = conditions.length ? `where ${conditions.join(' and ')}` : '';

    const { rows } = await this.execute<CountryRow>(
      'list countries',
      `select ${COUNTRY_SELECT}
       from ${this.tables.countries}
       ${whereClause}
       order by country_name asc`,
      params
    );
    return rows;
  }

  async listFacts<K extends DatasetKind>(kind: K, filter: FactFilter): Promise<Array<FactRows[K]>> {
    const params: unknown[] = [];
    const conditions: string[] = [];
    if (filter.countryCode) {
      params.push(filter.countryCode);
      conditions.push(`country_code = $${params.length}`);
    }
    if (filter.fromYear !== undefined) {
      params.push(filter.fromYear);
      conditions.push(`year >= $${params.length}`);
    }
    if (filter.toYear !== undefined) {
      params.push(filter.toYear);
      conditions.push(`year <= $${params.length}`);
    }
    const whereClause = conditions.length ? `where ${conditions.join(' and ')}` : '';
    params.push(filter.limit);

    const { rows } = await this.execute<FactRows[K]>(
      `list ${kind}`,
      `select ${FACT_SELECT[kind]}
       from ${this.tables[kind]}
       ${whereClause}
       order by country_code asc, year asc, id asc
       limit $${params.length}`,
      params
    );
    return rows;
  }

  async tableStats(): Promise<TableStats> {
    const stats: TableStats = {};
    for (const table of Object.values(this.tables)) {
      const { rows } = await this.execute<{ count: number }>(
        'table stats',
        `select count(*)::int as count from ${table}`
      );
      stats[table] = rows[0]?.count ?? 0;
    }
    return stats;
  }

  async createRun(): Promise<string> {
    const { rows } = await this.execute<{ id: string }>(
      'create run',
      `insert into ${RUN_TABLE} (status) values ('queued') returning id`
    );
    return rows[0].id;
  }

  async updateRun(id: string, status: RunStatus, update: RunUpdate = {}): Promise<void> {
    const fields: Array<[string, unknown]> = [];
    if (update.startedAt !== undefined) fields.push(['started_at', update.startedAt]);
    if (update.finishedAt !== undefined) fields.push(['finished_at', update.finishedAt]);
    if (update.summary !== undefined) fields.push(['summary', JSON.stringify(update.summary)]);
    if (update.error !== undefined) fields.push(['error_message', update.error]);
    if (update.reportPath !== undefined) fields.push(['report_path', update.reportPath]);

    const sets = ['status = $2'];
    const values: unknown[] = [id, status];
    fields.forEach(([column, value], index) => {
      sets.push(`${column} = $${index + 3}`);
      values.push(value);
    });
    await this.execute('update run', `update ${RUN_TABLE} set ${sets.join(', ')} where id = $1`, values);
  }

  async appendRunLog(id: string, level: RunLogLevel, message: string): Promise<void> {
    await this.execute(
      'append run log',
      `insert into ${RUN_LOG_TABLE} (run_id, level, message) values ($1, $2, $3)`,
      [id, level, message]
    );
  }

  async getRun(id: string): Promise<PipelineRun | null> {
    const { rows } = await this.execute<RunRecord>(
      'get run',
      `select id, status, created_at, started_at, finished_at, summary, error_message, report_path
       from ${RUN_TABLE} where id = $1`,
      [id]
    );
    const record = rows[0];
    if (!record) return null;

    const logRows = await this.execute<RunLogRecord>(
      'get run logs',
      `select level, message, created_at from ${RUN_LOG_TABLE} where run_id = $1 order by id`,
      [id]
    );

    return {
      id: record.id,
      status: record.status,
      createdAt: record.created_at,
      startedAt: record.started_at,
      finishedAt: record.finished_at,
      summary: record.summary,
      error: record.error_message,
      reportPath: record.report_path,
      logs: logRows.rows.map((log) => ({
        level: log.level,
        message: log.message,
        createdAt: log.created_at,
      })),
    };
  }

  async requeueInterruptedRuns(): Promise<string[]> {
    await this.execute(
      'requeue runs',
      `update ${RUN_TABLE} set status = 'queued', started_at = null where status = 'running'`
    );
    const { rows } = await this.execute<{ id: string }>(
      'list queued runs',
      `select id from ${RUN_TABLE} where status = 'queued' order by created_at`
    );
    return rows.map((row) => row.id);
  }
}
