import { describe, it, expect } from '@jest/globals';
import type { QueryResult, QueryResultRow } from 'pg';
import type { Queryable } from '../../db';
import { StoreError } from '../../errors';
import type { CountryMetadata, GraduationRecord } from '../../types';
import { PostgresEducationRepository } from '../postgres';

const tables = {
  enrollment: 'education_enrollment',
  graduation: 'education_graduation',
  spending: 'education_spending',
  countries: 'country_metadata',
};

type RecordedQuery = { text: string; params?: unknown[] };

class RecordingDb implements Queryable {
  readonly queries: RecordedQuery[] = [];

  constructor(private readonly failOn?: RegExp) {}

  async query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
    this.queries.push({ text: text.replace(/\s+/g, ' ').trim(), params });
    if (this.failOn?.test(text)) {
      throw new Error('duplicate key value violates unique constraint');
    }
    return { command: 'SELECT', rowCount: 0, oid: 0, fields: [], rows: [] };
  }
}

const germany: CountryMetadata = {
  countryCode: 'DEU',
  countryName: 'DEU',
  region: 'Europe',
  incomeGroup: 'High Income',
  population: null,
  gdpPerCapita: null,
  dataAvailable: true,
  lastUpdated: '2024-01-01',
};

function graduation(year: number): GraduationRecord {
  return {
    kind: 'graduation',
    countryCode: 'DEU',
    countryName: 'Germany',
    year,
    graduationRate: 80,
    completionRate: 0.8,
    educationLevel: null,
    dataSource: 'OECD',
    extractionDate: '2024-01-01',
  };
}

describe('PostgresEducationRepository', () => {
  it('upserts countries on the country_code key', async () => {
    const db = new RecordingDb();
    const repository = new PostgresEducationRepository(db, tables);

    await expect(repository.upsertCountries([germany])).resolves.toBe(1);

    expect(db.queries).toHaveLength(1);
    expect(db.queries[0].text).toContain('insert into country_metadata (country_code, country_name,');
    expect(db.queries[0].text).toContain('on conflict (country_code) do update set country_name = excluded.country_name');
    expect(db.queries[0].params).toEqual(['DEU', 'DEU', 'Europe', 'High Income', null, null, true, '2024-01-01']);
  });

  it('appends one insert per fact row without a transaction', async () => {
    const db = new RecordingDb();
    const repository = new PostgresEducationRepository(db, tables);

    await expect(repository.appendFacts('graduation', [graduation(2019), graduation(2020)])).resolves.toBe(2);

    expect(db.queries.map((query) => query.text)).toEqual([
      'insert into education_graduation (country_code, country_name, year, graduation_rate, completion_rate, education_level, data_source, extraction_date) values ($1, $2, $3, $4, $5, $6, $7, $8)',
      'insert into education_graduation (country_code, country_name, year, graduation_rate, completion_rate, education_level, data_source, extraction_date) values ($1, $2, $3, $4, $5, $6, $7, $8)',
    ]);
    expect(db.queries[1].params).toEqual(['DEU', 'Germany', 2020, 80, 0.8, 'All Levels', 'OECD', '2024-01-01']);
  });

  it('wraps driver errors in StoreError naming the operation', async () => {
    const db = new RecordingDb(/insert into education_graduation/);
    const repository = new PostgresEducationRepository(db, tables);

    const error = await repository.appendFacts('graduation', [graduation(2019)]).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(StoreError);
    expect(error).toMatchObject({
      code: 'store_failed',
      operation: 'append education_graduation',
      message: 'append education_graduation failed: duplicate key value violates unique constraint',
    });
  });

  it('creates every table with create-if-not-exists statements', async () => {
    const db = new RecordingDb();
    await new PostgresEducationRepository(db, tables).ensureSchema();

    const creates = db.queries.filter((query) => query.text.startsWith('create table'));
    expect(creates.map((query) => query.text.split(' (')[0])).toEqual([
      'create table if not exists country_metadata',
      'create table if not exists education_enrollment',
      'create table if not exists education_graduation',
      'create table if not exists education_spending',
      'create table if not exists pipeline_run',
      'create table if not exists pipeline_run_log',
    ]);
  });

  it('counts rows in every configured table', async () => {
    const db = new RecordingDb();
    const stats = await new PostgresEducationRepository(db, tables).tableStats();

    expect(stats).toEqual({
      education_enrollment: 0,
      education_graduation: 0,
      education_spending: 0,
      country_metadata: 0,
    });
    expect(db.queries[0].text).toBe('select count(*)::int as count from education_enrollment');
  });

  it('builds fact queries from the filter', async () => {
    const db = new RecordingDb();
    await new PostgresEducationRepository(db, tables).listFacts('spending', {
      countryCode: 'DEU',
      toYear: 2020,
      limit: 50,
    });

    expect(db.queries[0].text).toContain('from education_spending where country_code = $1 and year <= $2');
    expect(db.queries[0].text).toContain('limit $3');
    expect(db.queries[0].params).toEqual(['DEU', 2020, 50]);
  });
});
