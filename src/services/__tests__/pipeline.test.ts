import os from 'node:os';
import path from 'node:path';
import { promises as fsp } from 'node:fs';
import { describe, it, expect, jest } from '@jest/globals';
import { parseConfig } from '../../config';
import { FetchError } from '../../errors';
import type { RunLogger } from '../../logger';
import { MemoryEducationRepository } from '../../repositories/memory';
import type { CleanRecordOf, CountryMetadata, DatasetKind, FlatRecord } from '../../types';
import type { DatasetExtractor } from '../oecd-client';
import { runPipeline } from '../pipeline';

const now = () => new Date('2024-03-01T10:15:00Z');

function configFor(outputDir: string | null) {
  return parseConfig({
    data_sources: { oecd_stats: { url: 'https://sdmx.example.test/data/', pause_ms: 5 } },
    pipeline: { start_year: 2000, end_year: 2023, output_dir: outputDir },
  });
}

const fixtures: Record<DatasetKind, FlatRecord[]> = {
  enrollment: [
    { LOCATION: 'USA', TIME: '2022', value: 95.5 },
    { LOCATION: 'USA', TIME: '1990', value: 90 },
  ],
  graduation: [{ LOCATION: 'FRA', TIME: '2020', value: 85 }],
  spending: [{ LOCATION: 'DEU', TIME: '2020', value: 5000 }],
};

class FixtureExtractor implements DatasetExtractor {
  readonly requested: DatasetKind[] = [];

  constructor(private readonly failOn?: DatasetKind) {}

  async extract(kind: DatasetKind): Promise<FlatRecord[]> {
    this.requested.push(kind);
    if (kind === this.failOn) {
      throw new FetchError('EDU_GRAD', 'HTTP 500 Internal Server Error', 500);
    }
    return fixtures[kind];
  }
}

class RecordingRepository extends MemoryEducationRepository {
  readonly calls: string[] = [];

  async upsertCountries(records: readonly CountryMetadata[]): Promise<number> {
    this.calls.push('upsertCountries');
    return super.upsertCountries(records);
  }

  async appendFacts<K extends DatasetKind>(kind: K, records: ReadonlyArray<CleanRecordOf<K>>): Promise<number> {
    this.calls.push(`appendFacts:${kind}`);
    return super.appendFacts(kind, records);
  }
}

function recordingLogger(): RunLogger & { lines: string[] } {
  const lines: string[] = [];
  const write = async (level: string, message: string) => {
    lines.push(`${level}: ${message}`);
  };
  return {
    lines,
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

describe('runPipeline', () => {
  it('extracts, cleans and loads every dataset with countries first', async () => {
    const config = configFor(null);
    const repository = new RecordingRepository(config.tables, now);
    const extractor = new FixtureExtractor();
    const logger = recordingLogger();
    const pauses: number[] = [];

    const summary = await runPipeline({
      config,
      repository,
      extractor,
      logger,
      now,
      sleep: async (ms) => {
        pauses.push(ms);
      },
    });

    expect(extractor.requested).toEqual(['enrollment', 'graduation', 'spending']);
    expect(pauses).toEqual([5, 5]);
    expect(repository.calls).toEqual([
      'upsertCountries',
      'appendFacts:enrollment',
      'appendFacts:graduation',
      'appendFacts:spending',
    ]);
    expect(summary.datasets.enrollment).toMatchObject({ extracted: 2, cleaned: 1, loaded: 1 });
    expect(summary.datasets.enrollment?.dropped.year).toBe(1);
    expect(summary.countries).toBe(6);
    expect(summary.unkeyedCountries).toBe(3);
    expect(summary.reportPath).toBeNull();
    expect(summary.tableStats).toEqual({
      education_enrollment: 1,
      education_graduation: 1,
      education_spending: 1,
      country_metadata: 4,
    });

    const [stored] = await repository.listFacts('enrollment', { limit: 10 });
    expect(stored).toMatchObject({
      country_code: 'USA',
      country_name: 'United States',
      year: 2022,
      enrollment_rate: 95.5,
      extraction_date: '2024-03-01',
    });
    expect(logger.lines).toContain('info: Cleaned enrollment: 1 kept, 1 dropped');
    expect(logger.lines).toContain(
      'warn: 3 country reference rows were derived from names and carry an empty country_code'
    );
  });

  it('runs only the requested kinds', async () => {
    const config = configFor(null);
    const repository = new RecordingRepository(config.tables, now);
    const extractor = new FixtureExtractor();

    const summary = await runPipeline({
      config,
      repository,
      extractor,
      logger: recordingLogger(),
      kinds: ['spending'],
      now,
      sleep: async () => undefined,
    });

    expect(extractor.requested).toEqual(['spending']);
    expect(Object.keys(summary.datasets)).toEqual(['spending']);
    expect(repository.calls).toEqual(['upsertCountries', 'appendFacts:spending']);
  });

  it('aborts before loading when an extraction fails', async () => {
    const config = configFor(null);
    const repository = new RecordingRepository(config.tables, now);
    const logger = recordingLogger();

    await expect(
      runPipeline({
        config,
        repository,
        extractor: new FixtureExtractor('graduation'),
        logger,
        now,
        sleep: async () => undefined,
      })
    ).rejects.toBeInstanceOf(FetchError);

    expect(repository.calls).toEqual([]);
    expect(logger.lines).toContain(
      'error: Extraction of EDU_GRAD failed: fetching EDU_GRAD failed: HTTP 500 Internal Server Error'
    );
  });

  it('keeps the extraction error when its log line cannot be stored', async () => {
    const config = configFor(null);
    const logger = recordingLogger();
    logger.error = async () => {
      throw new Error('log store unavailable');
    };
    const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    try {
      await expect(
        runPipeline({
          config,
          repository: new RecordingRepository(config.tables, now),
          extractor: new FixtureExtractor('graduation'),
          logger,
          now,
          sleep: async () => undefined,
        })
      ).rejects.toThrow('fetching EDU_GRAD failed: HTTP 500 Internal Server Error');
      expect(consoleError).toHaveBeenCalledWith('[etl] could not record log line: log store unavailable');
    } finally {
      consoleError.mockRestore();
    }
  });

  it('writes raw, processed and reconciliation files when an output directory is set', async () => {
    const outputDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'edu-pipeline-'));
    try {
      const config = configFor(outputDir);
      const summary = await runPipeline({
        config,
        repository: new MemoryEducationRepository(config.tables, now),
        extractor: new FixtureExtractor(),
        logger: recordingLogger(),
        now,
        sleep: async () => undefined,
      });

      expect(summary.reportPath).toBe(path.join(outputDir, 'reconciliation_20240301_101500.csv'));
      expect((await fsp.readdir(path.join(outputDir, 'raw'))).sort()).toEqual([
        'enrollment_20240301_101500.csv',
        'graduation_20240301_101500.csv',
        'metadata_20240301_101500.json',
        'spending_20240301_101500.csv',
      ]);
      expect((await fsp.readdir(path.join(outputDir, 'processed'))).sort()).toEqual([
        'countries_clean_20240301_101500.csv',
        'enrollment_clean_20240301_101500.csv',
        'graduation_clean_20240301_101500.csv',
        'spending_clean_20240301_101500.csv',
      ]);
    } finally {
      await fsp.rm(outputDir, { recursive: true, force: true });
    }
  });
});
