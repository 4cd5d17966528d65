import os from 'node:os';
import path from 'node:path';
import { promises as fsp } from 'node:fs';
import { afterEach, beforeEach, describe, it, expect } from '@jest/globals';
import { formatStamp, toCsv, writeRawArtifacts, writeReconciliationReport } from '../artifacts';

describe('formatStamp', () => {
  it('formats UTC time as YYYYMMDD_HHMMSS', () => {
    expect(formatStamp(new Date('2024-02-03T04:05:06Z'))).toBe('20240203_040506');
  });
});

describe('toCsv', () => {
  it('unions headers and quotes cells that need it', () => {
    const csv = toCsv([
      { name: 'Korea, Republic of', value: 1 },
      { name: 'say "hi"', extra: null },
    ]);

    expect(csv.split(os.EOL)).toEqual(['name,value,extra', '"Korea, Republic of",1,', '"say ""hi""",,']);
  });

  it('writes an empty document for no rows', () => {
    expect(toCsv([])).toBe('');
  });
});

describe('artifact files', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'edu-artifacts-'));
  });

  afterEach(async () => {
    await fsp.rm(outputDir, { recursive: true, force: true });
  });

  it('writes raw csv files and an extraction manifest', async () => {
    const written = await writeRawArtifacts(outputDir, '20240101_000000', new Date('2024-01-01T00:00:00Z'), {
      enrollment: [{ LOCATION: 'USA', value: 1 }],
      spending: [],
    });

    expect(written.map((file) => path.relative(outputDir, file))).toEqual([
      path.join('raw', 'enrollment_20240101_000000.csv'),
      path.join('raw', 'spending_20240101_000000.csv'),
      path.join('raw', 'metadata_20240101_000000.json'),
    ]);
    const manifest: unknown = JSON.parse(await fsp.readFile(written[2], 'utf8'));
    expect(manifest).toEqual({
      extraction_time: '2024-01-01T00:00:00.000Z',
      datasets_extracted: ['enrollment', 'spending'],
      total_records: 1,
    });
  });

  it('writes a reconciliation report with per-kind and per-table rows', async () => {
    const reportPath = await writeReconciliationReport(
      outputDir,
      '20240101_000000',
      { enrollment: { extracted: 3, cleaned: 2, loaded: 2 } },
      4,
      { education_enrollment: 2, country_metadata: 4 }
    );

    expect(reportPath).toBe(path.join(outputDir, 'reconciliation_20240101_000000.csv'));
    const lines = (await fsp.readFile(reportPath, 'utf8')).split(os.EOL);
    expect(lines).toEqual([
      'metric,extracted,cleaned,loaded',
      'enrollment,3,2,2',
      'countries,,,4',
      'table:education_enrollment,,,2',
      'table:country_metadata,,,4',
    ]);
  });
});
