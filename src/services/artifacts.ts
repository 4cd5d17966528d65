import path from 'node:path';
import os from 'node:os';
import { promises as fsp } from 'node:fs';
import type { CleanRecord, CountryMetadata, DatasetKind, FlatRecord } from '../types.js';
import type { TableStats } from '../repositories/types.js';

export type KindCounts = {
  extracted: number;
  cleaned: number;
  loaded: number;
};

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYYMMDD_HHMMSS` in UTC. */
export function formatStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

function csvCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  const text = value instanceof Date ? value.toISOString() : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Header is the union of keys in first-seen order; missing cells stay empty. */
export function toCsv(rows: ReadonlyArray<Record<string, unknown>>): string {
  const columns: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!columns.includes(key)) columns.push(key);
    }
  }
  const lines = [columns.map(csvCell).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => csvCell(row[column])).join(','));
  }
  return lines.join(os.EOL);
}

export async function writeRawArtifacts(
  outputDir: string,
  stamp: string,
  extractedAt: Date,
  datasets: Partial<Record<DatasetKind, FlatRecord[]>>
): Promise<string[]> {
  const rawDir = path.join(outputDir, 'raw');
  await fsp.mkdir(rawDir, { recursive: true });

  const written: string[] = [];
  let total = 0;
  for (const [kind, records] of Object.entries(datasets)) {
    if (!records) continue;
    const file = path.join(rawDir, `${kind}_${stamp}.csv`);
    await fsp.writeFile(file, toCsv(records), 'utf8');
    written.push(file);
    total += records.length;
  }

  const metadataFile = path.join(rawDir, `metadata_${stamp}.json`);
  const metadata = {
    extraction_time: extractedAt.toISOString(),
    datasets_extracted: Object.keys(datasets),
    total_records: total,
  };
  await fsp.writeFile(metadataFile, JSON.stringify(metadata, null, 2), 'utf8');
  written.push(metadataFile);
  return written;
}

export async function writeCleanArtifacts(
  outputDir: string,
  stamp: string,
  datasets: Partial<Record<DatasetKind, CleanRecord[]>>,
  countries: readonly CountryMetadata[]
): Promise<string[]> {
  const processedDir = path.join(outputDir, 'processed');
  await fsp.mkdir(processedDir, { recursive: true });

  const written: string[] = [];
  const files: Array<[string, ReadonlyArray<Record<string, unknown>>]> = [];
  for (const [kind, records] of Object.entries(datasets)) {
    if (records) files.push([kind, records]);
  }
  files.push(['countries', countries]);

  for (const [name, records] of files) {
    const file = path.join(processedDir, `${name}_clean_${stamp}.csv`);
    await fsp.writeFile(file, toCsv(records), 'utf8');
    written.push(file);
  }
  return written;
}

export async function writeReconciliationReport(
  outputDir: string,
  stamp: string,
  counts: Partial<Record<DatasetKind, KindCounts>>,
  countriesUpserted: number,
  stats: TableStats
): Promise<string> {
  await fsp.mkdir(outputDir, { recursive: true });
  const reportPath = path.join(outputDir, `reconciliation_${stamp}.csv`);
  const rows: Array<Record<string, unknown>> = [];
  for (const [kind, kindCounts] of Object.entries(counts)) {
    if (!kindCounts) continue;
    rows.push({
      metric: kind,
      extracted: kindCounts.extracted,
      cleaned: kindCounts.cleaned,
      loaded: kindCounts.loaded,
    });
  }
  rows.push({ metric: 'countries', extracted: '', cleaned: '', loaded: countriesUpserted });
  for (const [table, count] of Object.entries(stats)) {
    rows.push({ metric: `table:${table}`, extracted: '', cleaned: '', loaded: count });
  }
  await fsp.writeFile(reportPath, toCsv(rows), 'utf8');
  return reportPath;
}
