import { setTimeout as delay } from 'node:timers/promises';
import type { PipelineConfig } from '../config.js';
import { describeError } from '../errors.js';
import { logFailure, type RunLogger } from '../logger.js';
import type { EducationRepository, TableStats } from '../repositories/types.js';
import { DATASET_KINDS } from '../types.js';
import type { CleanRecord, DatasetKind, DropCounts, FlatRecord } from '../types.js';
import {
  formatStamp,
  writeCleanArtifacts,
  writeRawArtifacts,
  writeReconciliationReport,
  type KindCounts,
} from './artifacts.js';
import { countUnkeyedCountries, synthesizeCountryMetadata } from './metadata-synthesizer.js';
import type { DatasetExtractor } from './oecd-client.js';
import { cleanDataset } from './record-cleaner.js';

export type PipelineDeps = {
  config: PipelineConfig;
  repository: EducationRepository;
  extractor: DatasetExtractor;
  logger: RunLogger;
  kinds?: readonly DatasetKind[];
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

export type KindSummary = KindCounts & {
  dropped: DropCounts;
};

export type PipelineSummary = {
  datasets: Partial<Record<DatasetKind, KindSummary>>;
  countries: number;
  unkeyedCountries: number;
  tableStats: TableStats;
  reportPath: string | null;
};

function totalDropped(dropped: DropCounts): number {
  return Object.values(dropped).reduce((sum, count) => sum + count, 0);
}

/**
 * One sequential run: extract every dataset, clean, derive the country
 * reference rows, then load. Countries are upserted before any fact row is
 * appended. Any stage error aborts the run and is rethrown unchanged; rows
 * already written stay written.
 */
export async function runPipeline(deps: PipelineDeps): Promise<PipelineSummary> {
  const { config, repository, extractor, logger } = deps;
  const kinds = deps.kinds ?? DATASET_KINDS;
  const now = deps.now ?? (() => new Date());
  const sleep = deps.sleep ?? ((ms: number) => delay(ms));
  const startedAt = now();
  const stamp = formatStamp(startedAt);

  const raw: Partial<Record<DatasetKind, FlatRecord[]>> = {};
  for (const [index, kind] of kinds.entries()) {
    if (index > 0 && config.source.pauseMs > 0) {
      await sleep(config.source.pauseMs);
    }
    const dataset = config.source.datasets[kind];
    await logger.info(`Fetching ${kind} dataset ${dataset}`);
    try {
      raw[kind] = await extractor.extract(kind);
    } catch (error) {
      await logFailure(logger, `Extraction of ${dataset} failed: ${describeError(error)}`);
      throw error;
    }
    await logger.info(`Decoded ${raw[kind]?.length ?? 0} ${kind} observations`);
  }

  if (config.outputDir) {
    await writeRawArtifacts(config.outputDir, stamp, startedAt, raw);
  }

  const cleaned: Partial<Record<DatasetKind, CleanRecord[]>> = {};
  const datasets: Partial<Record<DatasetKind, KindSummary>> = {};
  for (const kind of kinds) {
    const input = raw[kind] ?? [];
    const result = cleanDataset(kind, input, { yearWindow: config.yearWindow, now });
    cleaned[kind] = result.records;
    datasets[kind] = { extracted: input.length, cleaned: result.records.length, loaded: 0, dropped: result.dropped };
    const dropped = totalDropped(result.dropped);
    await logger.info(`Cleaned ${kind}: ${result.records.length} kept, ${dropped} dropped`);
  }

  const countries = synthesizeCountryMetadata(
    kinds.map((kind) => cleaned[kind] ?? []),
    now
  );
  const unkeyedCountries = countUnkeyedCountries(countries);
  await logger.info(`Derived ${countries.length} country reference rows`);
  if (unkeyedCountries > 0) {
    await logger.warn(
      `${unkeyedCountries} country reference rows were derived from names and carry an empty country_code`
    );
  }

  if (config.outputDir) {
    await writeCleanArtifacts(config.outputDir, stamp, cleaned, countries);
  }

  await logger.info('Ensuring database schema');
  await repository.ensureSchema();

  await logger.info(`Upserting ${countries.length} rows into ${config.tables.countries}`);
  const upserted = await repository.upsertCountries(countries);

  for (const kind of kinds) {
    const records = cleaned[kind] ?? [];
    await logger.info(`Appending ${records.length} rows to ${config.tables[kind]}`);
    const loaded = await repository.appendFacts(kind, records);
    const summary = datasets[kind];
    if (summary) summary.loaded = loaded;
  }

  const tableStats = await repository.tableStats();
  let reportPath: string | null = null;
  if (config.outputDir) {
    reportPath = await writeReconciliationReport(config.outputDir, stamp, datasets, upserted, tableStats);
    await logger.info(`Reconciliation report written to ${reportPath}`);
  }

  return { datasets, countries: upserted, unkeyedCountries, tableStats, reportPath };
}
