import 'dotenv/config';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { databaseSettingsFromEnv, loadConfig } from '../src/config.js';
import { createDatabase, type Database } from '../src/db.js';
import { describeError } from '../src/errors.js';
import { MemoryEducationRepository } from '../src/repositories/memory.js';
import { PostgresEducationRepository } from '../src/repositories/postgres.js';
import type { EducationRepository } from '../src/repositories/types.js';
import { OecdClient } from '../src/services/oecd-client.js';
import { executeRun } from '../src/services/pipeline-runner.js';
import { DATASET_KINDS, type DatasetKind } from '../src/types.js';

// Usage: tsx scripts/etl.ts [--config config.yaml] [--dry-run] [--kinds enrollment,spending]

function parseKinds(value: string | undefined): DatasetKind[] | undefined {
  if (!value) return undefined;
  return value.split(',').map((entry) => {
    const kind = DATASET_KINDS.find((candidate) => candidate === entry.trim());
    if (!kind) {
      throw new Error(`unknown dataset kind "${entry}" (expected one of ${DATASET_KINDS.join(', ')})`);
    }
    return kind;
  });
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      config: { type: 'string', default: process.env.ETL_CONFIG ?? 'config.yaml' },
      'dry-run': { type: 'boolean', default: false },
      kinds: { type: 'string' },
    },
  });

  const config = loadConfig(path.resolve(values.config ?? 'config.yaml'));
  const kinds = parseKinds(values.kinds);

  let db: Database | null = null;
  let repository: EducationRepository;
  if (values['dry-run']) {
    console.log('[etl] dry run: loading into an in-memory store');
    repository = new MemoryEducationRepository(config.tables);
  } else {
    db = createDatabase(databaseSettingsFromEnv());
    repository = new PostgresEducationRepository(db, config.tables);
  }

  try {
    await repository.ensureSchema();
    const runId = await repository.createRun();
    const summary = await executeRun(runId, { config, repository, extractor: new OecdClient(config) }, kinds);
    console.log('[etl] table statistics');
    for (const [table, count] of Object.entries(summary.tableStats)) {
      console.log(`[etl]   ${table}: ${count}`);
    }
  } finally {
    await db?.close();
  }
}

main().catch((error: unknown) => {
  console.error(`[etl] pipeline failed: ${describeError(error)}`);
  process.exitCode = 1;
});
