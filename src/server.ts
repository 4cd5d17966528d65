import 'dotenv/config';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { parse } from 'yaml';
import { createApp } from './app.js';
import { databaseSettingsFromEnv, loadConfig } from './config.js';
import { createDatabase } from './db.js';
import { describeError } from './errors.js';
import { PostgresEducationRepository } from './repositories/postgres.js';
import { OecdClient } from './services/oecd-client.js';
import { PipelineRunner } from './services/pipeline-runner.js';

async function main(): Promise<void> {
  const config = loadConfig(path.resolve(process.env.ETL_CONFIG ?? 'config.yaml'));
  const openApiDocument: Record<string, unknown> = parse(
    readFileSync(path.resolve(process.cwd(), 'openapi/openapi.yaml'), 'utf8')
  );

  const db = createDatabase(databaseSettingsFromEnv());
  const repository = new PostgresEducationRepository(db, config.tables);
  const runner = new PipelineRunner({ config, repository, extractor: new OecdClient(config) });
  await runner.initialize();

  const app = createApp({ repository, runner, openApiDocument });
  const port = Number(process.env.API_PORT || 8080);
  app.listen(port, () => {
    console.log(`[api] up on :${port}`);
  });
}

main().catch((error: unknown) => {
  console.error(`[api] failed to start: ${describeError(error)}`);
  process.exitCode = 1;
});
