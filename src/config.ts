import { readFileSync } from 'node:fs';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';
import type { DatasetKind, YearWindow } from './types.js';

const identifier = z
  .string()
  .regex(/^[a-z_][a-z0-9_]*$/, 'must be a lower-case SQL identifier');

const queryParams = z.record(z.union([z.string(), z.number()]).transform(String)).default({});

const configSchema = z
  .object({
    data_sources: z.object({
      oecd_stats: z.object({
        url: z.string().url(),
        timeout_ms: z.number().int().positive().default(30_000),
        pause_ms: z.number().int().nonnegative().default(1_000),
        datasets: z
          .object({
            enrollment: z.string().min(1).default('EDU_ENRL'),
            graduation: z.string().min(1).default('EDU_GRAD'),
            spending: z.string().min(1).default('EDU_FIN'),
          })
          .default({}),
        params: z
          .object({
            enrollment: queryParams,
            graduation: queryParams,
            spending: queryParams,
          })
          .default({}),
      }),
    }),
    database: z
      .object({
        tables: z
          .object({
            enrollment: identifier.default('education_enrollment'),
            graduation: identifier.default('education_graduation'),
            spending: identifier.default('education_spending'),
            countries: identifier.default('country_metadata'),
          })
          .default({}),
      })
      .default({}),
    pipeline: z
      .object({
        start_year: z.number().int().default(2000),
        end_year: z.number().int().default(2023),
        output_dir: z.string().min(1).nullable().default('data'),
      })
      .default({}),
  })
  .refine((config) => config.pipeline.start_year <= config.pipeline.end_year, {
    message: 'start_year must not be after end_year',
    path: ['pipeline', 'start_year'],
  });

export type TableNames = Readonly<Record<DatasetKind | 'countries', string>>;

export type SourceConfig = Readonly<{
  baseUrl: string;
  timeoutMs: number;
  pauseMs: number;
  datasets: Readonly<Record<DatasetKind, string>>;
  params: Readonly<Record<DatasetKind, Readonly<Record<string, string>>>>;
}>;

export type PipelineConfig = Readonly<{
  source: SourceConfig;
  tables: TableNames;
  yearWindow: Readonly<YearWindow>;
  outputDir: string | null;
}>;

export function parseConfig(document: unknown): PipelineConfig {
  const parsed = configSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const { data_sources: sources, database, pipeline } = parsed.data;
  const oecd = sources.oecd_stats;
  return {
    source: {
      baseUrl: oecd.url,
      timeoutMs: oecd.timeout_ms,
      pauseMs: oecd.pause_ms,
      datasets: oecd.datasets,
      params: oecd.params,
    },
    tables: database.tables,
    yearWindow: { start: pipeline.start_year, end: pipeline.end_year },
    outputDir: pipeline.output_dir,
  };
}

export function loadConfig(configPath: string): PipelineConfig {
  let document: unknown;
  try {
    document = parse(readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigError([`cannot read ${configPath}: ${describeError(error)}`]);
  }
  return parseConfig(document);
}

export type DatabaseSettings = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
};

export function databaseSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): DatabaseSettings {
  return {
    host: env.POSTGRES_HOST || 'localhost',
    port: parseInt(env.POSTGRES_PORT || '5432', 10),
    user: env.POSTGRES_USER || 'edu',
    password: env.POSTGRES_PASSWORD || 'edupass',
    database: env.POSTGRES_DB || 'edudb',
  };
}
