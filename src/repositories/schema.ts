import type { TableNames } from '../config.js';

export const RUN_TABLE = 'pipeline_run';
export const RUN_LOG_TABLE = 'pipeline_run_log';

/**
 * DDL for every table the pipeline writes. Statements only ever create what
 * is missing; columns of an existing table are never altered.
 */
export function schemaStatements(tables: TableNames): string[] {
  return [
    `create extension if not exists pgcrypto`,
    `
    create table if not exists ${tables.countries} (
      id bigserial primary key,
      country_code varchar(3) not null unique,
      country_name text not null unique,
      region varchar(50) not null,
      income_group varchar(50) not null,
      population integer,
      gdp_per_capita double precision,
      data_available boolean not null default true,
      last_updated date not null,
      created_at timestamptz not null default now()
    )
  `,
    `
    create table if not exists ${tables.enrollment} (
      id bigserial primary key,
      country_code varchar(3) not null,
      country_name text not null,
      year integer not null,
      enrollment_rate double precision,
      education_level text,
      gender text,
      data_source varchar(50) not null,
      extraction_date date not null,
      created_at timestamptz not null default now()
    )
  `,
    `
    create table if not exists ${tables.graduation} (
      id bigserial primary key,
      country_code varchar(3) not null,
      country_name text not null,
      year integer not null,
      graduation_rate double precision,
      completion_rate double precision,
      education_level text,
      data_source varchar(50) not null,
      extraction_date date not null,
      created_at timestamptz not null default now()
    )
  `,
    `
    create table if not exists ${tables.spending} (
      id bigserial primary key,
      country_code varchar(3) not null,
      country_name text not null,
      year integer not null,
      spending_usd double precision,
      spending_per_capita double precision,
      spending_percent_gdp double precision,
      currency varchar(3) not null default 'USD',
      data_source varchar(50) not null,
      extraction_date date not null,
      created_at timestamptz not null default now()
    )
  `,
    `
    create table if not exists ${RUN_TABLE} (
      id uuid primary key default gen_random_uuid(),
      status text not null default 'queued',
      created_at timestamptz not null default now(),
      started_at timestamptz,
      finished_at timestamptz,
      summary jsonb,
      report_path text,
      error_message text
    )
  `,
    `
    create table if not exists ${RUN_LOG_TABLE} (
      id bigserial primary key,
      run_id uuid not null references ${RUN_TABLE}(id) on delete cascade,
      level text not null default 'info',
      message text not null,
      created_at timestamptz not null default now()
    )
  `,
    `create index if not exists idx_${RUN_TABLE}_status on ${RUN_TABLE}(status)`,
    `create index if not exists idx_${RUN_LOG_TABLE}_run on ${RUN_LOG_TABLE}(run_id, created_at)`,
  ];
}
