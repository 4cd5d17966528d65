import { z } from 'zod';
import type { PipelineConfig } from '../config.js';
import { DecodeError, FetchError, describeError } from '../errors.js';
import { decode } from './dimension-decoder.js';
import type { DatasetKind, Dimension, FlatRecord } from '../types.js';

export type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;

export interface DatasetExtractor {
  extract(kind: DatasetKind): Promise<FlatRecord[]>;
}

const DEFAULT_PARAMS = {
  dimensionAtObservation: 'AllDimensions',
  detail: 'dataonly',
} as const;

const dimensionSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  values: z
    .array(
      z.object({
        id: z.string().optional(),
        name: z.string().optional(),
      })
    )
    .default([]),
});

const payloadSchema = z.object({
  dataSets: z
    .array(
      z.object({
        observations: z.record(z.array(z.union([z.number(), z.string()]).nullable())).default({}),
      })
    )
    .default([]),
  structure: z
    .object({
      dimensions: z
        .object({
          observation: z.array(dimensionSchema).default([]),
        })
        .default({}),
    })
    .default({}),
});

type DimensionPayload = z.infer<typeof dimensionSchema>;

function toDimension(dimension: DimensionPayload, position: number): Dimension {
  return {
    name: dimension.name ?? dimension.id ?? `dim_${position}`,
    values: dimension.values.map((value) => ({ name: value.name ?? '' })),
  };
}

/**
 * One best-effort request per dataset against the SDMX-JSON endpoint. Network
 * failures and non-2xx answers surface as FetchError; nothing is retried.
 */
export class OecdClient implements DatasetExtractor {
  constructor(
    private readonly config: PipelineConfig,
    private readonly fetchImpl: FetchImpl = fetch
  ) {}

  buildUrl(kind: DatasetKind): string {
    const { source, yearWindow } = this.config;
    const params = new URLSearchParams({
      ...DEFAULT_PARAMS,
      startPeriod: String(yearWindow.start),
      endPeriod: String(yearWindow.end),
      ...source.params[kind],
    });
    return `${source.baseUrl}${source.datasets[kind]}?${params.toString()}`;
  }

  async extract(kind: DatasetKind): Promise<FlatRecord[]> {
    const dataset = this.config.source.datasets[kind];
    const url = this.buildUrl(kind);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { accept: 'application/json' },
        signal: AbortSignal.timeout(this.config.source.timeoutMs),
      });
    } catch (error) {
      throw new FetchError(dataset, describeError(error), null, error);
    }

    if (!response.ok) {
      throw new FetchError(dataset, `HTTP ${response.status} ${response.statusText}`.trim(), response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new FetchError(dataset, `response is not JSON: ${describeError(error)}`, response.status, error);
    }

    const parsed = payloadSchema.safeParse(body);
    if (!parsed.success) {
      throw new DecodeError('(payload)', parsed.error.issues.map((issue) => issue.message).join('; '));
    }

    const observations = parsed.data.dataSets[0]?.observations ?? {};
    const dimensions = parsed.data.structure.dimensions.observation.map(toDimension);
    return decode(observations, dimensions);
  }
}
