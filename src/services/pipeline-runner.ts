import type { PipelineConfig } from '../config.js';
import { describeError } from '../errors.js';
import { createRunLogger, logFailure } from '../logger.js';
import type { EducationRepository, PipelineRun } from '../repositories/types.js';
import type { DatasetKind } from '../types.js';
import type { DatasetExtractor } from './oecd-client.js';
import { runPipeline, type PipelineSummary } from './pipeline.js';

export type RunnerDeps = {
  config: PipelineConfig;
  repository: EducationRepository;
  extractor: DatasetExtractor;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

type QueuedRun = {
  id: string;
  kinds?: readonly DatasetKind[];
};

/**
 * Executes an already created run and records its outcome. The pipeline's
 * error is rethrown unchanged, even when recording the failure itself fails.
 */
export async function executeRun(
  runId: string,
  deps: RunnerDeps,
  kinds?: readonly DatasetKind[]
): Promise<PipelineSummary> {
  const { repository } = deps;
  const now = deps.now ?? (() => new Date());
  const logger = createRunLogger(repository, runId);

  await repository.updateRun(runId, 'running', { startedAt: now() });
  await logger.info('Pipeline run started');

  try {
    const summary = await runPipeline({ ...deps, logger, kinds, now });
    await repository.updateRun(runId, 'completed', {
      finishedAt: now(),
      summary,
      reportPath: summary.reportPath,
      error: null,
    });
    await logger.info('Pipeline run completed successfully');
    return summary;
  } catch (error) {
    const message = describeError(error);
    await logFailure(logger, message);
    try {
      await repository.updateRun(runId, 'failed', { finishedAt: now(), error: message });
    } catch (updateError) {
      console.error(`[etl] could not mark run ${runId} failed: ${describeError(updateError)}`);
    }
    throw error;
  }
}

/**
 * Process-local queue; runs execute one after another, never concurrently.
 * Runs from separate processes against the same store are not coordinated.
 */
export class PipelineRunner {
  private readonly queue: QueuedRun[] = [];
  private active: Promise<void> | null = null;
  private initialized = false;

  constructor(private readonly deps: RunnerDeps) {}

  async initialize(): Promise<void> {
    if (this.initialized) return;
    this.initialized = true;
    await this.deps.repository.ensureSchema();
    const pending = await this.deps.repository.requeueInterruptedRuns();
    for (const id of pending) {
      this.queue.push({ id });
    }
    this.kick();
  }

  async enqueue(kinds?: readonly DatasetKind[]): Promise<string> {
    const id = await this.deps.repository.createRun();
    this.queue.push({ id, kinds });
    this.kick();
    return id;
  }

  async getRun(id: string): Promise<PipelineRun | null> {
    return this.deps.repository.getRun(id);
  }

  /** Resolves once every queued run has finished. */
  async drain(): Promise<void> {
    while (this.active) {
      await this.active;
    }
  }

  private kick(): void {
    if (this.active || !this.queue.length) return;
    this.active = this.processQueue()
      .catch((error: unknown) => {
        console.error(`[etl] run queue stopped: ${describeError(error)}`);
      })
      .finally(() => {
        this.active = null;
        this.kick();
      });
  }

  private async processQueue(): Promise<void> {
    while (this.queue.length) {
      const next = this.queue.shift();
      if (!next) continue;
      try {
        await executeRun(next.id, this.deps, next.kinds);
      } catch (error) {
        console.error(`[etl] run ${next.id} failed: ${describeError(error)}`);
      }
    }
  }
}
