import { Router } from 'express';
import { z } from 'zod';
import { notFound } from '../errors.js';
import type { PipelineRunner } from '../services/pipeline-runner.js';
import { DATASET_KINDS } from '../types.js';
import { asyncHandler } from '../utils/async-handler.js';

const createRunSchema = z
  .object({
    kinds: z.array(z.enum(DATASET_KINDS)).min(1).optional(),
  })
  .default({});

const runParamsSchema = z.object({
  id: z.string().uuid(),
});

export function createPipelineRunsRouter(runner: PipelineRunner): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const { kinds } = createRunSchema.parse(req.body ?? {});
      const id = await runner.enqueue(kinds);
      res.status(202);
      return { id, status: 'queued' };
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req) => {
      const { id } = runParamsSchema.parse(req.params);
      const run = await runner.getRun(id);
      if (!run) {
        throw notFound('pipeline run not found');
      }
      return run;
    })
  );

  return router;
}
