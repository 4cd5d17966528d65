import { Router } from 'express';
import { z } from 'zod';
import { notFound } from '../errors.js';
import type { EducationRepository } from '../repositories/types.js';
import { DATASET_KINDS } from '../types.js';
import { asyncHandler } from '../utils/async-handler.js';

const kindSchema = z.enum(DATASET_KINDS);

const listQuerySchema = z.object({
  country: z
    .string()
    .trim()
    .length(3)
    .transform((value) => value.toUpperCase())
    .optional(),
  from: z.coerce.number().int().optional(),
  to: z.coerce.number().int().optional(),
  limit: z.coerce.number().int().min(1).max(5000).optional(),
});

export function createFactsRouter(repository: EducationRepository): Router {
  const router = Router();

  // A filter that matches nothing answers with an empty list, never 404.
  router.get(
    '/:kind',
    asyncHandler(async (req) => {
      const kind = kindSchema.safeParse(req.params.kind);
      if (!kind.success) {
        throw notFound(`unknown dataset ${req.params.kind}`);
      }
      const { country, from, to, limit = 500 } = listQuerySchema.parse(req.query);
      return repository.listFacts(kind.data, {
        countryCode: country,
        fromYear: from,
        toYear: to,
        limit,
      });
    })
  );

  return router;
}
