import { Router } from 'express';
import { z } from 'zod';
import type { EducationRepository } from '../repositories/types.js';
import { asyncHandler } from '../utils/async-handler.js';

const listQuerySchema = z.object({
  region: z.string().trim().min(1).optional(),
  income_group: z.string().trim().min(1).optional(),
});

export function createCountriesRouter(repository: EducationRepository): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req) => {
      const { region, income_group: incomeGroup } = listQuerySchema.parse(req.query);
      return repository.listCountries({ region, incomeGroup });
    })
  );

  return router;
}
