import { Router } from 'express';
import type { EducationRepository } from '../repositories/types.js';
import { asyncHandler } from '../utils/async-handler.js';

export function createStatsRouter(repository: EducationRepository): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async () => repository.tableStats())
  );

  return router;
}
