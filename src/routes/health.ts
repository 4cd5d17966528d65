import { Router } from 'express';
import type { EducationRepository } from '../repositories/types.js';
import { asyncHandler } from '../utils/async-handler.js';

export function createHealthRouter(repository: EducationRepository): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async () => {
      const stats = await repository.tableStats();
      return { status: 'ok', time: new Date().toISOString(), tables: Object.keys(stats).length };
    })
  );

  return router;
}
