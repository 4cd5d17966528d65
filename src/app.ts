import express, { type Express } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { errorHandler } from './middleware/error-handler.js';
import type { EducationRepository } from './repositories/types.js';
import { createCountriesRouter } from './routes/countries.js';
import { createFactsRouter } from './routes/facts.js';
import { createHealthRouter } from './routes/health.js';
import { createPipelineRunsRouter } from './routes/pipeline-runs.js';
import { createStatsRouter } from './routes/stats.js';
import type { PipelineRunner } from './services/pipeline-runner.js';

export type AppDeps = {
  repository: EducationRepository;
  runner: PipelineRunner;
  openApiDocument: Record<string, unknown>;
};

export function createApp({ repository, runner, openApiDocument }: AppDeps): Express {
  const app = express();
  app.set('trust proxy', true);
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  app.use(morgan('combined'));

  app.use('/api/v1/health', createHealthRouter(repository));

  app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
  app.get('/api/v1/openapi.json', (_req, res) => {
    res.json(openApiDocument);
  });

  app.use('/api/v1/countries', createCountriesRouter(repository));
  app.use('/api/v1/facts', createFactsRouter(repository));
  app.use('/api/v1/stats', createStatsRouter(repository));
  app.use('/api/v1/pipeline/runs', createPipelineRunsRouter(runner));

  app.use(errorHandler);

  return app;
}
