import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { HttpError, PipelineError } from '../errors.js';

const UNIQUE_VIOLATION = '23505';

function postgresCode(error: unknown): string | null {
  const source = error instanceof PipelineError ? error.cause : error;
  if (typeof source === 'object' && source !== null && 'code' in source && typeof source.code === 'string') {
    return source.code;
  }
  return null;
}

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof ZodError) {
    return res.status(400).json({
      message: 'validation_failed',
      issues: err.issues,
    });
  }

  if (err instanceof HttpError) {
    return res.status(err.statusCode).json({
      message: err.message,
      details: err.details,
    });
  }

  if (postgresCode(err) === UNIQUE_VIOLATION) {
    return res.status(409).json({
      message: 'conflict',
    });
  }

  if (err instanceof PipelineError) {
    return res.status(500).json({
      message: err.message,
      code: err.code,
    });
  }

  if (err instanceof Error) {
    return res.status(500).json({
      message: err.message,
    });
  }

  return res.status(500).json({
    message: 'internal_error',
  });
};
