import { describeError } from './errors.js';
import type { EducationRepository, RunLogLevel } from './repositories/types.js';

export type RunLogger = {
  info(message: string): Promise<void>;
  warn(message: string): Promise<void>;
  error(message: string): Promise<void>;
};

const CONSOLE: Record<RunLogLevel, (line: string) => void> = {
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/** Writes each line to the console and to the run's log table. */
export function createRunLogger(repository: EducationRepository, runId: string, scope = 'etl'): RunLogger {
  const write = async (level: RunLogLevel, message: string) => {
    CONSOLE[level](`[${scope}] ${message}`);
    await repository.appendRunLog(runId, level, message);
  };

  return {
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

/**
 * Error path variant of `logger.error`: a failing log store is reported on
 * the console and never replaces the error being recorded.
 */
export async function logFailure(logger: RunLogger, message: string): Promise<void> {
  try {
    await logger.error(message);
  } catch (logError) {
    console.error(`[etl] could not record log line: ${describeError(logError)}`);
  }
}
