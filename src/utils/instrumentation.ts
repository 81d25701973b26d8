import type { Logger } from 'winston';

/**
 * Runs `fn` and logs how long it took. Failures are logged with their duration
 * and rethrown unchanged.
 */
export async function timed<T>(logger: Logger, label: string, fn: () => T | Promise<T>): Promise<T> {
  const startedAt = Date.now();
  logger.info(`Starting: ${label}`);

  try {
    const result = await fn();
    logger.info(`Completed: ${label}`, { executionTimeSeconds: (Date.now() - startedAt) / 1000 });
    return result;
  } catch (error) {
    logger.error(`Failed: ${label}`, {
      executionTimeSeconds: (Date.now() - startedAt) / 1000,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}
