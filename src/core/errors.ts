import { ErrorCategory } from '../types/pipeline';

/**
 * Base class for failures that stop a pipeline run. The category is recorded
 * in the run log next to the message.
 */
export class PipelineError extends Error {
  readonly category: ErrorCategory;

  constructor(message: string, category: ErrorCategory, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.category = category;
  }
}

export class ExtractionError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'extraction', options);
    this.name = 'ExtractionError';
  }
}

export class TransformError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'transform', options);
    this.name = 'TransformError';
  }
}

export class PersistenceError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'persistence', options);
    this.name = 'PersistenceError';
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'config', options);
    this.name = 'ConfigError';
  }
}

export function categorizeError(error: unknown): ErrorCategory {
  return error instanceof PipelineError ? error.category : 'unknown';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
