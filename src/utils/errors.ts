/**
 * Error types shared by the stores, collaborators and stages
 */

export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid configuration detected at start-up */
export class ConfigurationError extends PipelineError {}

/** A metadata or blob store read/write failed */
export class StoreError extends PipelineError {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(`${operation}: ${message}`, options);
    this.operation = operation;
  }
}

/** The language model call failed or returned nothing usable */
export class SummarizationError extends PipelineError {}

/** Downloading an article page failed */
export class ContentFetchError extends PipelineError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

/** Distribution transport rejected the message */
export class TransportError extends PipelineError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
