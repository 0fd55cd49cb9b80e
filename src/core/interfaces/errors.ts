import { PageRequest } from './common.types';

/**
 * Storage could not complete an operation (connection lost, driver error,
 * timeout). Callers should surface it as a retryable server-side failure.
 */
export class StorageUnavailableError extends Error {
  readonly retryable = true;

  constructor(
    message: string,
    public readonly operation: string,
    public cause?: unknown,
  ) {
    super(message);
    this.name = 'StorageUnavailableError';
  }
}

/**
 * Page parameters outside the accepted bounds
 */
export class InvalidPageError extends RangeError {
  constructor(
    message: string,
    public readonly page: Partial<PageRequest>,
  ) {
    super(message);
    this.name = 'InvalidPageError';
  }
}
