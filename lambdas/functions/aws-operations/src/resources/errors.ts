import { isAxiosError } from 'axios';

export type ErrorClassification = 'timeout' | 'not_found' | 'already_exists' | 'failure';

/**
 * Raised when a cooperative deadline expires before the guarded work finished.
 */
export class OperationTimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs} ms`);
    this.name = 'OperationTimeoutError';
  }
}

/**
 * Raised for an invocation event that cannot be processed. Escapes every category boundary.
 */
export class EventValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EventValidationError';
  }
}

const NOT_FOUND_ERROR_NAMES = ['NotFound', 'NoSuchBucket', 'NoSuchKey', 'ResourceNotFoundException'];
const ALREADY_EXISTS_ERROR_NAMES = ['BucketAlreadyOwnedByYou', 'ResourceInUseException'];
const TIMEOUT_ERROR_CODES = ['ECONNABORTED', 'ETIMEDOUT'];

export function errorName(error: unknown): string {
  if (error instanceof Error) {
    return error.name;
  }
  return typeof error;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function httpStatusCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && '$metadata' in error) {
    const metadata = error.$metadata;
    if (typeof metadata === 'object' && metadata !== null && 'httpStatusCode' in metadata) {
      return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
    }
  }
  return undefined;
}

export function isNotFoundError(error: unknown): boolean {
  return NOT_FOUND_ERROR_NAMES.includes(errorName(error)) || httpStatusCode(error) === 404;
}

export function isAlreadyExistsError(error: unknown): boolean {
  return ALREADY_EXISTS_ERROR_NAMES.includes(errorName(error));
}

export function isTimeoutError(error: unknown): boolean {
  if (error instanceof OperationTimeoutError) {
    return true;
  }
  if (isAxiosError(error)) {
    return error.code !== undefined && TIMEOUT_ERROR_CODES.includes(error.code);
  }
  return errorName(error) === 'TimeoutError';
}

export function classifyError(error: unknown): ErrorClassification {
  if (isTimeoutError(error)) {
    return 'timeout';
  }
  if (isAlreadyExistsError(error)) {
    return 'already_exists';
  }
  if (isNotFoundError(error)) {
    return 'not_found';
  }
  return 'failure';
}
