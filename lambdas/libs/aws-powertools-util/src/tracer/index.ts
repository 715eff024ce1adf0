import { Tracer } from '@aws-lambda-powertools/tracer';
import { captureLambdaHandler } from '@aws-lambda-powertools/tracer/middleware';

import { createChildLogger } from '../logger';

const logger = createChildLogger('tracer');

const tracer = new Tracer({
  serviceName: process.env.SERVICE_NAME || 'aws-operations',
});

export const EXECUTION_TAG_MAX_VALUE_LENGTH = 70;

export type ExecutionTagValue = string | number | boolean;

function getTracedAWSV3Client<T>(client: T): T {
  return tracer.captureAWSv3Client(client);
}

/**
 * Error recorded on the active trace without being thrown. The error type is carried
 * in `name` so it shows up as the exception type on the segment.
 */
class ProgrammaticError extends Error {
  constructor(
    public readonly errorType: string,
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = errorType;
  }
}

/**
 * Attach a searchable key/value annotation to the current trace segment.
 *
 * Annotation keys only allow alphanumerics and underscores, other characters are replaced
 * by an underscore. String values are cut at {@link EXECUTION_TAG_MAX_VALUE_LENGTH}.
 *
 * @returns the key and value as they were recorded.
 */
function addExecutionTag(key: string, value: ExecutionTagValue): { key: string; value: ExecutionTagValue } {
  const tagKey = key.replace(/[^A-Za-z0-9_]/g, '_');
  const tagValue = typeof value === 'string' ? value.slice(0, EXECUTION_TAG_MAX_VALUE_LENGTH) : value;

  tracer.putAnnotation(tagKey, tagValue);
  logger.debug(`Added execution tag: ${tagKey} = ${tagValue}`);

  return { key: tagKey, value: tagValue };
}

export type ProgrammaticErrorEntry = { type: string; message: string } & Record<string, unknown>;

const programmaticErrors: ProgrammaticErrorEntry[] = [];

/**
 * Forget the errors of the previous invocation. Call once at the start of every invocation.
 */
function resetProgrammaticErrors(): void {
  programmaticErrors.length = 0;
}

function getProgrammaticErrors(): readonly ProgrammaticErrorEntry[] {
  return [...programmaticErrors];
}

/**
 * Record an error on the active trace without throwing it. Every error of the invocation is
 * kept in the `errors` metadata list, so concurrent failures do not overwrite each other.
 */
function addProgrammaticError(
  errorType: string,
  message: string,
  details: Record<string, unknown> = {},
): ProgrammaticError {
  const error = new ProgrammaticError(errorType, message, details);

  programmaticErrors.push({ ...details, type: errorType, message });
  tracer.addErrorAsMetadata(error);
  tracer.putMetadata('errors', getProgrammaticErrors());
  logger.error(`Added programmatic error: ${errorType} - ${message}`, { details });

  return error;
}

export {
  tracer,
  captureLambdaHandler,
  getTracedAWSV3Client,
  addExecutionTag,
  addProgrammaticError,
  getProgrammaticErrors,
  resetProgrammaticErrors,
  ProgrammaticError,
};
