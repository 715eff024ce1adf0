import { addExecutionTag, createChildLogger } from '@lambda-tracing-demo/aws-powertools-util';

import { ErrorClassification, classifyError, errorMessage, errorName } from '../resources/errors';

const logger = createChildLogger('operation');

export type OperationStatus = 'success' | 'failure' | 'skipped';

export interface OperationErrorDetail {
  type: string;
  message: string;
  classification: ErrorClassification;
}

/**
 * Outcome of one data-access attempt. Frozen once finalized.
 */
export interface OperationRecord {
  readonly operationKind: string;
  readonly resourceName: string;
  readonly status: OperationStatus;
  readonly errorDetail?: OperationErrorDetail;
  readonly reason?: string;
  /** Start of the attempt, ISO 8601. */
  readonly timestamp: string;
  readonly durationMs: number;
}

export type OperationSink = (record: OperationRecord) => void;

export const logOperationRecord: OperationSink = (record) => {
  addExecutionTag('last_operation', record.operationKind);
  addExecutionTag('last_operation_status', record.status);

  if (record.status === 'failure') {
    logger.error(`${record.operationKind} on ${record.resourceName} failed`, { operation: record });
  } else {
    logger.info(`${record.operationKind} on ${record.resourceName} ${record.status}`, { operation: record });
  }
};

export function composeSinks(...sinks: OperationSink[]): OperationSink {
  return (record) => sinks.forEach((sink) => sink(record));
}

/**
 * Sink that logs every record and keeps it for the workflow result.
 */
export function createOperationLog(): { sink: OperationSink; records: OperationRecord[] } {
  const records: OperationRecord[] = [];
  return {
    records,
    sink: composeSinks(logOperationRecord, (record) => records.push(record)),
  };
}

function finalize(record: OperationRecord, sink: OperationSink): OperationRecord {
  const finalized = Object.freeze(record);
  sink(finalized);
  return finalized;
}

/**
 * Run one external call and emit its record. Errors are recorded and re-thrown unchanged.
 */
export async function executeOperation<T>(
  operationKind: string,
  resourceName: string,
  operation: () => Promise<T>,
  sink: OperationSink = logOperationRecord,
): Promise<T> {
  const startedAt = Date.now();
  const timestamp = new Date(startedAt).toISOString();
  logger.debug(`${operationKind} on ${resourceName} started`, { operationKind, resourceName, timestamp });

  let result: T;
  try {
    result = await operation();
  } catch (error) {
    finalize(
      {
        operationKind,
        resourceName,
        status: 'failure',
        errorDetail: { type: errorName(error), message: errorMessage(error), classification: classifyError(error) },
        timestamp,
        durationMs: Date.now() - startedAt,
      },
      sink,
    );
    throw error;
  }

  finalize({ operationKind, resourceName, status: 'success', timestamp, durationMs: Date.now() - startedAt }, sink);
  return result;
}

export function recordSkippedOperation(
  operationKind: string,
  resourceName: string,
  reason: string,
  sink: OperationSink = logOperationRecord,
): OperationRecord {
  return finalize(
    { operationKind, resourceName, status: 'skipped', reason, timestamp: new Date().toISOString(), durationMs: 0 },
    sink,
  );
}
