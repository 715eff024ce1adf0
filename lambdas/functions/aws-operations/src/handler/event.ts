import { addExecutionTag } from '@lambda-tracing-demo/aws-powertools-util';

import { EventValidationError } from '../resources/errors';

export const OPERATION_CATEGORIES = ['api_operations', 's3_operations', 'database_operations', 'rds_operations'] as const;

export type OperationCategory = (typeof OPERATION_CATEGORIES)[number];

export interface OperationsEvent {
  data?: string;
  /** Categories to run, every category defaults to enabled. */
  actions: Record<OperationCategory, boolean>;
  action?: 'delete_table';
  test?: string | number | boolean;
  source?: string;
  timestamp?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOperationCategory(value: string): value is OperationCategory {
  return OPERATION_CATEGORIES.some((category) => category === value);
}

function parseActions(actions: unknown): Record<OperationCategory, boolean> {
  const parsed: Record<OperationCategory, boolean> = {
    api_operations: true,
    s3_operations: true,
    database_operations: true,
    rds_operations: true,
  };
  if (actions === undefined || actions === null) {
    return parsed;
  }
  if (!isRecord(actions)) {
    throw new EventValidationError('Event field actions must be an object');
  }

  for (const [name, enabled] of Object.entries(actions)) {
    if (typeof enabled !== 'boolean') {
      throw new EventValidationError(`Event action ${name} must be a boolean`);
    }
    if (isOperationCategory(name)) {
      parsed[name] = enabled;
    }
  }
  return parsed;
}

function optionalScalar(value: unknown): string | undefined {
  return typeof value === 'string' || typeof value === 'number' ? String(value) : undefined;
}

/**
 * Validate the invocation event. Unknown fields are ignored.
 *
 * @throws EventValidationError when the event or one of the known fields has the wrong shape.
 */
export function parseEvent(event: unknown): OperationsEvent {
  if (event === undefined || event === null) {
    return { actions: parseActions(undefined) };
  }
  if (!isRecord(event)) {
    throw new EventValidationError('Event must be an object');
  }
  const { data, test } = event;
  if (data !== undefined && typeof data !== 'string') {
    throw new EventValidationError('Event field data must be a string');
  }

  return {
    data,
    actions: parseActions(event.actions),
    action: event.action === 'delete_table' ? 'delete_table' : undefined,
    test: typeof test === 'string' || typeof test === 'number' || typeof test === 'boolean' ? test : undefined,
    source: optionalScalar(event.source),
    timestamp: optionalScalar(event.timestamp),
  };
}

export function addEventExecutionTags(event: OperationsEvent): void {
  if (event.data !== undefined) {
    addExecutionTag('has_data', true);
    addExecutionTag('data_length', event.data.length);
  } else {
    addExecutionTag('has_data', false);
  }
  if (event.test !== undefined) {
    addExecutionTag('is_test', event.test);
  }
  if (event.source !== undefined) {
    addExecutionTag('event_source', event.source);
  }
  if (event.timestamp !== undefined) {
    addExecutionTag('event_timestamp', event.timestamp);
  }
}

export function processData(event: OperationsEvent): string {
  return event.data !== undefined ? `Processed: ${event.data.toUpperCase()}` : 'No data to process';
}
