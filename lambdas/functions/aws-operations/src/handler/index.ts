import { addExecutionTag, addProgrammaticError, createChildLogger } from '@lambda-tracing-demo/aws-powertools-util';

import type { DeleteTableResult } from '../dynamodb/dynamodb-dal';
import { ErrorClassification, classifyError, errorMessage, errorName } from '../resources/errors';
import { OPERATION_CATEGORIES, OperationCategory, addEventExecutionTags, parseEvent, processData } from './event';

const logger = createChildLogger('handler');

export interface Response {
  statusCode: number;
  body: string;
}

export interface OperationsWorkflows {
  categories: Record<OperationCategory, () => Promise<unknown>>;
  deleteTable(): Promise<DeleteTableResult>;
}

export interface CategoryFailure {
  error: string;
  error_type: string;
  classification: ErrorClassification;
}

export interface CategorySkipped {
  status: 'skipped';
  reason: string;
}

const CATEGORY_ERROR_TYPES: Record<OperationCategory, string> = {
  api_operations: 'API_OPERATION_FAILED',
  s3_operations: 'S3_OPERATION_FAILED',
  database_operations: 'DATABASE_OPERATION_FAILED',
  rds_operations: 'RDS_OPERATION_FAILED',
};

const RESPONSE_FIELDS = {
  api_operations: 'api_data',
  s3_operations: 's3_data',
  database_operations: 'db_data',
  rds_operations: 'rds_data',
} as const satisfies Record<OperationCategory, string>;

export const DISABLED_REASON = 'Disabled by event actions';

/**
 * Run one category. Its failure is turned into a result so the other categories are unaffected.
 */
async function runCategory(
  category: OperationCategory,
  workflow: () => Promise<unknown>,
): Promise<unknown> {
  try {
    const result = await workflow();
    addExecutionTag(`${category}_status`, 'success');
    return result;
  } catch (error) {
    const failure: CategoryFailure = {
      error: errorMessage(error),
      error_type: errorName(error),
      classification: classifyError(error),
    };
    logger.error(`${category} failed`, { error, classification: failure.classification });
    addExecutionTag(`${category}_status`, 'failed');
    addProgrammaticError(CATEGORY_ERROR_TYPES[category], failure.error, {
      error_type: failure.error_type,
      classification: failure.classification,
    });
    return failure;
  }
}

export async function runCategories(
  workflows: OperationsWorkflows['categories'],
  actions: Record<OperationCategory, boolean>,
  concurrent: boolean,
): Promise<Record<OperationCategory, unknown>> {
  const run = (category: OperationCategory): Promise<unknown> => {
    if (!actions[category]) {
      logger.info(`${category} disabled by event actions`);
      const skipped: CategorySkipped = { status: 'skipped', reason: DISABLED_REASON };
      return Promise.resolve(skipped);
    }
    return runCategory(category, workflows[category]);
  };

  const outcomes: unknown[] = [];
  if (concurrent) {
    outcomes.push(...(await Promise.all(OPERATION_CATEGORIES.map(run))));
  } else {
    for (const category of OPERATION_CATEGORIES) {
      outcomes.push(await run(category));
    }
  }

  return {
    api_operations: outcomes[0],
    s3_operations: outcomes[1],
    database_operations: outcomes[2],
    rds_operations: outcomes[3],
  };
}

/**
 * Process one invocation event. Category failures are embedded in the response, anything
 * escaping here (an invalid event) is left to the caller.
 */
export async function handle(
  rawEvent: unknown,
  requestId: string,
  workflows: OperationsWorkflows,
  concurrent: boolean,
): Promise<Response> {
  const event = parseEvent(rawEvent);
  addEventExecutionTags(event);

  if (event.action === 'delete_table') {
    logger.info('Delete table instruction received');
    const tableDeletion = await workflows.deleteTable();
    addExecutionTag('dynamodb_table_deleted', tableDeletion.status === 'success');
    return {
      statusCode: 200,
      body: JSON.stringify({
        message: 'DynamoDB table deletion processed',
        table_deletion: tableDeletion,
        request_id: requestId,
      }),
    };
  }

  const results = await runCategories(workflows.categories, event.actions, concurrent);
  const result = processData(event);
  addExecutionTag('business_logic_result', result);
  addExecutionTag('processing_status', 'completed');

  const body: Record<string, unknown> = { message: 'Lambda function executed successfully' };
  for (const category of OPERATION_CATEGORIES) {
    body[RESPONSE_FIELDS[category]] = results[category];
  }

  return {
    statusCode: 200,
    body: JSON.stringify({ ...body, result, request_id: requestId }),
  };
}

export function failureResponse(error: unknown, requestId: string, functionName: string): Response {
  const message = `Lambda execution failed: ${errorMessage(error)}`;
  logger.error(message, { error });
  addExecutionTag('error_category', 'general');
  addExecutionTag('error_type', errorName(error));
  addExecutionTag('processing_status', 'failed');
  addProgrammaticError('LAMBDA_EXECUTION_FAILED', message, {
    error_type: errorName(error),
    function_name: functionName,
    request_id: requestId,
  });

  return {
    statusCode: 500,
    body: JSON.stringify({ error: message, request_id: requestId }),
  };
}
