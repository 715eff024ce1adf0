import middy from '@middy/core';
import {
  captureLambdaHandler,
  logger,
  resetProgrammaticErrors,
  setContext,
  tracer,
} from '@lambda-tracing-demo/aws-powertools-util';
import type { Context } from 'aws-lambda';

import { ConfigOperations } from './ConfigLoader';
import { Response, failureResponse, handle } from './handler';
import { createWorkflows } from './workflows';

export async function operationsHandler(event: unknown, context: Context): Promise<Response> {
  setContext(context, 'lambda.ts');
  resetProgrammaticErrors();
  logger.logEventIfEnabled(event);

  try {
    const config = await ConfigOperations.load();
    return await handle(event, context.awsRequestId, createWorkflows(config), config.operationsConcurrent);
  } catch (error) {
    return failureResponse(error, context.awsRequestId, context.functionName);
  }
}

export const handler = middy(operationsHandler).use(captureLambdaHandler(tracer));
