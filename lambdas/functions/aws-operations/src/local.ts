import { logger } from '@lambda-tracing-demo/aws-powertools-util';
import type { Context } from 'aws-lambda';

import { operationsHandler } from './lambda';

const context: Context = {
  awsRequestId: 'local-test',
  functionName: 'aws-operations',
  callbackWaitsForEmptyEventLoop: false,
  functionVersion: '$LATEST',
  invokedFunctionArn: 'local',
  memoryLimitInMB: '128',
  logGroupName: 'local',
  logStreamName: 'local',
  getRemainingTimeInMillis: () => 30_000,
  done: () => {},
  fail: () => {},
  succeed: () => {},
};

export async function run(): Promise<void> {
  const response = await operationsHandler({ data: 'hello world', test: true, source: 'local' }, context);
  logger.info('Local run finished', { response });
}

run().catch((error) => logger.error('Local run failed', { error }));
