import { Logger } from '@aws-lambda-powertools/logger';
import type { Context } from 'aws-lambda';

const childLoggers: Logger[] = [];

const defaultValues = {
  region: process.env.AWS_REGION,
  environment: process.env.ENVIRONMENT || 'N/A',
};

/**
 * Add the invocation to the root logger and every child logger created so far. `version` is the
 * published Lambda version that serves the invocation, `$LATEST` for an unpublished function.
 */
function setContext(context: Context, module?: string) {
  const invocation = {
    'aws-request-id': context.awsRequestId,
    'function-name': context.functionName,
    version: context.functionVersion || 'unknown',
  };

  logger.addPersistentLogAttributes({ ...invocation, module });
  childLoggers.forEach((childLogger) => childLogger.addPersistentLogAttributes(invocation));
}

const logger = new Logger({
  serviceName: process.env.POWERTOOLS_SERVICE_NAME || 'aws-operations',
  persistentLogAttributes: {
    ...defaultValues,
  },
});

function createChildLogger(module: string): Logger {
  const childLogger = logger.createChild({
    persistentLogAttributes: {
      module: module,
    },
  });

  childLoggers.push(childLogger);
  return childLogger;
}

export { createChildLogger, logger, setContext };
