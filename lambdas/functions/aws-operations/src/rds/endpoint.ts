import { createChildLogger } from '@lambda-tracing-demo/aws-powertools-util';
import { DescribeDBInstancesCommand, RDSClient } from '@aws-sdk/client-rds';

import { OperationSink, executeOperation, logOperationRecord } from '../operations/record';
import { errorMessage } from '../resources/errors';

const logger = createChildLogger('rds-endpoint');

export const PLACEHOLDER_HOST = 'localhost';

export interface RdsEndpoint {
  host: string;
  port: number;
  source: 'discovered' | 'configured';
}

export interface EndpointOptions {
  instanceIdentifier?: string;
  host: string;
  port: number;
  sink?: OperationSink;
}

async function discoverEndpoint(
  rds: RDSClient,
  instanceIdentifier: string,
  sink: OperationSink,
): Promise<RdsEndpoint | undefined> {
  try {
    const response = await executeOperation(
      'describe_db_instances',
      instanceIdentifier,
      () => rds.send(new DescribeDBInstancesCommand({ DBInstanceIdentifier: instanceIdentifier })),
      sink,
    );
    const instance = response.DBInstances?.[0];
    if (!instance) {
      logger.warn('RDS instance not found', { instanceIdentifier });
      return undefined;
    }
    if (instance.DBInstanceStatus !== 'available' || !instance.Endpoint?.Address) {
      logger.warn('RDS instance is not available', { instanceIdentifier, status: instance.DBInstanceStatus });
      return undefined;
    }
    return {
      host: instance.Endpoint.Address,
      port: instance.Endpoint.Port ?? 5432,
      source: 'discovered',
    };
  } catch (error) {
    logger.warn('Could not discover the RDS endpoint', { instanceIdentifier, error: errorMessage(error) });
    return undefined;
  }
}

/**
 * The endpoint of an available instance wins over the configured host. Without either, or
 * with the placeholder host only, there is nothing to connect to and `undefined` is returned.
 */
export async function resolveRdsEndpoint(rds: RDSClient, options: EndpointOptions): Promise<RdsEndpoint | undefined> {
  const sink = options.sink ?? logOperationRecord;
  if (options.instanceIdentifier) {
    const discovered = await discoverEndpoint(rds, options.instanceIdentifier, sink);
    if (discovered) {
      logger.info('RDS endpoint discovered', { host: discovered.host, port: discovered.port });
      return discovered;
    }
  }

  if (options.host && options.host !== PLACEHOLDER_HOST) {
    return { host: options.host, port: options.port, source: 'configured' };
  }
  return undefined;
}
