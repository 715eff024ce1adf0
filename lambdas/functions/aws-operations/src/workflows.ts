import { getTracedAWSV3Client } from '@lambda-tracing-demo/aws-powertools-util';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { RDSClient } from '@aws-sdk/client-rds';
import { S3Client } from '@aws-sdk/client-s3';
import axios, { AxiosInstance } from 'axios';

import type { ConfigOperations } from './ConfigLoader';
import { performApiOperations } from './api';
import { deleteSelectedTable, performDatabaseOperations } from './dynamodb';
import type { OperationsWorkflows } from './handler';
import { performRdsOperations } from './rds';
import { PgClientFactory, createPgClient } from './rds/postgres-dal';
import { performS3Operations } from './s3';

export interface WorkflowClients {
  http: AxiosInstance;
  s3: S3Client;
  dynamodb: DynamoDBClient;
  rds: RDSClient;
  createPgClient: PgClientFactory;
}

/**
 * Fresh clients for one invocation, AWS clients are traced.
 */
export function createClients(): WorkflowClients {
  return {
    http: axios.create(),
    s3: getTracedAWSV3Client(new S3Client({})),
    dynamodb: getTracedAWSV3Client(new DynamoDBClient({})),
    rds: getTracedAWSV3Client(new RDSClient({})),
    createPgClient,
  };
}

export function createWorkflows(config: ConfigOperations, clients: WorkflowClients = createClients()): OperationsWorkflows {
  const waitOptions = { timeoutMs: config.resourceWaitTimeoutMs, pollIntervalMs: config.resourcePollIntervalMs };
  const tableOptions = {
    dynamodb: clients.dynamodb,
    tableBaseName: config.tableName,
    replicaCount: config.replicaCount,
    waitOptions,
  };

  return {
    categories: {
      api_operations: () =>
        performApiOperations({ http: clients.http, baseUrl: config.apiBaseUrl, timeoutMs: config.httpTimeoutMs }),
      s3_operations: () =>
        performS3Operations({
          s3: clients.s3,
          bucketBaseName: config.bucketName,
          replicaCount: config.replicaCount,
          region: process.env.AWS_REGION,
          waitOptions,
        }),
      database_operations: () => performDatabaseOperations(tableOptions),
      rds_operations: () =>
        performRdsOperations({
          rds: clients.rds,
          createClient: clients.createPgClient,
          host: config.rdsHost,
          port: config.rdsPort,
          database: config.rdsDatabaseName,
          user: config.rdsUsername,
          password: config.rdsPassword,
          instanceIdentifier: config.rdsInstanceIdentifier,
          timeoutMs: config.rdsOperationTimeoutMs,
        }),
    },
    deleteTable: () => deleteSelectedTable(tableOptions),
  };
}
