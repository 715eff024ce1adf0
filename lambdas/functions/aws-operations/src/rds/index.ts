import { addExecutionTag, createChildLogger } from '@lambda-tracing-demo/aws-powertools-util';
import type { RDSClient } from '@aws-sdk/client-rds';

import { withDeadline } from '../operations/deadline';
import type { OperationSink } from '../operations/record';
import { resolveRdsEndpoint } from './endpoint';
import { PgClientFactory, PostgresDAL, ReadUserResult, WriteResult, connectionConfig } from './postgres-dal';

const logger = createChildLogger('rds-operations');

export interface RdsOperationsOptions {
  rds: RDSClient;
  createClient: PgClientFactory;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  instanceIdentifier?: string;
  timeoutMs: number;
  sink?: OperationSink;
}

export type RdsOperationsResult =
  | {
      status: 'success';
      endpoint: string;
      endpoint_source: 'discovered' | 'configured';
      database: string;
      operations_count: number;
      user: ReadUserResult;
      inserted: WriteResult[];
      updated: WriteResult[];
      deleted: WriteResult[];
    }
  | {
      status: 'unavailable';
      reason: string;
    };

/**
 * Round trip over users, products and orders on one connection, bounded by `timeoutMs`.
 */
export async function performRdsOperations(options: RdsOperationsOptions): Promise<RdsOperationsResult> {
  return withDeadline<RdsOperationsResult>('rds_operations', options.timeoutMs, async (signal) => {
    const endpoint = await resolveRdsEndpoint(options.rds, {
      instanceIdentifier: options.instanceIdentifier,
      host: options.host,
      port: options.port,
      sink: options.sink,
    });
    if (!endpoint) {
      logger.warn('No database endpoint available, skipping RDS operations');
      addExecutionTag('rds_status', 'unavailable');
      return { status: 'unavailable', reason: 'No database endpoint available' };
    }
    addExecutionTag('rds_host', endpoint.host);

    const client = options.createClient(
      connectionConfig({
        host: endpoint.host,
        port: endpoint.port,
        database: options.database,
        user: options.user,
        password: options.password,
      }),
    );
    const dal = new PostgresDAL(client, options.database, options.sink, signal);

    try {
      await dal.connect();
      await dal.ensureTables();

      const user = await dal.createUser({ username: 'demo_user', email: 'demo_user@example.com' });
      const product = await dal.insertProduct({ name: 'Demo product', price: 19.99, category: 'demo' });
      const order = await dal.insertOrder({ userId: user.id, totalAmount: 39.98 });

      const userRead = await dal.readUser(user.id);

      const updated = [
        await dal.updateUser(user.id, { status: 'updated', email: 'demo_user+updated@example.com' }),
        await dal.updateProduct(product.id, { price: 24.99 }),
        await dal.updateOrderStatus(order.id, 'shipped'),
      ];

      const deleted = [await dal.deleteOrder(order.id), await dal.deleteProduct(product.id), await dal.deleteUser(user.id)];

      addExecutionTag('rds_status', 'success');
      const inserted = [user, product, order];
      return {
        status: 'success',
        endpoint: endpoint.host,
        endpoint_source: endpoint.source,
        database: options.database,
        operations_count: inserted.length + 1 + updated.length + deleted.length,
        user: userRead,
        inserted,
        updated,
        deleted,
      };
    } finally {
      await dal.close();
    }
  });
}
