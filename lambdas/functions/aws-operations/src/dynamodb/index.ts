import { addExecutionTag } from '@lambda-tracing-demo/aws-powertools-util';
import type { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { randomUUID } from 'crypto';

import type { OperationSink } from '../operations/record';
import type { EnsureExistsOptions } from '../resources/ensure-exists';
import { fixedResource, selectResource } from '../resources/selector';
import { DeleteTableResult, DynamoDBDAL } from './dynamodb-dal';

export interface DatabaseOperationsOptions {
  dynamodb: DynamoDBClient;
  tableBaseName: string;
  replicaCount: number;
  /** Use this table instead of rotating over the replicas. */
  tableName?: string;
  waitOptions?: EnsureExistsOptions;
  sink?: OperationSink;
  now?: number;
}

export type DatabaseOperationsResult =
  | {
      table_used: string;
      round_robin_index: number | null;
      item_id: string;
      operations_count: number;
      item_found: boolean;
      updated_attributes: string[];
      delete_status: 'skipped';
    }
  | {
      table_used: string;
      round_robin_index: number | null;
      status: 'table_setup_failed';
    };

function createDal(options: DatabaseOperationsOptions): DynamoDBDAL {
  const selection = options.tableName
    ? fixedResource(options.tableName)
    : selectResource(options.tableBaseName, options.replicaCount, options.now);
  return new DynamoDBDAL(options.dynamodb, selection, options.sink);
}

/**
 * Create, read and update one item in the selected table. The item is kept afterwards.
 */
export async function performDatabaseOperations(options: DatabaseOperationsOptions): Promise<DatabaseOperationsResult> {
  const dal = createDal(options);
  addExecutionTag('dynamodb_table', dal.tableName);

  if (!(await dal.ensureTableExists(options.waitOptions))) {
    addExecutionTag('dynamodb_skipped', true);
    return { table_used: dal.tableName, round_robin_index: dal.roundRobinIndex, status: 'table_setup_failed' };
  }

  const itemId = randomUUID();
  await dal.createItem({
    id: itemId,
    timestamp: new Date().toISOString(),
    data: 'Sample data for CRUD demonstration',
    status: 'active',
    metadata: { created_by: 'lambda-function', version: '1.0' },
  });
  addExecutionTag('dynamodb_item_id', itemId);

  const read = await dal.readItem(itemId);
  addExecutionTag('dynamodb_item_found', read.item_found);

  const update = await dal.updateItem(itemId, { status: 'updated', updated_at: new Date().toISOString() });
  const deletion = dal.deleteItem(itemId);

  addExecutionTag('dynamodb_status', 'success');

  return {
    table_used: dal.tableName,
    round_robin_index: dal.roundRobinIndex,
    item_id: itemId,
    operations_count: 4,
    item_found: read.item_found,
    updated_attributes: update.updated_attributes,
    delete_status: deletion.status,
  };
}

export async function deleteSelectedTable(options: DatabaseOperationsOptions): Promise<DeleteTableResult> {
  const dal = createDal(options);
  addExecutionTag('dynamodb_action', 'delete_table');
  addExecutionTag('dynamodb_table', dal.tableName);
  return dal.deleteTable();
}
