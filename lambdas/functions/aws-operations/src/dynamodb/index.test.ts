import {
  CreateTableCommand,
  DeleteItemCommand,
  DeleteTableCommand,
  DescribeTableCommand,
  DynamoDBClient,
  DynamoDBServiceException,
  GetItemCommand,
  PutItemCommand,
  ResourceInUseException,
  ResourceNotFoundException,
  UpdateItemCommand,
} from '@aws-sdk/client-dynamodb';
import 'aws-sdk-client-mock-jest/vitest';
import { mockClient } from 'aws-sdk-client-mock';
import { describe, it, expect, beforeEach } from 'vitest';

import { createOperationLog } from '../operations/record';
import { fixedResource } from '../resources/selector';
import { DynamoDBDAL, DynamoDBTableManager, ITEM_PRESERVATION_REASON } from './dynamodb-dal';
import { deleteSelectedTable, performDatabaseOperations } from './index';

const dynamoMock = mockClient(DynamoDBClient);
const waitOptions = { timeoutMs: 1000, pollIntervalMs: 1 };

function tableNotFound(): ResourceNotFoundException {
  return new ResourceNotFoundException({ message: 'Requested resource not found', $metadata: {} });
}

function mockItemRoundTrip(): void {
  dynamoMock.on(PutItemCommand).resolves({});
  dynamoMock.on(GetItemCommand).callsFake((input) => ({ Item: { id: { S: input.Key?.id?.S ?? '' } } }));
  dynamoMock.on(UpdateItemCommand).callsFake((input) => ({
    Attributes: { id: input.Key?.id ?? { S: '' }, status: { S: 'updated' }, updated_at: { S: 'now' } },
  }));
}

describe('DynamoDBTableManager', () => {
  beforeEach(() => {
    dynamoMock.reset();
  });

  it.each([
    ['ACTIVE', 'ACTIVE'],
    ['CREATING', 'CREATING'],
    ['UPDATING', 'CREATING'],
    ['DELETING', 'ERROR'],
  ] as const)('should map table status %s to %s', async (tableStatus, expected) => {
    dynamoMock.on(DescribeTableCommand).resolves({ Table: { TableStatus: tableStatus } });

    await expect(new DynamoDBTableManager(new DynamoDBClient({})).describe('demo-table')).resolves.toBe(expected);
  });

  it('should report a missing table as not found', async () => {
    dynamoMock.on(DescribeTableCommand).rejects(tableNotFound());

    await expect(new DynamoDBTableManager(new DynamoDBClient({})).describe('demo-table')).resolves.toBe('NOT_FOUND');
  });

  it('should create the table with a string hash key on demand', async () => {
    dynamoMock.on(CreateTableCommand).resolves({});

    await new DynamoDBTableManager(new DynamoDBClient({})).create('demo-table');

    expect(dynamoMock).toHaveReceivedCommandWith(CreateTableCommand, {
      TableName: 'demo-table',
      KeySchema: [{ AttributeName: 'id', KeyType: 'HASH' }],
      AttributeDefinitions: [{ AttributeName: 'id', AttributeType: 'S' }],
      BillingMode: 'PAY_PER_REQUEST',
    });
  });
});

describe('performDatabaseOperations', () => {
  beforeEach(() => {
    dynamoMock.reset();
  });

  it('should create, read and update an item in the selected table', async () => {
    dynamoMock.on(DescribeTableCommand).resolves({ Table: { TableStatus: 'ACTIVE' } });
    mockItemRoundTrip();
    const { sink, records } = createOperationLog();

    // 1_700_000_001 % 3 === 0
    const result = await performDatabaseOperations({
      dynamodb: new DynamoDBClient({}),
      tableBaseName: 'demo-table',
      replicaCount: 3,
      waitOptions,
      sink,
      now: 1_700_000_001_000,
    });

    expect(result).toMatchObject({
      table_used: 'demo-table',
      round_robin_index: 0,
      operations_count: 4,
      item_found: true,
      updated_attributes: ['id', 'status', 'updated_at'],
      delete_status: 'skipped',
    });
    expect(records.map((record) => [record.operationKind, record.status])).toEqual([
      ['put_item', 'success'],
      ['get_item', 'success'],
      ['update_item', 'success'],
      ['delete_item', 'skipped'],
    ]);
    expect(records[3].reason).toBe(ITEM_PRESERVATION_REASON);
    expect(dynamoMock).not.toHaveReceivedCommand(DeleteItemCommand);
    expect(dynamoMock).toHaveReceivedCommandWith(UpdateItemCommand, {
      TableName: 'demo-table',
      UpdateExpression: 'SET #status = :status, #updated_at = :updated_at',
      ExpressionAttributeNames: { '#status': 'status', '#updated_at': 'updated_at' },
      ReturnValues: 'ALL_NEW',
    });
  });

  it('should store nested attributes as JSON strings', async () => {
    dynamoMock.on(DescribeTableCommand).resolves({ Table: { TableStatus: 'ACTIVE' } });
    mockItemRoundTrip();

    const result = await performDatabaseOperations({
      dynamodb: new DynamoDBClient({}),
      tableBaseName: 'demo-table',
      replicaCount: 1,
      waitOptions,
    });

    if (!('item_id' in result)) {
      throw new Error('expected the item operations to run');
    }
    const item = dynamoMock.commandCalls(PutItemCommand)[0].args[0].input.Item;
    expect(item?.id).toEqual({ S: result.item_id });
    expect(item?.status).toEqual({ S: 'active' });
    expect(item?.metadata).toEqual({ S: '{"created_by":"lambda-function","version":"1.0"}' });
  });

  it('should create a missing table and wait until it is active', async () => {
    dynamoMock
      .on(DescribeTableCommand)
      .rejectsOnce(tableNotFound())
      .resolvesOnce({ Table: { TableStatus: 'CREATING' } })
      .resolves({ Table: { TableStatus: 'ACTIVE' } });
    dynamoMock.on(CreateTableCommand).resolves({});
    mockItemRoundTrip();

    const result = await performDatabaseOperations({
      dynamodb: new DynamoDBClient({}),
      tableBaseName: 'demo-table',
      replicaCount: 1,
      waitOptions,
    });

    expect(result).toMatchObject({ table_used: 'demo-table', item_found: true });
    expect(dynamoMock).toHaveReceivedCommandTimes(CreateTableCommand, 1);
    expect(dynamoMock).toHaveReceivedCommandTimes(DescribeTableCommand, 3);
  });

  it('should treat a table created concurrently as ready', async () => {
    dynamoMock.on(DescribeTableCommand).rejects(tableNotFound());
    dynamoMock.on(CreateTableCommand).rejects(new ResourceInUseException({ message: 'Table already exists', $metadata: {} }));
    mockItemRoundTrip();

    const result = await performDatabaseOperations({
      dynamodb: new DynamoDBClient({}),
      tableBaseName: 'demo-table',
      replicaCount: 1,
      waitOptions,
    });

    expect(result).toMatchObject({ table_used: 'demo-table', operations_count: 4 });
  });

  it('should skip the item operations when the table is unusable', async () => {
    dynamoMock.on(DescribeTableCommand).resolves({ Table: { TableStatus: 'DELETING' } });

    const result = await performDatabaseOperations({
      dynamodb: new DynamoDBClient({}),
      tableBaseName: 'demo-table',
      replicaCount: 1,
      waitOptions,
    });

    expect(result).toEqual({ table_used: 'demo-table', round_robin_index: 0, status: 'table_setup_failed' });
    expect(dynamoMock).not.toHaveReceivedCommand(PutItemCommand);
  });

  it('should record and re-throw a failed item write', async () => {
    dynamoMock.on(DescribeTableCommand).resolves({ Table: { TableStatus: 'ACTIVE' } });
    dynamoMock
      .on(PutItemCommand)
      .rejects(
        new DynamoDBServiceException({
          name: 'ValidationException',
          $fault: 'client',
          message: 'One or more parameter values were invalid',
          $metadata: {},
        }),
      );
    const { sink, records } = createOperationLog();

    await expect(
      performDatabaseOperations({
        dynamodb: new DynamoDBClient({}),
        tableBaseName: 'demo-table',
        replicaCount: 1,
        waitOptions,
        sink,
      }),
    ).rejects.toThrow('One or more parameter values were invalid');

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      operationKind: 'put_item',
      status: 'failure',
      errorDetail: { type: 'ValidationException', classification: 'failure' },
    });
  });
});

describe('DynamoDBDAL', () => {
  beforeEach(() => {
    dynamoMock.reset();
  });

  it('should keep the item retrievable after a delete', async () => {
    mockItemRoundTrip();
    const dal = new DynamoDBDAL(new DynamoDBClient({}), fixedResource('demo-table'));

    await dal.createItem({ id: 'item-1', data: 'kept' });
    const deletion = dal.deleteItem('item-1');
    const read = await dal.readItem('item-1');

    expect(deletion).toEqual({ status: 'skipped', item_id: 'item-1', reason: ITEM_PRESERVATION_REASON });
    expect(read).toMatchObject({ status: 'success', item_found: true, item_data: { id: { S: 'item-1' } } });
  });

  it('should report a missing item as not found', async () => {
    dynamoMock.on(GetItemCommand).resolves({});
    const dal = new DynamoDBDAL(new DynamoDBClient({}), fixedResource('demo-table'));

    await expect(dal.readItem('missing')).resolves.toEqual({
      status: 'not_found',
      item_id: 'missing',
      item_found: false,
      item_data: {},
    });
  });

  it('should refuse an update without attributes', async () => {
    const dal = new DynamoDBDAL(new DynamoDBClient({}), fixedResource('demo-table'));

    await expect(dal.updateItem('item-1', {})).rejects.toThrow('No attributes to update for item item-1');
    expect(dynamoMock).not.toHaveReceivedCommand(UpdateItemCommand);
  });
});

describe('deleteSelectedTable', () => {
  beforeEach(() => {
    dynamoMock.reset();
  });

  it('should delete the selected table', async () => {
    dynamoMock.on(DeleteTableCommand).resolves({});

    const result = await deleteSelectedTable({
      dynamodb: new DynamoDBClient({}),
      tableBaseName: 'demo-table',
      replicaCount: 3,
      now: 1_700_000_000_000,
    });

    expect(result).toEqual({
      status: 'success',
      table_name: 'demo-table-3',
      message: 'Table demo-table-3 deleted successfully',
    });
  });

  it('should return the failure instead of throwing', async () => {
    dynamoMock.on(DeleteTableCommand).rejects(tableNotFound());

    const result = await deleteSelectedTable({
      dynamodb: new DynamoDBClient({}),
      tableBaseName: 'demo-table',
      replicaCount: 1,
    });

    expect(result).toEqual({
      status: 'failed',
      table_name: 'demo-table',
      error: 'Requested resource not found',
      error_type: 'ResourceNotFoundException',
    });
  });
});
