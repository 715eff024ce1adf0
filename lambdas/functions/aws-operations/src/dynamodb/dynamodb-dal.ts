import { createChildLogger } from '@lambda-tracing-demo/aws-powertools-util';
import {
  AttributeValue,
  CreateTableCommand,
  DeleteTableCommand,
  DescribeTableCommand,
  DynamoDBClient,
  GetItemCommand,
  PutItemCommand,
  UpdateItemCommand,
} from '@aws-sdk/client-dynamodb';

import { OperationSink, executeOperation, logOperationRecord, recordSkippedOperation } from '../operations/record';
import { EnsureExistsOptions, ResourceManager, ResourceState, ensureExists } from '../resources/ensure-exists';
import { errorMessage, errorName, isNotFoundError } from '../resources/errors';
import type { ResourceSelection } from '../resources/selector';

const logger = createChildLogger('dynamodb-dal');

export const ITEM_PRESERVATION_REASON = 'Data preservation requested - keeping items in table';

export type ItemAttributes = Record<string, string | Record<string, unknown>>;

export class DynamoDBTableManager implements ResourceManager {
  readonly kind = 'table';

  constructor(private readonly dynamodb: DynamoDBClient) {}

  async describe(name: string): Promise<ResourceState> {
    try {
      const response = await this.dynamodb.send(new DescribeTableCommand({ TableName: name }));
      const status = response.Table?.TableStatus;
      logger.debug('Table described', {
        tableName: name,
        tableStatus: status,
        itemCount: response.Table?.ItemCount,
      });
      switch (status) {
        case 'ACTIVE':
          return 'ACTIVE';
        case 'CREATING':
        case 'UPDATING':
          return 'CREATING';
        default:
          return 'ERROR';
      }
    } catch (error) {
      if (isNotFoundError(error)) {
        return 'NOT_FOUND';
      }
      throw error;
    }
  }

  async create(name: string): Promise<void> {
    await this.dynamodb.send(
      new CreateTableCommand({
        TableName: name,
        KeySchema: [{ AttributeName: 'id', KeyType: 'HASH' }],
        AttributeDefinitions: [{ AttributeName: 'id', AttributeType: 'S' }],
        BillingMode: 'PAY_PER_REQUEST',
      }),
    );
  }

  isAlreadyExists(error: unknown): boolean {
    return error instanceof Error && error.name === 'ResourceInUseException';
  }
}

function toAttributeValues(attributes: ItemAttributes): Record<string, AttributeValue> {
  const item: Record<string, AttributeValue> = {};
  for (const [key, value] of Object.entries(attributes)) {
    item[key] = { S: typeof value === 'string' ? value : JSON.stringify(value) };
  }
  return item;
}

export interface CreateItemResult {
  status: 'success';
  item_id: string;
}

export interface ReadItemResult {
  status: 'success' | 'not_found';
  item_id: string;
  item_found: boolean;
  item_data: Record<string, AttributeValue>;
}

export interface UpdateItemResult {
  status: 'success';
  item_id: string;
  updated_attributes: string[];
}

export interface DeleteItemResult {
  status: 'skipped';
  item_id: string;
  reason: string;
}

export type DeleteTableResult =
  | { status: 'success'; table_name: string; message: string }
  | { status: 'failed'; table_name: string; error: string; error_type: string };

export class DynamoDBDAL {
  readonly tableName: string;
  readonly roundRobinIndex: number | null;

  constructor(
    private readonly dynamodb: DynamoDBClient,
    selection: ResourceSelection,
    private readonly sink: OperationSink = logOperationRecord,
  ) {
    this.tableName = selection.selected;
    this.roundRobinIndex = selection.index;
    logger.debug('DynamoDB DAL initialized', { tableName: this.tableName, roundRobinIndex: this.roundRobinIndex });
  }

  async ensureTableExists(options?: EnsureExistsOptions): Promise<boolean> {
    return ensureExists(new DynamoDBTableManager(this.dynamodb), this.tableName, options);
  }

  /**
   * Put an item. Nested objects are stored as JSON strings.
   */
  async createItem(attributes: ItemAttributes & { id: string }): Promise<CreateItemResult> {
    await executeOperation(
      'put_item',
      this.tableName,
      () => this.dynamodb.send(new PutItemCommand({ TableName: this.tableName, Item: toAttributeValues(attributes) })),
      this.sink,
    );
    return { status: 'success', item_id: attributes.id };
  }

  async readItem(itemId: string): Promise<ReadItemResult> {
    const response = await executeOperation(
      'get_item',
      this.tableName,
      () => this.dynamodb.send(new GetItemCommand({ TableName: this.tableName, Key: { id: { S: itemId } } })),
      this.sink,
    );
    const itemFound = response.Item !== undefined;
    return {
      status: itemFound ? 'success' : 'not_found',
      item_id: itemId,
      item_found: itemFound,
      item_data: response.Item ?? {},
    };
  }

  async updateItem(itemId: string, updates: Record<string, string>): Promise<UpdateItemResult> {
    const keys = Object.keys(updates);
    if (keys.length === 0) {
      throw new Error(`No attributes to update for item ${itemId}`);
    }

    const names: Record<string, string> = {};
    const values: Record<string, AttributeValue> = {};
    for (const key of keys) {
      names[`#${key}`] = key;
      values[`:${key}`] = { S: updates[key] };
    }

    const response = await executeOperation(
      'update_item',
      this.tableName,
      () =>
        this.dynamodb.send(
          new UpdateItemCommand({
            TableName: this.tableName,
            Key: { id: { S: itemId } },
            UpdateExpression: `SET ${keys.map((key) => `#${key} = :${key}`).join(', ')}`,
            ExpressionAttributeNames: names,
            ExpressionAttributeValues: values,
            ReturnValues: 'ALL_NEW',
          }),
        ),
      this.sink,
    );
    return { status: 'success', item_id: itemId, updated_attributes: Object.keys(response.Attributes ?? {}) };
  }

  /**
   * Items are kept in the table. The delete is recorded as skipped and no call is made.
   */
  deleteItem(itemId: string): DeleteItemResult {
    recordSkippedOperation('delete_item', this.tableName, ITEM_PRESERVATION_REASON, this.sink);
    return { status: 'skipped', item_id: itemId, reason: ITEM_PRESERVATION_REASON };
  }

  async deleteTable(): Promise<DeleteTableResult> {
    try {
      await executeOperation(
        'delete_table',
        this.tableName,
        () => this.dynamodb.send(new DeleteTableCommand({ TableName: this.tableName })),
        this.sink,
      );
      return { status: 'success', table_name: this.tableName, message: `Table ${this.tableName} deleted successfully` };
    } catch (error) {
      return { status: 'failed', table_name: this.tableName, error: errorMessage(error), error_type: errorName(error) };
    }
  }
}
