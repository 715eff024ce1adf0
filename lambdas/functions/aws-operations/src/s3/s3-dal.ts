import { createChildLogger } from '@lambda-tracing-demo/aws-powertools-util';
import {
  BucketLocationConstraint,
  CreateBucketCommand,
  DeleteObjectCommand,
  HeadBucketCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';

import { OperationSink, executeOperation, logOperationRecord } from '../operations/record';
import { EnsureExistsOptions, ResourceManager, ResourceState, ensureExists } from '../resources/ensure-exists';
import { errorMessage, isNotFoundError } from '../resources/errors';
import type { ResourceSelection } from '../resources/selector';

const logger = createChildLogger('s3-dal');

export interface ObjectOperation {
  operation: 'UPLOAD_OBJECT' | 'LIST_OBJECTS' | 'DELETE_OBJECT';
  status: 'success' | 'failed';
  key?: string;
  object_count?: number;
  error?: string;
}

function toLocationConstraint(region: string | undefined): BucketLocationConstraint | undefined {
  return Object.values(BucketLocationConstraint).find((constraint) => constraint === region);
}

export class S3BucketManager implements ResourceManager {
  readonly kind = 'bucket';

  constructor(
    private readonly s3: S3Client,
    private readonly region?: string,
  ) {}

  async describe(name: string): Promise<ResourceState> {
    try {
      await this.s3.send(new HeadBucketCommand({ Bucket: name }));
      return 'ACTIVE';
    } catch (error) {
      if (isNotFoundError(error)) {
        return 'NOT_FOUND';
      }
      throw error;
    }
  }

  async create(name: string): Promise<void> {
    // us-east-1 is the default location and must not be passed as constraint
    const locationConstraint = toLocationConstraint(this.region);
    await this.s3.send(
      new CreateBucketCommand({
        Bucket: name,
        CreateBucketConfiguration: locationConstraint ? { LocationConstraint: locationConstraint } : undefined,
      }),
    );
  }

  isAlreadyExists(error: unknown): boolean {
    return error instanceof Error && error.name === 'BucketAlreadyOwnedByYou';
  }
}

export class S3DAL {
  readonly bucketName: string;
  readonly roundRobinIndex: number | null;

  constructor(
    private readonly s3: S3Client,
    selection: ResourceSelection,
    private readonly sink: OperationSink = logOperationRecord,
    private readonly region?: string,
  ) {
    this.bucketName = selection.selected;
    this.roundRobinIndex = selection.index;
    logger.debug('S3 DAL initialized', { bucketName: this.bucketName, roundRobinIndex: this.roundRobinIndex });
  }

  async ensureBucketExists(options?: EnsureExistsOptions): Promise<boolean> {
    return ensureExists(new S3BucketManager(this.s3, this.region), this.bucketName, options);
  }

  async uploadObject(
    key: string,
    content: string,
    contentType = 'application/json',
  ): Promise<{ status: 'success'; key: string; bucket: string }> {
    await executeOperation(
      'put_object',
      this.bucketName,
      () =>
        this.s3.send(new PutObjectCommand({ Bucket: this.bucketName, Key: key, Body: content, ContentType: contentType })),
      this.sink,
    );
    return { status: 'success', key, bucket: this.bucketName };
  }

  async listObjects(prefix?: string): Promise<{ status: 'success'; object_count: number; objects: string[] }> {
    const response = await executeOperation(
      'list_objects',
      this.bucketName,
      () => this.s3.send(new ListObjectsV2Command({ Bucket: this.bucketName, Prefix: prefix })),
      this.sink,
    );
    const objects = (response.Contents ?? []).flatMap((object) => (object.Key ? [object.Key] : []));
    return { status: 'success', object_count: objects.length, objects };
  }

  async deleteObject(key: string): Promise<{ status: 'success'; key: string; bucket: string }> {
    await executeOperation(
      'delete_object',
      this.bucketName,
      () => this.s3.send(new DeleteObjectCommand({ Bucket: this.bucketName, Key: key })),
      this.sink,
    );
    return { status: 'success', key, bucket: this.bucketName };
  }

  /**
   * Upload two JSON documents and a text file under `sample-{operationId}/`. A failed upload is
   * reported in `operations` and does not stop the others.
   */
  async uploadSampleObjects(
    operationId: string,
    timestamp: string,
  ): Promise<{ objects_created: number; operations: ObjectOperation[] }> {
    const prefix = sampleObjectPrefix(operationId);
    const sampleObjects = [
      {
        key: `${prefix}data1.json`,
        content: JSON.stringify({ id: '1', message: 'Sample data 1', timestamp, operation_id: operationId }),
      },
      {
        key: `${prefix}data2.json`,
        content: JSON.stringify({ id: '2', message: 'Sample data 2', timestamp, operation_id: operationId }),
      },
      {
        key: `${prefix}metadata.txt`,
        content: `Operation ID: ${operationId}\nTimestamp: ${timestamp}\nBucket: ${this.bucketName}`,
      },
    ];

    const operations: ObjectOperation[] = [];
    for (const object of sampleObjects) {
      const contentType = object.key.endsWith('.json') ? 'application/json' : 'text/plain';
      try {
        await this.uploadObject(object.key, object.content, contentType);
        operations.push({ operation: 'UPLOAD_OBJECT', status: 'success', key: object.key });
      } catch (error) {
        operations.push({ operation: 'UPLOAD_OBJECT', status: 'failed', key: object.key, error: errorMessage(error) });
      }
    }

    const objectsCreated = operations.filter((operation) => operation.status === 'success').length;
    logger.info('Sample objects uploaded', {
      bucketName: this.bucketName,
      objectsCreated,
      failedObjects: sampleObjects.length - objectsCreated,
      operationId,
    });
    return { objects_created: objectsCreated, operations };
  }

  async listBucketObjects(operationId: string): Promise<{ object_count: number; operations: ObjectOperation[] }> {
    try {
      const result = await this.listObjects(sampleObjectPrefix(operationId));
      return {
        object_count: result.object_count,
        operations: [{ operation: 'LIST_OBJECTS', status: 'success', object_count: result.object_count }],
      };
    } catch (error) {
      return { object_count: 0, operations: [{ operation: 'LIST_OBJECTS', status: 'failed', error: errorMessage(error) }] };
    }
  }

  async deleteBucketObjects(operationId: string): Promise<{ objects_deleted: number; operations: ObjectOperation[] }> {
    let keys: string[];
    try {
      keys = (await this.listObjects(sampleObjectPrefix(operationId))).objects;
    } catch (error) {
      return { objects_deleted: 0, operations: [{ operation: 'LIST_OBJECTS', status: 'failed', error: errorMessage(error) }] };
    }

    const operations: ObjectOperation[] = [];
    for (const key of keys) {
      try {
        await this.deleteObject(key);
        operations.push({ operation: 'DELETE_OBJECT', status: 'success', key });
      } catch (error) {
        operations.push({ operation: 'DELETE_OBJECT', status: 'failed', key, error: errorMessage(error) });
      }
    }

    const objectsDeleted = operations.filter((operation) => operation.status === 'success').length;
    logger.info('Sample objects deleted', {
      bucketName: this.bucketName,
      objectsDeleted,
      failedDeletions: keys.length - objectsDeleted,
      operationId,
    });
    return { objects_deleted: objectsDeleted, operations };
  }
}

export function sampleObjectPrefix(operationId: string): string {
  return `sample-${operationId}/`;
}
