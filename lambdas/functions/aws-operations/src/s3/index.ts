import { addExecutionTag, createChildLogger } from '@lambda-tracing-demo/aws-powertools-util';
import type { S3Client } from '@aws-sdk/client-s3';
import { randomUUID } from 'crypto';

import type { OperationSink } from '../operations/record';
import type { EnsureExistsOptions } from '../resources/ensure-exists';
import { fixedResource, selectResource } from '../resources/selector';
import { S3DAL } from './s3-dal';

const logger = createChildLogger('s3-operations');

export interface S3OperationsOptions {
  s3: S3Client;
  bucketBaseName: string;
  replicaCount: number;
  /** Use this bucket instead of rotating over the replicas. */
  bucketName?: string;
  region?: string;
  waitOptions?: EnsureExistsOptions;
  sink?: OperationSink;
  now?: number;
}

export type S3OperationsResult =
  | {
      bucket_used: string;
      round_robin_index: number | null;
      operation_id: string;
      objects_created: number;
      object_count: number;
      objects_deleted: number;
    }
  | {
      bucket_used: string;
      round_robin_index: number | null;
      status: 'bucket_setup_failed';
    };

export async function performS3Operations(options: S3OperationsOptions): Promise<S3OperationsResult> {
  const selection = options.bucketName
    ? fixedResource(options.bucketName)
    : selectResource(options.bucketBaseName, options.replicaCount, options.now);
  const dal = new S3DAL(options.s3, selection, options.sink, options.region);

  addExecutionTag('s3_bucket', dal.bucketName);

  if (!(await dal.ensureBucketExists(options.waitOptions))) {
    logger.warn('Bucket is not available, skipping object operations', { bucketName: dal.bucketName });
    return { bucket_used: dal.bucketName, round_robin_index: dal.roundRobinIndex, status: 'bucket_setup_failed' };
  }

  const operationId = randomUUID();
  const timestamp = new Date().toISOString();

  const upload = await dal.uploadSampleObjects(operationId, timestamp);
  const listing = await dal.listBucketObjects(operationId);
  const deletion = await dal.deleteBucketObjects(operationId);

  addExecutionTag('s3_objects_created', upload.objects_created);

  return {
    bucket_used: dal.bucketName,
    round_robin_index: dal.roundRobinIndex,
    operation_id: operationId,
    objects_created: upload.objects_created,
    object_count: listing.object_count,
    objects_deleted: deletion.objects_deleted,
  };
}
