import { addExecutionTag } from '@lambda-tracing-demo/aws-powertools-util';
import type { AxiosInstance } from 'axios';

import type { OperationSink } from '../operations/record';
import { selectCandidate } from '../resources/selector';
import { ApiDAL, FetchResult, postEndpoints } from './api-dal';

export interface ApiOperationsOptions {
  http: AxiosInstance;
  baseUrl: string;
  timeoutMs: number;
  sink?: OperationSink;
  now?: number;
}

export interface ApiOperationsResult extends FetchResult {
  round_robin_index: number | null;
}

export async function performApiOperations(options: ApiOperationsOptions): Promise<ApiOperationsResult> {
  const selection = selectCandidate(postEndpoints(options.baseUrl), options.now);
  const dal = new ApiDAL(options.http, selection, options.sink);

  addExecutionTag('api_url', dal.endpoint);

  const result = await dal.fetchData(options.timeoutMs);

  addExecutionTag('api_call_status', 'success');
  addExecutionTag('post_id', String(result.post_id ?? 'unknown'));

  return { ...result, round_robin_index: dal.roundRobinIndex };
}
