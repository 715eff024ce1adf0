import { createChildLogger } from '@lambda-tracing-demo/aws-powertools-util';
import type { AxiosInstance } from 'axios';

import { OperationSink, executeOperation, logOperationRecord } from '../operations/record';
import type { ResourceSelection } from '../resources/selector';

const logger = createChildLogger('api-dal');

export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

export interface Post {
  id?: number;
  userId?: number;
  title?: string;
  body?: string;
}

export interface FetchResult {
  post_id: number | null;
  post_title: string | null;
  endpoint_used: string;
  status_code: number;
  /** Seconds. */
  response_time: number;
}

export function postEndpoints(baseUrl: string, postIds: readonly number[] = [1, 2, 3]): string[] {
  return postIds.map((postId) => `${baseUrl}/posts/${postId}`);
}

/**
 * Data access for the outbound HTTP API. The endpoint is fixed per instance.
 */
export class ApiDAL {
  readonly endpoint: string;
  readonly roundRobinIndex: number | null;

  constructor(
    private readonly http: AxiosInstance,
    selection: ResourceSelection,
    private readonly sink: OperationSink = logOperationRecord,
  ) {
    this.endpoint = selection.selected;
    this.roundRobinIndex = selection.index;
    logger.debug('API DAL initialized', { endpoint: this.endpoint, roundRobinIndex: this.roundRobinIndex });
  }

  async fetchData(timeoutMs: number = DEFAULT_HTTP_TIMEOUT_MS): Promise<FetchResult> {
    const startedAt = Date.now();
    const response = await executeOperation(
      'http_get',
      this.endpoint,
      () => this.http.get<Post>(this.endpoint, { timeout: timeoutMs }),
      this.sink,
    );
    const responseTime = (Date.now() - startedAt) / 1000;
    const post = response.data ?? {};

    logger.info('API call complete', {
      endpoint: this.endpoint,
      statusCode: response.status,
      responseTime,
      postId: post.id,
    });

    return {
      post_id: post.id ?? null,
      post_title: post.title ?? null,
      endpoint_used: this.endpoint,
      status_code: response.status,
      response_time: responseTime,
    };
  }
}
