declare namespace NodeJS {
  export interface ProcessEnv {
    ENVIRONMENT?: string;
    AWS_REGION?: string;
    DYNAMODB_TABLE_NAME?: string;
    S3_BUCKET_NAME?: string;
    RESOURCE_REPLICA_COUNT?: string;
    API_BASE_URL?: string;
    HTTP_TIMEOUT_MS?: string;
    RESOURCE_WAIT_TIMEOUT_MS?: string;
    RESOURCE_POLL_INTERVAL_MS?: string;
    RDS_HOST?: string;
    RDS_PORT?: string;
    RDS_DATABASE_NAME?: string;
    RDS_USERNAME?: string;
    RDS_PASSWORD?: string;
    RDS_PASSWORD_PARAMETER?: string;
    RDS_INSTANCE_IDENTIFIER?: string;
    RDS_OPERATION_TIMEOUT_MS?: string;
    OPERATIONS_CONCURRENT?: string;
  }
}
