import { getParameter } from '@lambda-tracing-demo/aws-ssm-util';
import { createChildLogger } from '@lambda-tracing-demo/aws-powertools-util';
import yn from 'yn';

import { MAX_TIMER_DELAY_MS } from './operations/deadline';

const logger = createChildLogger('config');

abstract class BaseConfig {
  configLoadingErrors: string[] = [];

  abstract loadConfig(): Promise<void>;

  protected loadString(envVar: string | undefined, defaultValue: string): string {
    return envVar !== undefined && envVar !== '' ? envVar : defaultValue;
  }

  protected loadPositiveInteger(envVar: string | undefined, name: string, defaultValue: number): number {
    if (envVar === undefined || envVar === '') {
      return defaultValue;
    }

    const value = Number(envVar);
    if (!Number.isInteger(value) || value <= 0) {
      this.configLoadingErrors.push(`Environment variable for ${name} must be a positive integer, got '${envVar}'.`);
      return defaultValue;
    }
    return value;
  }

  protected loadDuration(envVar: string | undefined, name: string, defaultValue: number): number {
    const value = this.loadPositiveInteger(envVar, name, defaultValue);
    if (value > MAX_TIMER_DELAY_MS) {
      this.configLoadingErrors.push(
        `Environment variable for ${name} must be at most ${MAX_TIMER_DELAY_MS} ms, got '${envVar}'.`,
      );
      return defaultValue;
    }
    return value;
  }

  protected loadBoolean(envVar: string | undefined, defaultValue: boolean): boolean {
    return yn(envVar, { default: defaultValue });
  }

  protected async loadParameter(paramPath: string, name: string): Promise<string | undefined> {
    logger.debug(`Loading parameter for ${name} from path ${paramPath}`);
    try {
      return await getParameter(paramPath);
    } catch (error) {
      const errorMessage = `Failed to load parameter for ${name} from path ${paramPath}: ${
        error instanceof Error ? error.message : String(error)
      }`;
      this.configLoadingErrors.push(errorMessage);
      return undefined;
    }
  }

  // create a log object without secrets
  logObject(): Record<string, unknown> {
    const config: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(this)) {
      const lowerKey = key.toLowerCase();
      const isSecret = lowerKey.includes('secret') || lowerKey.includes('password');
      config[key] = isSecret && value ? '***' : value;
    }
    return config;
  }
}

export class ConfigOperations extends BaseConfig {
  private static instance: ConfigOperations | null = null;

  tableName = 'example-table';
  bucketName = 'example-bucket';
  replicaCount = 3;
  apiBaseUrl = 'https://jsonplaceholder.typicode.com';
  httpTimeoutMs = 10_000;
  resourceWaitTimeoutMs = 60_000;
  resourcePollIntervalMs = 2_000;
  operationsConcurrent = true;
  rdsHost = 'localhost';
  rdsPort = 5432;
  rdsDatabaseName = 'tracing_demo';
  rdsUsername = 'demo_admin';
  rdsPassword = '';
  rdsInstanceIdentifier: string | undefined;
  rdsOperationTimeoutMs = 30_000;

  static async load(): Promise<ConfigOperations> {
    if (!this.instance) {
      const config = new ConfigOperations();
      await config.loadConfig();

      if (config.configLoadingErrors.length > 0) {
        logger.debug('Failed to load config', {
          config: config.logObject(),
          errors: config.configLoadingErrors,
        });
        throw new Error(`Failed to load config: ${config.configLoadingErrors.join(', ')}`);
      }

      logger.debug('Config loaded', { config: config.logObject() });
      this.instance = config;
    } else {
      logger.debug('Config already loaded', { config: this.instance.logObject() });
    }

    return this.instance;
  }

  static reset(): void {
    this.instance = null;
  }

  async loadConfig(): Promise<void> {
    const env = process.env;
    this.tableName = this.loadString(env.DYNAMODB_TABLE_NAME, this.tableName);
    this.bucketName = this.loadString(env.S3_BUCKET_NAME, this.bucketName);
    this.replicaCount = this.loadPositiveInteger(env.RESOURCE_REPLICA_COUNT, 'replicaCount', this.replicaCount);
    this.apiBaseUrl = this.loadString(env.API_BASE_URL, this.apiBaseUrl).replace(/\/+$/, '');
    this.httpTimeoutMs = this.loadDuration(env.HTTP_TIMEOUT_MS, 'httpTimeoutMs', this.httpTimeoutMs);
    this.resourceWaitTimeoutMs = this.loadDuration(
      env.RESOURCE_WAIT_TIMEOUT_MS,
      'resourceWaitTimeoutMs',
      this.resourceWaitTimeoutMs,
    );
    this.resourcePollIntervalMs = this.loadDuration(
      env.RESOURCE_POLL_INTERVAL_MS,
      'resourcePollIntervalMs',
      this.resourcePollIntervalMs,
    );
    this.operationsConcurrent = this.loadBoolean(env.OPERATIONS_CONCURRENT, this.operationsConcurrent);

    this.rdsHost = this.loadString(env.RDS_HOST, this.rdsHost);
    this.rdsPort = this.loadPositiveInteger(env.RDS_PORT, 'rdsPort', this.rdsPort);
    this.rdsDatabaseName = this.loadString(env.RDS_DATABASE_NAME, this.rdsDatabaseName);
    this.rdsUsername = this.loadString(env.RDS_USERNAME, this.rdsUsername);
    this.rdsInstanceIdentifier = env.RDS_INSTANCE_IDENTIFIER || undefined;
    this.rdsOperationTimeoutMs = this.loadDuration(
      env.RDS_OPERATION_TIMEOUT_MS,
      'rdsOperationTimeoutMs',
      this.rdsOperationTimeoutMs,
    );

    if (env.RDS_PASSWORD_PARAMETER) {
      this.rdsPassword = (await this.loadParameter(env.RDS_PASSWORD_PARAMETER, 'rdsPassword')) ?? '';
    } else {
      this.rdsPassword = this.loadString(env.RDS_PASSWORD, this.rdsPassword);
    }
  }
}
