import { createChildLogger } from '@lambda-tracing-demo/aws-powertools-util';
import pg from 'pg';
import type { ClientConfig, QueryResult, QueryResultRow } from 'pg';
import { randomUUID } from 'crypto';

import { OperationSink, executeOperation, logOperationRecord } from '../operations/record';

const { Client } = pg;

const logger = createChildLogger('postgres-dal');

export const CONNECTION_TIMEOUT_MS = 5_000;
export const STATEMENT_TIMEOUT_MS = 3_000;

export type PgClient = {
  connect(): Promise<void>;
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
  end(): Promise<void>;
};

export type PgClientFactory = (config: ClientConfig) => PgClient;

export const createPgClient: PgClientFactory = (config) => new Client(config);

export function connectionConfig(options: {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}): ClientConfig {
  return {
    ...options,
    connectionTimeoutMillis: CONNECTION_TIMEOUT_MS,
    statement_timeout: STATEMENT_TIMEOUT_MS,
  };
}

const CREATE_TABLES: Record<'users' | 'products' | 'orders', string> = {
  users: `
    CREATE TABLE IF NOT EXISTS users (
      id VARCHAR(255) PRIMARY KEY,
      username VARCHAR(255) NOT NULL,
      email VARCHAR(255) NOT NULL,
      created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      status VARCHAR(50) DEFAULT 'active'
    )`,
  products: `
    CREATE TABLE IF NOT EXISTS products (
      id VARCHAR(255) PRIMARY KEY,
      name VARCHAR(255) NOT NULL,
      price DECIMAL(10,2) NOT NULL,
      category VARCHAR(100),
      created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      status VARCHAR(50) DEFAULT 'active'
    )`,
  orders: `
    CREATE TABLE IF NOT EXISTS orders (
      id VARCHAR(255) PRIMARY KEY,
      user_id VARCHAR(255) NOT NULL,
      total_amount DECIMAL(10,2) NOT NULL,
      status VARCHAR(50) DEFAULT 'pending',
      created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY (user_id) REFERENCES users(id)
    )`,
};

const UPDATABLE_USER_COLUMNS = ['username', 'email', 'status'];
const UPDATABLE_PRODUCT_COLUMNS = ['name', 'price', 'category', 'status'];

export interface UserRow {
  id: string;
  username: string;
  email: string;
  created_at: Date | null;
  status: string;
}

export interface WriteResult {
  status: 'created' | 'updated' | 'no_changes' | 'deleted';
  operation: string;
  id: string;
  affected_rows: number;
  updated_fields?: string[];
}

export interface ReadUserResult {
  user_found: boolean;
  user_data: (Omit<UserRow, 'created_at'> & { created_at: string | null }) | null;
}

/**
 * Data access for the demo PostgreSQL schema over one client. Every statement is parameterised
 * and checks the abort signal first, so a workflow deadline stops it between statements.
 */
export class PostgresDAL {
  constructor(
    private readonly client: PgClient,
    private readonly database: string,
    private readonly sink: OperationSink = logOperationRecord,
    private readonly signal?: AbortSignal,
  ) {}

  async connect(): Promise<void> {
    this.signal?.throwIfAborted();
    await executeOperation('pg_connect', this.database, () => this.client.connect(), this.sink);
  }

  async close(): Promise<void> {
    try {
      await this.client.end();
    } catch (error) {
      logger.warn('Failed to close the database connection', { database: this.database, error });
    }
  }

  private async run<T extends QueryResultRow = QueryResultRow>(
    operationKind: string,
    table: string,
    text: string,
    params?: unknown[],
  ): Promise<QueryResult<T>> {
    this.signal?.throwIfAborted();
    return executeOperation(operationKind, `${this.database}.${table}`, () => this.client.query<T>(text, params), this.sink);
  }

  async ensureTables(): Promise<void> {
    for (const [table, statement] of Object.entries(CREATE_TABLES)) {
      await this.run('pg_create_table', table, statement);
    }
    logger.info('Tables are ready', { tables: Object.keys(CREATE_TABLES) });
  }

  async createUser(user: { username: string; email: string }): Promise<WriteResult> {
    const id = randomUUID();
    const result = await this.run(
      'pg_insert',
      'users',
      'INSERT INTO users (id, username, email, status) VALUES ($1, $2, $3, $4)',
      [id, user.username, user.email, 'active'],
    );
    return { status: 'created', operation: 'INSERT', id, affected_rows: result.rowCount ?? 0 };
  }

  async insertProduct(product: { name: string; price: number; category: string }): Promise<WriteResult> {
    const id = randomUUID();
    const result = await this.run(
      'pg_insert',
      'products',
      'INSERT INTO products (id, name, price, category, status) VALUES ($1, $2, $3, $4, $5)',
      [id, product.name, product.price, product.category, 'active'],
    );
    return { status: 'created', operation: 'INSERT_PRODUCT', id, affected_rows: result.rowCount ?? 0 };
  }

  async insertOrder(order: { userId: string; totalAmount: number }): Promise<WriteResult> {
    const id = randomUUID();
    const result = await this.run(
      'pg_insert',
      'orders',
      'INSERT INTO orders (id, user_id, total_amount, status) VALUES ($1, $2, $3, $4)',
      [id, order.userId, order.totalAmount, 'pending'],
    );
    return { status: 'created', operation: 'INSERT_ORDER', id, affected_rows: result.rowCount ?? 0 };
  }

  async readUser(userId: string): Promise<ReadUserResult> {
    const result = await this.run<UserRow>(
      'pg_select',
      'users',
      'SELECT id, username, email, created_at, status FROM users WHERE id = $1',
      [userId],
    );
    const row = result.rows[0];
    if (!row) {
      return { user_found: false, user_data: null };
    }
    return { user_found: true, user_data: { ...row, created_at: row.created_at ? row.created_at.toISOString() : null } };
  }

  async updateUser(userId: string, updates: Record<string, unknown>): Promise<WriteResult> {
    return this.updateColumns('users', 'UPDATE', userId, updates, UPDATABLE_USER_COLUMNS);
  }

  async updateProduct(productId: string, updates: Record<string, unknown>): Promise<WriteResult> {
    return this.updateColumns('products', 'UPDATE_PRODUCT', productId, updates, UPDATABLE_PRODUCT_COLUMNS);
  }

  async updateOrderStatus(orderId: string, status: string): Promise<WriteResult> {
    const result = await this.run(
      'pg_update',
      'orders',
      'UPDATE orders SET status = $1, updated_at = CURRENT_TIMESTAMP WHERE id = $2',
      [status, orderId],
    );
    return {
      status: 'updated',
      operation: 'UPDATE_ORDER_STATUS',
      id: orderId,
      affected_rows: result.rowCount ?? 0,
      updated_fields: ['status'],
    };
  }

  async deleteUser(userId: string): Promise<WriteResult> {
    return this.deleteRow('users', 'DELETE', userId);
  }

  async deleteProduct(productId: string): Promise<WriteResult> {
    return this.deleteRow('products', 'DELETE_PRODUCT', productId);
  }

  async deleteOrder(orderId: string): Promise<WriteResult> {
    return this.deleteRow('orders', 'DELETE_ORDER', orderId);
  }

  // only whitelisted column names are interpolated into the statement
  private async updateColumns(
    table: string,
    operation: string,
    id: string,
    updates: Record<string, unknown>,
    allowedColumns: string[],
  ): Promise<WriteResult> {
    const columns = Object.keys(updates).filter((column) => allowedColumns.includes(column));
    if (columns.length === 0) {
      logger.warn('No valid fields to update', { table, id, fields: Object.keys(updates) });
      return { status: 'no_changes', operation, id, affected_rows: 0, updated_fields: [] };
    }

    const assignments = columns.map((column, index) => `${column} = $${index + 1}`);
    const params = [...columns.map((column) => updates[column]), id];
    const result = await this.run(
      'pg_update',
      table,
      `UPDATE ${table} SET ${assignments.join(', ')}, updated_at = CURRENT_TIMESTAMP WHERE id = $${params.length}`,
      params,
    );
    return { status: 'updated', operation, id, affected_rows: result.rowCount ?? 0, updated_fields: columns };
  }

  private async deleteRow(table: string, operation: string, id: string): Promise<WriteResult> {
    const result = await this.run('pg_delete', table, `DELETE FROM ${table} WHERE id = $1`, [id]);
    return { status: 'deleted', operation, id, affected_rows: result.rowCount ?? 0 };
  }
}
