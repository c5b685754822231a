import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { AsyncLocalStorage } from 'node:async_hooks';
import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { TransactionRunner } from './transaction-runner';

@Injectable()
export class PostgresService implements TransactionRunner, OnModuleDestroy {
  private readonly pool: Pool;
  private readonly transactions = new AsyncLocalStorage<PoolClient>();

  constructor() {
    const connectionString = process.env.DATABASE_URL;

    this.pool = new Pool(
      connectionString
        ? { connectionString }
        : {
            host: process.env.DB_HOST ?? 'localhost',
            port: Number(process.env.DB_PORT ?? 5432),
            database: process.env.DB_NAME ?? 'campaign_dispatch',
            user: process.env.DB_USER ?? 'app',
            password: process.env.DB_PASSWORD ?? 'app'
          }
    );
  }

  /** Runs on the transaction opened by `runInTransaction` when called inside one. */
  query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    values: unknown[] = []
  ): Promise<QueryResult<T>> {
    const client = this.transactions.getStore();
    return client ? client.query<T>(text, values) : this.pool.query<T>(text, values);
  }

  async runInTransaction<T>(work: () => Promise<T>): Promise<T> {
    if (this.transactions.getStore()) {
      return work();
    }

    const client = await this.pool.connect();
    let releaseError: Error | undefined;

    try {
      await client.query('begin');
      const result = await this.transactions.run(client, work);
      await client.query('commit');
      return result;
    } catch (error) {
      try {
        await client.query('rollback');
      } catch (rollbackError) {
        // a connection that cannot roll back is destroyed instead of returned to the pool
        releaseError = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      }
      throw error;
    } finally {
      client.release(releaseError);
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
  }
}
