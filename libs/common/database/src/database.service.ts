/**
 * ContactBook Database Service
 * PostgreSQL connection pool, schema bootstrap and unit of work
 */

import { Injectable, Logger, OnModuleInit, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, PoolClient, types } from 'pg';
import retry from 'async-retry';
import * as fs from 'fs/promises';
import * as path from 'path';
import { Queryable, UnitOfWork } from './unit-of-work';
import { withTransaction } from './with-transaction';

// DATE columns stay 'YYYY-MM-DD' strings instead of local-midnight Dates
const PG_DATE_OID = 1082;
types.setTypeParser(PG_DATE_OID, (value: string) => value);

@Injectable()
export class DatabaseService implements UnitOfWork, OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool: Pool | null = null;

  constructor(private configService: ConfigService) {}

  async onModuleInit() {
    const databaseUrl = this.configService.get<string>('databaseUrl');
    if (!databaseUrl) {
      throw new Error('databaseUrl is required. Set DATABASE_URL in environment');
    }

    this.pool = new Pool({
      connectionString: databaseUrl,
      min: 2,
      max: 10,
      connectionTimeoutMillis: 10000,
      idleTimeoutMillis: 30000,
    });

    this.pool.on('error', (error) => {
      this.logger.error(`Idle client error: ${error.message}`);
    });

    this.logger.log('Database pool initialized');

    await this.applySchema(this.pool);
  }

  async onModuleDestroy() {
    await this.pool?.end();
    this.pool = null;
  }

  /**
   * Run `work` in a transaction on a dedicated client
   */
  async run<T>(work: (db: Queryable) => Promise<T>): Promise<T> {
    return withTransaction<PoolClient, T>(this.getPool(), work);
  }

  private getPool(): Pool {
    if (!this.pool) {
      throw new Error('Database pool is not initialized');
    }
    return this.pool;
  }

  /**
   * Apply the idempotent schema file, retrying while the database starts up
   */
  private async applySchema(pool: Pool): Promise<void> {
    const schemaPath = path.resolve(
      this.configService.get<string>('schemaPath') ?? 'sql/schema.sql',
    );
    const sql = await fs.readFile(schemaPath, 'utf8');

    await retry(
      async () => {
        await pool.query(sql);
      },
      {
        retries: 5,
        minTimeout: 1000, // 1 second
        maxTimeout: 10000, // 10 seconds
        onRetry: (error, attempt) => {
          this.logger.warn(
            `Schema apply retry attempt ${attempt}/5: ${error instanceof Error ? error.message : String(error)}`,
          );
        },
      },
    );

    this.logger.log(`Schema applied from ${schemaPath}`);
  }
}
