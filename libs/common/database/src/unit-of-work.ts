/**
 * Unit of work passed explicitly into every durable-store call.
 * `run` acquires a pooled client, wraps the work in a transaction and
 * always releases the client.
 */

import { PoolClient } from 'pg';

export type Queryable = Pick<PoolClient, 'query'>;

export interface UnitOfWork {
  run<T>(work: (db: Queryable) => Promise<T>): Promise<T>;
}

export const UNIT_OF_WORK = Symbol('UNIT_OF_WORK');
