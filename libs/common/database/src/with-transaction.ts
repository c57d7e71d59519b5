/**
 * Transaction helper
 * BEGIN / COMMIT, ROLLBACK on failure, client always released.
 * A client whose ROLLBACK fails is released with the error so the
 * pool discards it.
 */

export interface TransactionClient {
  query(text: string): Promise<unknown>;
  release(err?: Error | boolean): void;
}

export interface TransactionPool<C extends TransactionClient> {
  connect(): Promise<C>;
}

/**
 * @param pool - connection pool (pg Pool in production)
 * @param fn - work to run with the client inside the transaction
 */
export async function withTransaction<C extends TransactionClient, T>(
  pool: TransactionPool<C>,
  fn: (client: C) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  let releaseError: Error | undefined;

  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      releaseError =
        rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
    });
    throw error;
  } finally {
    client.release(releaseError);
  }
}
