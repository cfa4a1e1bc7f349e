import pg from 'pg';

export interface DatabaseCredentials {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly query?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DatabaseError';
  }
}

let pool: pg.Pool | null = null;

export namespace Postgres {
  /**
   * A parameterized statement; values are bound by `pg`, never interpolated.
   */
  export class Query {
    constructor(
      public readonly query: string,
      public readonly values: unknown[] = []
    ) {}
  }

  export async function connect(credentials: DatabaseCredentials) {
    if (pool) {
      return;
    }
    const candidate = new pg.Pool(credentials);
    const client = await candidate.connect();
    client.release();
    pool = candidate;
  }

  function getPool(): pg.Pool {
    if (!pool) {
      throw new DatabaseError('Postgres is not connected');
    }
    return pool;
  }

  export async function query<Model extends pg.QueryResultRow>(
    q: Query
  ): Promise<Model[]> {
    try {
      const result = await getPool().query<Model>(q.query, q.values);
      return result.rows;
    } catch (err) {
      if (err instanceof DatabaseError) throw err;
      throw new DatabaseError(
        err instanceof Error ? err.message : String(err),
        q.query,
        { cause: err }
      );
    }
  }

  /**
   * Runs every query on one client inside BEGIN/COMMIT; any failure rolls
   * the whole batch back.
   */
  export async function transaction<Model extends pg.QueryResultRow>(
    qs: Query[]
  ): Promise<Model[]> {
    const client = await getPool().connect();
    let current: Query | undefined;
    try {
      await client.query('BEGIN');
      let rows: Model[] = [];
      for (const q of qs) {
        current = q;
        rows = (await client.query<Model>(q.query, q.values)).rows;
      }
      await client.query('COMMIT');
      return rows;
    } catch (err) {
      await client.query('ROLLBACK');
      throw new DatabaseError(
        err instanceof Error ? err.message : String(err),
        current?.query,
        { cause: err }
      );
    } finally {
      client.release();
    }
  }

  export async function shutdown() {
    if (!pool) {
      return;
    }
    const closing = pool;
    pool = null;
    await closing.end();
  }
}
