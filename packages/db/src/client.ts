import { Pool, type PoolConfig } from 'pg'

/**
 * Untyped result of a query. Rows are validated by the caller.
 */
export interface QueryOutcome {
  rows: Record<string, unknown>[]
  rowCount: number | null
}

/**
 * Minimal query surface shared by the stores. A pg Pool satisfies it through
 * fromPool(); tests provide an in-process fake.
 */
export interface Queryable {
  query(text: string, values?: readonly unknown[]): Promise<QueryOutcome>
}

export function createPool(databaseUrl: string, config: Omit<PoolConfig, 'connectionString'> = {}): Pool {
  return new Pool({
    connectionString: databaseUrl.trim(),
    max: 4,
    idleTimeoutMillis: 10_000,
    ...config,
  })
}

export function fromPool(pool: Pool): Queryable {
  return {
    async query(text, values) {
      const result = await pool.query(text, values ? [...values] : undefined)
      return { rows: result.rows, rowCount: result.rowCount }
    },
  }
}
