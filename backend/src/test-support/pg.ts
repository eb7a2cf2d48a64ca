import { vi } from 'vitest';
import type pg from 'pg';
import { PgDriver, Row, SqlRunner } from '../database/postgres.js';

export function queryResult(rows: Row[] = [], rowCount: number = rows.length): pg.QueryResult<Row> {
  return { command: 'SELECT', rowCount, oid: 0, fields: [], rows };
}

/**
 * PgDriver whose queries are answered by `respond`. Statements run inside a
 * transaction are recorded as well, bracketed by BEGIN and COMMIT/ROLLBACK.
 */
export function fakePgDriver(respond: (text: string, values: unknown[]) => pg.QueryResult<Row> = () => queryResult()) {
  const statements: Array<{ text: string; values: unknown[] }> = [];
  const query = vi.fn<SqlRunner>(async (text, values = []) => {
    statements.push({ text, values });
    return respond(text, values);
  });
  const end = vi.fn(async () => undefined);

  const driver: PgDriver = {
    query,
    async transaction<T>(fn: (query: SqlRunner) => Promise<T>): Promise<T> {
      statements.push({ text: 'BEGIN', values: [] });
      try {
        const result = await fn(query);
        statements.push({ text: 'COMMIT', values: [] });
        return result;
      } catch (error) {
        statements.push({ text: 'ROLLBACK', values: [] });
        throw error;
      }
    },
    end
  };

  return { driver, query, end, statements };
}
