import { QueryResultRow } from 'pg';

export interface RecordedQuery {
  text: string;
  values: unknown[];
}

type Responder = (text: string, values: unknown[]) => QueryResultRow[];

/**
 * In-process stand-in for a pg Pool.
 * Every query is recorded with collapsed whitespace and answered by `respond`.
 */
export function createFakePool(respond: Responder = () => []) {
  const queries: RecordedQuery[] = [];

  const query = jest.fn();
  query.mockImplementation(async (text: string, values: unknown[] = []) => {
    queries.push({ text: text.replace(/\s+/g, ' ').trim(), values });
    const rows = respond(text, values);
    return { rows, rowCount: rows.length, command: '', oid: 0, fields: [] };
  });

  const client = { query, release: jest.fn() };
  const pool = { query, connect: jest.fn(async () => client) };

  return { pool, client, queries };
}

/**
 * Statements other than transaction control, in execution order
 */
export function statements(queries: RecordedQuery[]): RecordedQuery[] {
  return queries.filter(q => !['BEGIN', 'COMMIT', 'ROLLBACK'].includes(q.text));
}
