import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { Pool } from 'pg';
import type { SqlClient } from '../../shared/sql';

const SCHEMA_PATH = fileURLToPath(new URL('../../../../sql/schema.sql', import.meta.url));

export const createPgSqlClient = (pool: Pool): SqlClient => ({
  async query<T>(text: string, params?: unknown[]) {
    const result = await pool.query(text, params);
    const rows: T[] = result.rows;
    return { rows, rowCount: result.rowCount };
  }
});

/**
 * Applies sql/schema.sql. Every statement is idempotent, so this runs on
 * each start.
 */
export const migrate = async (sql: SqlClient, schemaPath: string = SCHEMA_PATH) => {
  const ddl = await readFile(schemaPath, 'utf8');
  await sql.query(ddl);
};
