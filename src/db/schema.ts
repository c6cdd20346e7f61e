import { readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import type pg from 'pg';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const INIT_SQL_PATH = join(__dirname, '../../scripts/init-db.sql');

/**
 * Run the schema script and return the public tables that exist afterwards
 */
export async function applySchema(pool: pg.Pool, scriptPath = INIT_SQL_PATH): Promise<string[]> {
  const initSql = await readFile(scriptPath, 'utf-8');
  await pool.query(initSql);

  const tables = await pool.query<{ table_name: string }>(`
    SELECT table_name
    FROM information_schema.tables
    WHERE table_schema = 'public'
    ORDER BY table_name;
  `);

  return tables.rows.map((row) => row.table_name);
}
