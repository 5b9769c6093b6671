import 'dotenv/config';
import mysql from 'mysql2/promise';

export type DB = mysql.Pool;

let pool: mysql.Pool | undefined;

export function getPool(): DB {
  if (pool) return pool;

  const host = process.env.DB_HOST || '127.0.0.1';
  const port = Number(process.env.DB_PORT || 3306);
  const user = process.env.DB_USER || 'root';
  const password = process.env.DB_PASSWORD || '';
  const database = process.env.DB_NAME || 'cutline';

  const created = mysql.createPool({
    host,
    port,
    user,
    password,
    database,
    connectionLimit: Number(process.env.DB_POOL_LIMIT || 10),
    waitForConnections: true,
    queueLimit: 0,
    dateStrings: true,
  });
  pool = created;

  const close = async () => {
    try {
      await created.end();
    } catch (e) {
      console.warn('db_pool_close_failed', e);
    }
  };
  process.once('SIGINT', close);
  process.once('SIGTERM', close);

  return created;
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const p = pool;
  pool = undefined;
  await p.end();
}

// Hierarchical metadata documents keyed by slash-separated path
// (e.g. projects/{user}/{project}).
export async function ensureSchema(db: DB) {
  await db.query(`
    CREATE TABLE IF NOT EXISTS metadata_nodes (
      path VARCHAR(768) NOT NULL PRIMARY KEY,
      doc JSON NOT NULL,
      created_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
      updated_at TIMESTAMP NULL DEFAULT CURRENT_TIMESTAMP ON UPDATE CURRENT_TIMESTAMP
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci;
  `);
}
