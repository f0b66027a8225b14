import { readdir, readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { errorMessage } from '../errors.js';
import { closePool, getPool, withTransaction } from './client.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const SQL_DIR = join(__dirname, '../../sql');
export const SCHEMA = 'wheel';

/** `.sql` files not yet recorded in `_migrations`, in filename order (001_, 002_, ...). */
export function pendingMigrations(files: readonly string[], applied: ReadonlySet<string>): string[] {
  return files.filter(f => f.endsWith('.sql') && !applied.has(f)).sort();
}

/** Applies pending wheel-schema migrations, one transaction per file. Returns the filenames applied. */
export async function runMigrations(): Promise<string[]> {
  const pool = getPool();

  await pool.query(`CREATE SCHEMA IF NOT EXISTS ${SCHEMA}`);
  await pool.query(`
    CREATE TABLE IF NOT EXISTS ${SCHEMA}._migrations (
      filename TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const { rows } = await pool.query<{ filename: string }>(`SELECT filename FROM ${SCHEMA}._migrations`);

  let files: string[];
  try {
    files = await readdir(SQL_DIR);
  } catch (err) {
    console.warn(`[DB] SQL directory not readable at ${SQL_DIR} (${errorMessage(err)}), skipping migrations`);
    return [];
  }

  const pending = pendingMigrations(files, new Set(rows.map(r => r.filename)));
  for (const file of pending) {
    const sql = await readFile(join(SQL_DIR, file), 'utf-8');
    try {
      await withTransaction(async client => {
        await client.query(sql);
        await client.query(`INSERT INTO ${SCHEMA}._migrations (filename) VALUES ($1)`, [file]);
      });
    } catch (err) {
      throw new Error(`Migration failed for ${file}: ${errorMessage(err)}`);
    }
    console.log(`[DB] Applied migration ${file}`);
  }

  console.log(
    pending.length === 0
      ? `[DB] Wheel schema up to date (${rows.length} migration(s) recorded)`
      : `[DB] Applied ${pending.length} migration(s) to the ${SCHEMA} schema`,
  );
  return pending;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  runMigrations()
    .then(() => closePool())
    .then(() => process.exit(0))
    .catch(err => { console.error('[DB]', errorMessage(err)); process.exit(1); });
}
