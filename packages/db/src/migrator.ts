import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';

export const MIGRATIONS_DIR = join(__dirname, '..', 'migrations');

/** Satisfied by a pg `PoolClient`. */
export interface MigrationClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface MigrationSource {
  list(): Promise<string[]>;
  read(name: string): Promise<string>;
}

export function directorySource(dir: string = MIGRATIONS_DIR): MigrationSource {
  return {
    async list() {
      return (await readdir(dir)).filter((f) => f.endsWith('.sql')).sort();
    },
    read(name) {
      return readFile(join(dir, name), 'utf-8');
    },
  };
}

function isNamedRow(row: unknown): row is { name: string } {
  return typeof row === 'object' && row !== null && 'name' in row && typeof row.name === 'string';
}

/**
 * Applies pending migrations in file-name order, each in its own
 * transaction, and returns the names applied.
 */
export async function applyMigrations(
  client: MigrationClient,
  source: MigrationSource = directorySource(),
): Promise<string[]> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name VARCHAR(255) PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const applied = await client.query('SELECT name FROM _migrations ORDER BY name');
  const appliedSet = new Set(applied.rows.flatMap((row) => (isNamedRow(row) ? [row.name] : [])));
  const newlyApplied: string[] = [];

  for (const file of await source.list()) {
    if (appliedSet.has(file)) continue;

    const sql = await source.read(file);

    await client.query('BEGIN');
    try {
      await client.query(sql);
      await client.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
      await client.query('COMMIT');
      newlyApplied.push(file);
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    }
  }

  return newlyApplied;
}
