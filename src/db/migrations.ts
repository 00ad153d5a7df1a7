import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import type { Pool } from "pg";

export interface Migration {
  name: string;
  upPath: string;
  downPath: string;
}

export const MIGRATIONS_DIRECTORY = path.resolve(process.cwd(), "db/migrations");

const UP_SUFFIX = ".up.sql";
const DOWN_SUFFIX = ".down.sql";

export async function loadMigrations(directory = MIGRATIONS_DIRECTORY): Promise<Migration[]> {
  const files = await readdir(directory);

  return files
    .filter((fileName) => fileName.endsWith(UP_SUFFIX))
    .sort((left, right) => left.localeCompare(right))
    .map((upFileName) => {
      const name = upFileName.slice(0, -UP_SUFFIX.length);
      const downFileName = `${name}${DOWN_SUFFIX}`;
      if (!files.includes(downFileName)) {
        throw new Error(`Missing down migration for ${name}`);
      }

      return {
        name,
        upPath: path.join(directory, upFileName),
        downPath: path.join(directory, downFileName)
      };
    });
}

async function ensureSchemaMigrationsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name text PRIMARY KEY,
      applied_at timestamptz NOT NULL DEFAULT now()
    )
  `);
}

// Each migration file and its bookkeeping row commit together.
async function applyInTransaction(pool: Pool, sqlPath: string, bookkeeping: string, name: string): Promise<void> {
  const sql = await readFile(sqlPath, "utf8");
  const client = await pool.connect();

  try {
    await client.query("BEGIN");
    await client.query(sql);
    await client.query(bookkeeping, [name]);
    await client.query("COMMIT");
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

export async function migrateUp(pool: Pool, directory = MIGRATIONS_DIRECTORY): Promise<string[]> {
  await ensureSchemaMigrationsTable(pool);

  const migrations = await loadMigrations(directory);
  const appliedResult = await pool.query<{ name: string }>("SELECT name FROM schema_migrations");
  const applied = new Set(appliedResult.rows.map((row) => row.name));

  const executed: string[] = [];
  for (const migration of migrations) {
    if (applied.has(migration.name)) {
      continue;
    }

    await applyInTransaction(pool, migration.upPath, "INSERT INTO schema_migrations (name) VALUES ($1)", migration.name);
    executed.push(migration.name);
  }

  return executed;
}

export async function migrateDown(pool: Pool, steps = 1, directory = MIGRATIONS_DIRECTORY): Promise<string[]> {
  if (!Number.isInteger(steps) || steps < 1) {
    throw new Error("steps must be a positive integer");
  }

  await ensureSchemaMigrationsTable(pool);

  const migrations = await loadMigrations(directory);
  const migrationByName = new Map(migrations.map((migration) => [migration.name, migration]));
  const appliedResult = await pool.query<{ name: string }>(
    "SELECT name FROM schema_migrations ORDER BY applied_at DESC, name DESC"
  );

  const rolledBack: string[] = [];
  for (const target of appliedResult.rows.slice(0, steps)) {
    const migration = migrationByName.get(target.name);
    if (!migration) {
      throw new Error(`Applied migration ${target.name} is missing from ${directory}`);
    }

    await applyInTransaction(pool, migration.downPath, "DELETE FROM schema_migrations WHERE name = $1", migration.name);
    rolledBack.push(migration.name);
  }

  return rolledBack;
}
