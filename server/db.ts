import pg from "pg";

export function createPool(connectionString: string | undefined): pg.Pool {
  return new pg.Pool({ connectionString });
}

export async function runMigration(pool: pg.Pool, name: string, sql: string): Promise<void> {
  const { rows } = await pool.query(
    `SELECT id FROM schema_migrations WHERE name = $1`,
    [name]
  );
  if (rows.length > 0) return;
  console.log(`[migration] applying: ${name}`);
  await pool.query(sql);
  await pool.query(
    `INSERT INTO schema_migrations (name) VALUES ($1)`,
    [name]
  );
  console.log(`[migration] applied: ${name}`);
}

export async function initDb(pool: pg.Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      name TEXT UNIQUE NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS fitness_daily (
      id BIGSERIAL PRIMARY KEY,
      user_id TEXT NOT NULL,
      day DATE NOT NULL,
      steps INTEGER,
      distance_km NUMERIC(8, 2),
      is_synthetic BOOLEAN DEFAULT false,
      created_at TIMESTAMPTZ DEFAULT NOW(),
      updated_at TIMESTAMPTZ DEFAULT NOW(),
      UNIQUE (user_id, day)
    );

    CREATE TABLE IF NOT EXISTS shealth_imports (
      id TEXT PRIMARY KEY,
      processed_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      user_id TEXT NOT NULL,
      folder TEXT NOT NULL,
      csv_path TEXT,
      date_range_start TEXT,
      date_range_end TEXT,
      rows_inserted INTEGER DEFAULT 0,
      rows_skipped INTEGER DEFAULT 0,
      stats JSONB
    );
  `);

  await runMigration(
    pool,
    "fitness_daily_user_day_idx",
    `CREATE INDEX IF NOT EXISTS fitness_daily_user_day_idx ON fitness_daily (user_id, day)`
  );
}
