import type pg from "pg";
import * as crypto from "node:crypto";
import type { PipelineStats, TimelineEntry } from "./shealth/types";

export interface DailyRow {
  day: string;
  steps: number | null;
  distanceKm: number | null;
}

export interface InsertCounts {
  inserted: number;
  skipped: number;
}

export interface ImportRun {
  id: string;
  processedAt: string;
  userId: string;
  folder: string;
  csvPath: string | null;
  dateRangeStart: string;
  dateRangeEnd: string;
  rowsInserted: number;
  rowsSkipped: number;
  stats: PipelineStats;
}

export type NewImportRun = Omit<ImportRun, "id" | "processedAt">;

/** Persistence for reconstructed days. Existing (user, day) rows are never overwritten. */
export interface DailyStore {
  insertDays(userId: string, rows: readonly TimelineEntry[]): Promise<InsertCounts>;
  getDailyRange(userId: string, from: string, to: string): Promise<DailyRow[]>;
  recordImport(run: NewImportRun): Promise<ImportRun>;
  listImports(userId: string, limit: number): Promise<ImportRun[]>;
}

export class PgDailyStore implements DailyStore {
  constructor(private readonly pool: pg.Pool) {}

  async insertDays(userId: string, rows: readonly TimelineEntry[]): Promise<InsertCounts> {
    let inserted = 0;
    let skipped = 0;
    for (const row of rows) {
      const { rowCount } = await this.pool.query(
        `INSERT INTO fitness_daily (user_id, day, steps, distance_km)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (user_id, day) DO NOTHING`,
        [userId, row.date, row.steps, row.distanceKm],
      );
      if (rowCount && rowCount > 0) inserted++;
      else skipped++;
    }
    return { inserted, skipped };
  }

  async getDailyRange(userId: string, from: string, to: string): Promise<DailyRow[]> {
    const { rows } = await this.pool.query<DailyRow>(
      `SELECT
         day::text AS day,
         steps,
         distance_km::float8 AS "distanceKm"
       FROM fitness_daily
       WHERE user_id = $1 AND day >= $2::date AND day <= $3::date
       ORDER BY day`,
      [userId, from, to],
    );
    return rows;
  }

  async recordImport(run: NewImportRun): Promise<ImportRun> {
    const id = crypto.randomUUID();
    const { rows } = await this.pool.query<{ processedAt: string }>(
      `INSERT INTO shealth_imports (id, user_id, folder, csv_path, date_range_start, date_range_end, rows_inserted, rows_skipped, stats)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING processed_at::text AS "processedAt"`,
      [
        id,
        run.userId,
        run.folder,
        run.csvPath,
        run.dateRangeStart,
        run.dateRangeEnd,
        run.rowsInserted,
        run.rowsSkipped,
        JSON.stringify(run.stats),
      ],
    );
    return { ...run, id, processedAt: rows[0]?.processedAt ?? new Date().toISOString() };
  }

  async listImports(userId: string, limit: number): Promise<ImportRun[]> {
    const { rows } = await this.pool.query<ImportRun>(
      `SELECT
         id,
         processed_at::text AS "processedAt",
         user_id AS "userId",
         folder,
         csv_path AS "csvPath",
         date_range_start AS "dateRangeStart",
         date_range_end AS "dateRangeEnd",
         rows_inserted AS "rowsInserted",
         rows_skipped AS "rowsSkipped",
         stats
       FROM shealth_imports
       WHERE user_id = $1
       ORDER BY processed_at DESC
       LIMIT $2`,
      [userId, Math.max(1, Math.min(limit, 100))],
    );
    return rows;
  }
}
