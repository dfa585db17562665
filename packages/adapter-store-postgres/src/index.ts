import pg from "pg";
import type { FeedbackChoice, LogStorePort, StoredLogRecord } from "@loglens/core";
import { SCHEMA_SQL } from "./schema.js";

export { SCHEMA_SQL };

export interface PostgresStoreOptions {
  pool?: pg.Pool;            // allow DI for tests
  connectionString?: string; // default: process.env.DATABASE_URL
}

export interface PostgresLogStore extends LogStorePort {
  /** Creates the tables if they are missing. Safe to call on every start. */
  ensureSchema(): Promise<void>;
  close(): Promise<void>;
}

type LogRow = {
  id: number;
  created_at: Date | string;
  summary: string;
  analysis_json: string;
};

type FeedbackRow = {
  log_id: number;
  feedback_choice: string;
  feedback_text: string;
};

const toIso = (d: Date | string) => (d instanceof Date ? d.toISOString() : new Date(d).toISOString());

const asChoice = (c: string): FeedbackChoice | null => (c === "Yes" || c === "No" ? c : null);

export function makePostgresStore(opts: PostgresStoreOptions = {}): PostgresLogStore {
  const pool = opts.pool ?? new pg.Pool({ connectionString: opts.connectionString ?? process.env.DATABASE_URL });

  /** Latest feedback per log, in one query for the whole batch. */
  async function latestFeedback(logIds: number[]): Promise<Map<number, FeedbackRow>> {
    const latest = new Map<number, FeedbackRow>();
    if (!logIds.length) return latest;
    const placeholders = logIds.map((_, i) => `$${i + 1}`).join(", ");
    const { rows } = await pool.query<FeedbackRow>(
      `SELECT log_id, feedback_choice, feedback_text
         FROM log_feedback
        WHERE log_id IN (${placeholders})
        ORDER BY created_at DESC, id DESC`,
      logIds
    );
    for (const row of rows) {
      const logId = Number(row.log_id);
      if (!latest.has(logId)) latest.set(logId, row);
    }
    return latest;
  }

  async function toRecords(rows: LogRow[]): Promise<StoredLogRecord[]> {
    const feedback = await latestFeedback(rows.map((r) => Number(r.id)));
    return rows.map((row) => {
      const fb = feedback.get(Number(row.id));
      return {
        id: Number(row.id),
        created_at: toIso(row.created_at),
        summary: row.summary,
        analysis_json: row.analysis_json,
        feedback_choice: fb ? asChoice(fb.feedback_choice) : null,
        feedback_text: fb ? fb.feedback_text : null
      };
    });
  }

  return {
    async ensureSchema() {
      const statements = SCHEMA_SQL.split(";")
        .map((s) => s.trim())
        .filter(Boolean);
      for (const statement of statements) {
        await pool.query(statement);
      }
    },

    async insertLog(summary, analysisJson) {
      // Same input and same analysis: hand back the existing row
      const existing = await pool.query<{ id: number }>(
        "SELECT id FROM log_analyses WHERE summary = $1 AND analysis_json = $2 ORDER BY id LIMIT 1",
        [summary, analysisJson]
      );
      if (existing.rows[0]) return Number(existing.rows[0].id);

      const inserted = await pool.query<{ id: number }>(
        "INSERT INTO log_analyses (summary, analysis_json) VALUES ($1, $2) RETURNING id",
        [summary, analysisJson]
      );
      return Number(inserted.rows[0].id);
    },

    async insertFeedback(logId, choice, comment) {
      const { rows } = await pool.query<{ id: number }>(
        "INSERT INTO log_feedback (log_id, feedback_choice, feedback_text) VALUES ($1, $2, $3) RETURNING id",
        [logId, choice, comment]
      );
      return Number(rows[0].id);
    },

    async fetchLogs(limit) {
      const { rows } = await pool.query<LogRow>(
        `SELECT id, created_at, summary, analysis_json
           FROM log_analyses
          ORDER BY created_at DESC, id DESC
          LIMIT $1`,
        [limit]
      );
      return toRecords(rows);
    },

    async fetchLogById(id) {
      const { rows } = await pool.query<LogRow>(
        "SELECT id, created_at, summary, analysis_json FROM log_analyses WHERE id = $1",
        [id]
      );
      const [record] = await toRecords(rows);
      return record ?? null;
    },

    async close() {
      await pool.end();
    }
  };
}
