export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS log_analyses (
  id SERIAL PRIMARY KEY,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  summary TEXT NOT NULL,
  analysis_json TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS log_feedback (
  id SERIAL PRIMARY KEY,
  log_id INTEGER NOT NULL REFERENCES log_analyses(id),
  feedback_choice TEXT NOT NULL,
  feedback_text TEXT NOT NULL DEFAULT '',
  created_at TIMESTAMPTZ NOT NULL DEFAULT now()
);
`;
