import type { FeedbackChoice } from "../domain/LogAnalysis.js";

/** One persisted analysis joined with its latest feedback (if any). */
export interface StoredLogRecord {
  id: number;
  created_at: string; // ISO string
  summary: string;
  analysis_json: string;
  feedback_choice: FeedbackChoice | null;
  feedback_text: string | null;
}

export interface LogStorePort {
  /** Returns the id of an identical existing record instead of inserting twice. */
  insertLog(summary: string, analysisJson: string): Promise<number>;
  insertFeedback(logId: number, choice: FeedbackChoice, comment: string): Promise<number>;
  /** Newest first. */
  fetchLogs(limit: number): Promise<StoredLogRecord[]>;
  fetchLogById(id: number): Promise<StoredLogRecord | null>;
}
