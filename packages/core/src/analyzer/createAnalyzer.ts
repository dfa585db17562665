import {
  FeedbackChoiceSchema,
  type LogAnalysisResponse
} from "../domain/LogAnalysis.js";
import type { LogStorePort, ModelPort, SearchPort, StoredLogRecord } from "../ports/index.js";
import { InvalidFeedbackError, PersistenceError } from "../errors.js";
import { defaultLogger, type Logger } from "../logger.js";
import type { AppConfig } from "../config.js";
import { runLogAnalysis, type AnalysisOutcome, type PipelineOptions } from "./pipeline.js";
import { parseStoredAnalysis } from "./validate.js";

export interface AnalyzerConfig {
  model: ModelPort;
  store: LogStorePort;
  search?: SearchPort;
  logger?: Logger;
  options?: PipelineOptions;
}

export interface AnalysisHistoryEntry extends StoredLogRecord {
  /** null when the stored JSON no longer decodes */
  analysis: LogAnalysisResponse | null;
}

export interface Analyzer {
  /** Never rejects; `log_id` is null when the analysis could not be stored. */
  analyze(logText: string, signal?: AbortSignal): Promise<LogAnalysisResponse>;
  analyzeWithStatus(logText: string, signal?: AbortSignal): Promise<AnalysisOutcome>;
  /** `choice` comes straight from the UI, so anything other than "Yes"/"No" is rejected here. */
  submitFeedback(logId: number, choice: string, comment?: string): Promise<number>;
  recentAnalyses(limit?: number): Promise<AnalysisHistoryEntry[]>;
  getAnalysis(logId: number): Promise<AnalysisHistoryEntry | null>;
}

/** Maps the app config onto pipeline options. */
export function pipelineOptionsFromConfig(cfg: AppConfig): PipelineOptions {
  return {
    maxAttempts: cfg.pipeline.maxAttempts,
    backoffMs: cfg.pipeline.backoffMs,
    maxChars: cfg.pipeline.maxChars,
    solutionFormat: cfg.pipeline.solutionFormat,
    enrichment: cfg.pipeline.enrichment,
    search: {
      maxResults: cfg.search.maxResults,
      timeoutMs: cfg.search.timeoutMs,
      concurrency: cfg.search.concurrency
    }
  };
}

async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new PersistenceError(operation, err);
  }
}

export function createAnalyzer(cfg: AnalyzerConfig): Analyzer {
  const { model, store, search, options } = cfg;
  const logger = cfg.logger ?? defaultLogger;

  const toEntry = (r: StoredLogRecord): AnalysisHistoryEntry => ({
    ...r,
    analysis: parseStoredAnalysis(r.analysis_json, r.id, logger)
  });

  const analyzeWithStatus = (logText: string, signal?: AbortSignal) =>
    runLogAnalysis(logText, { model, store, search, logger, options, signal });

  return {
    analyzeWithStatus,

    async analyze(logText, signal) {
      const outcome = await analyzeWithStatus(logText, signal);
      return outcome.response;
    },

    async submitFeedback(logId, choice, comment = "") {
      if (!Number.isInteger(logId) || logId <= 0) {
        throw new InvalidFeedbackError(`invalid log id: ${logId}`);
      }
      const parsed = FeedbackChoiceSchema.safeParse(choice);
      if (!parsed.success) {
        throw new InvalidFeedbackError(`feedback choice must be "Yes" or "No", got ${JSON.stringify(choice)}`);
      }
      const id = await guard("insertFeedback", () => store.insertFeedback(logId, parsed.data, comment.trim()));
      logger.info("feedback stored", { logId, choice: parsed.data });
      return id;
    },

    async recentAnalyses(limit = 10) {
      const rows = await guard("fetchLogs", () => store.fetchLogs(Math.max(1, Math.floor(limit))));
      return rows.map(toEntry);
    },

    async getAnalysis(logId) {
      const row = await guard("fetchLogById", () => store.fetchLogById(logId));
      return row ? toEntry(row) : null;
    }
  };
}
