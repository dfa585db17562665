import { emptyAnalysis, type LogAnalysisResponse, type SolutionFormat } from "../domain/LogAnalysis.js";
import type { LogStorePort, ModelPort, SearchPort } from "../ports/index.js";
import { PersistenceError, describeError } from "../errors.js";
import { defaultLogger, type Logger } from "../logger.js";
import { buildPrompt, truncateLog, DEFAULT_MAX_LOG_CHARS } from "./prompt.js";
import { invokeWithRetry } from "./invoker.js";
import { extractModelOutput } from "./extract.js";
import { validateAnalysis } from "./validate.js";
import { enrichSolutions, type EnrichOptions } from "./enrich.js";

export type PersistenceStatus =
  | { status: "saved"; logId: number }
  | { status: "skipped" }
  | { status: "cancelled" }
  | { status: "failed"; error: PersistenceError };

export interface AnalysisOutcome {
  response: LogAnalysisResponse;
  persistence: PersistenceStatus;
}

export interface PipelineOptions {
  maxAttempts?: number;
  backoffMs?: number;
  maxChars?: number;
  solutionFormat?: SolutionFormat;
  enrichment?: boolean; // default: true when a search port is given
  search?: Omit<EnrichOptions, "logger">;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface PipelineDeps {
  model: ModelPort;
  store: LogStorePort;
  search?: SearchPort;
  logger?: Logger;
  options?: PipelineOptions;
  signal?: AbortSignal;
}

async function analyzeText(logText: string, deps: PipelineDeps, log: Logger): Promise<LogAnalysisResponse> {
  const opts = deps.options ?? {};

  // 1) prompt
  const prompt = buildPrompt(logText, { maxChars: opts.maxChars, format: opts.solutionFormat });

  // 2) model, with bounded retry
  const raw = await invokeWithRetry(deps.model, prompt, {
    maxAttempts: opts.maxAttempts,
    backoffMs: opts.backoffMs,
    sleep: opts.sleep,
    signal: deps.signal,
    logger: log
  });

  if (deps.signal?.aborted) return emptyAnalysis();

  // 3) + 4) extract and validate
  const response = validateAnalysis(extractModelOutput(raw, log), log);

  // 5) reference links (best effort)
  if (deps.search && opts.enrichment !== false && response.possible_solutions.length) {
    response.possible_solutions = await enrichSolutions(response.possible_solutions, deps.search, {
      ...opts.search,
      logger: log
    });
  }
  return response;
}

/**
 * Runs one analysis end to end and stores it. Never rejects: model, parsing and
 * enrichment problems degrade to an empty analysis, and a failed write is reported
 * in `persistence` while the analysis is still returned. An aborted `signal` yields an
 * empty, unstored analysis with status `cancelled`.
 */
export async function runLogAnalysis(logText: string, deps: PipelineDeps): Promise<AnalysisOutcome> {
  const log = deps.logger ?? defaultLogger;

  if (typeof logText !== "string" || !logText.trim()) {
    log.info("empty log text, skipping analysis", { stage: "pipeline" });
    return { response: emptyAnalysis(), persistence: { status: "skipped" } };
  }

  let response: LogAnalysisResponse;
  try {
    response = await analyzeText(logText, deps, log);
  } catch (err) {
    log.error(`analysis failed: ${describeError(err)}`, { stage: "pipeline" });
    response = emptyAnalysis();
  }

  // cancelled runs are never stored
  if (deps.signal?.aborted) {
    log.warn("analysis cancelled, nothing stored", { stage: "pipeline" });
    return { response: emptyAnalysis(), persistence: { status: "cancelled" } };
  }

  const summary = truncateLog(logText, deps.options?.maxChars ?? DEFAULT_MAX_LOG_CHARS);
  try {
    const logId = await deps.store.insertLog(summary, JSON.stringify(response, null, 2));
    log.info("analysis stored", {
      stage: "pipeline",
      logId,
      errors: response.errors.length,
      solutions: response.possible_solutions.length
    });
    return { response: { ...response, log_id: logId }, persistence: { status: "saved", logId } };
  } catch (err) {
    const error = new PersistenceError("insertLog", err);
    log.error(error.message, { stage: "pipeline" });
    return { response, persistence: { status: "failed", error } };
  }
}
