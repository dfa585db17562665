import {
  FlatSolutionSchema,
  LogErrorSchema,
  PhasedSolutionSchema,
  UNKNOWN_ERROR_MESSAGE,
  UNKNOWN_ERROR_TYPE,
  type LogAnalysisResponse,
  type LogError,
  type PossibleSolution
} from "../domain/LogAnalysis.js";
import { defaultLogger, type Logger } from "../logger.js";
import { extractModelOutput, isRecord, type NormalizedOutput } from "./extract.js";

const isBlank = (v: unknown) => v === undefined || v === null || (typeof v === "string" && v.trim() === "");

function repairError(record: Record<string, unknown>): Record<string, unknown> {
  return {
    ...record,
    error_message: isBlank(record.error_message) ? UNKNOWN_ERROR_MESSAGE : record.error_message,
    error_type: isBlank(record.error_type) ? UNKNOWN_ERROR_TYPE : record.error_type,
    timestamp: typeof record.timestamp === "string" ? record.timestamp : null
  };
}

export function toLogError(record: unknown, logger: Logger = defaultLogger): LogError | null {
  const first = LogErrorSchema.safeParse(record);
  if (first.success) return first.data;

  if (!isRecord(record)) {
    logger.warn("dropping error record that is not an object", { stage: "validate" });
    return null;
  }

  const second = LogErrorSchema.safeParse(repairError(record));
  if (second.success) {
    logger.info("repaired error record", { stage: "validate", issues: first.error.issues.length });
    return second.data;
  }
  logger.warn("dropping unrepairable error record", {
    stage: "validate",
    issues: second.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
  });
  return null;
}

export function toPossibleSolution(record: unknown, logger: Logger = defaultLogger): PossibleSolution | null {
  const phased = PhasedSolutionSchema.safeParse(record);
  if (phased.success) return phased.data;

  const flat = FlatSolutionSchema.safeParse(record);
  if (flat.success) return flat.data;

  logger.warn("dropping invalid solution record", {
    stage: "validate",
    issues: phased.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
  });
  return null;
}

/**
 * Converts extracted model output into typed records, one by one.
 * Output lists keep input order and are never longer than the input.
 */
export function validateAnalysis(normalized: NormalizedOutput, logger: Logger = defaultLogger): LogAnalysisResponse {
  const errors: LogError[] = [];
  for (const record of normalized.errors) {
    const e = toLogError(record, logger);
    if (e) errors.push(e);
  }

  const possible_solutions: PossibleSolution[] = [];
  for (const record of normalized.possible_solutions) {
    const s = toPossibleSolution(record, logger);
    if (s) possible_solutions.push(s);
  }

  return { log_id: null, errors, possible_solutions };
}

/** Decodes a persisted `analysis_json`; null when it is no longer a JSON object. */
export function parseStoredAnalysis(
  json: string,
  logId: number,
  logger: Logger = defaultLogger
): LogAnalysisResponse | null {
  let stored: unknown;
  try {
    stored = JSON.parse(json);
  } catch {
    logger.warn("stored analysis is not valid JSON", { stage: "history", logId });
    return null;
  }
  if (!isRecord(stored)) return null;

  const response = validateAnalysis(extractModelOutput(json, logger), logger);
  return { ...response, log_id: logId };
}
