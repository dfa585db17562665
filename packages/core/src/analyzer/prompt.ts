import type { SolutionFormat } from "../domain/LogAnalysis.js";

export const DEFAULT_MAX_LOG_CHARS = 50_000;

export interface PromptOptions {
  maxChars?: number;       // default: 50_000
  format?: SolutionFormat; // default: "phased"
}

const PHASED_SCHEMA = `{
  "errors": [
    {
      "timestamp": "timestamp or null",
      "error_message": "clear summary of error",
      "error_type": "ApplicationError|SystemError|ConfigError|TimeoutError|etc"
    }
  ],
  "possible_solutions": [
    {
      "error_message": "same as matching error_message above",
      "search_keywords": "short web search query for this error",
      "immediate_fix": {
        "summary": "short overview of immediate fix",
        "steps": ["Step 1 with explanation", "Step 2 with explanation", "Step 3 with explanation"]
      },
      "permanent_fix": {
        "summary": "short overview of permanent fix",
        "steps": ["Code/config change with justification", "Testing or validation step", "Deployment step"]
      },
      "preventive_measures": {
        "summary": "short overview of prevention",
        "steps": ["Monitoring or alerting setup", "Automated validation setup", "Process improvement"]
      }
    }
  ]
}`;

const FLAT_SCHEMA = `{
  "errors": [
    {
      "timestamp": "timestamp or null",
      "error_message": "clear summary of error",
      "error_type": "ApplicationError|SystemError|ConfigError|TimeoutError|etc"
    }
  ],
  "possible_solutions": [
    {
      "error_message": "same as matching error_message above",
      "solutions": [
        { "solution_text": "Step 1", "search_keywords": "how to fix step 1" },
        { "solution_text": "Step 2", "search_keywords": "how to fix step 2" }
      ]
    }
  ]
}`;

const SOLUTION_STEP: Record<SolutionFormat, string> = {
  phased: "3. Provide solutions with immediate_fix, permanent_fix, and preventive_measures",
  flat: "3. Provide ordered solution steps, each with short search keywords"
};

/** Cuts the log to `maxChars` and marks how much was dropped. */
export function truncateLog(logText: string, maxChars = DEFAULT_MAX_LOG_CHARS): string {
  if (logText.length <= maxChars) return logText;
  const dropped = logText.length - maxChars;
  return `${logText.slice(0, maxChars)}\n...[truncated ${dropped} characters]`;
}

export function buildPrompt(logText: string, opts: PromptOptions = {}): string {
  const format = opts.format ?? "phased";
  const schema = format === "flat" ? FLAT_SCHEMA : PHASED_SCHEMA;
  const log = truncateLog(logText, opts.maxChars ?? DEFAULT_MAX_LOG_CHARS);

  return `You are an expert Root Cause Analysis (RCA) analyst for technical systems.

Your task is to analyze log entries and identify errors and their solutions.

ANALYSIS STEPS:
1. Identify all error events in the log
2. For each error, determine the error type (ApplicationError, SystemError, ConfigError, TimeoutError, etc.)
${SOLUTION_STEP[format]}

REQUIRED OUTPUT FORMAT - Return ONLY valid JSON:
${schema}

RULES:
- Use only factual evidence from the logs
- Explain why each error occurred, not just that it occurred
- If no errors found, return empty arrays for errors and possible_solutions
- Output ONLY the JSON structure above, no additional text

Now analyze this log:

${log}

Remember to return ONLY valid JSON in the specified format above.
`;
}
