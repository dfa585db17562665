import { defaultLogger, type Logger } from "../logger.js";

/** Model output reduced to the two lists; elements are validated later. */
export interface NormalizedOutput {
  errors: unknown[];
  possible_solutions: unknown[];
}

const FENCE = "```";

const empty = (): NormalizedOutput => ({ errors: [], possible_solutions: [] });

function stripFences(text: string): string {
  if (!text.startsWith(FENCE)) return text;
  const lines = text.split("\n").slice(1);
  if (lines.length && lines[lines.length - 1].trim().startsWith(FENCE)) lines.pop();
  return lines.join("\n");
}

/** Drops commas that directly precede `}` or `]`, leaving string contents alone. */
function stripTrailingCommas(json: string): string {
  let out = "";
  let inString = false;
  for (let i = 0; i < json.length; i++) {
    const ch = json[i];
    if (inString) {
      out += ch;
      if (ch === "\\") out += json.charAt(++i);
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    if (ch === ",") {
      let j = i + 1;
      while (j < json.length && /\s/.test(json[j])) j++;
      if (json[j] === "}" || json[j] === "]") continue;
    }
    out += ch;
  }
  return out;
}

function parseLenient(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch {
    // trailing commas occasionally appear
    return JSON.parse(stripTrailingCommas(candidate));
  }
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function listField(obj: Record<string, unknown>, key: keyof NormalizedOutput, log: Logger): unknown[] {
  const value = obj[key];
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) return value;
  log.warn(`"${key}" is not a list, ignoring it`, { stage: "extract", got: typeof value });
  return [];
}

/**
 * Pulls the JSON object out of raw model text (code fences, leading prose,
 * trailing chatter) and returns its `errors` / `possible_solutions` lists.
 * Every failure falls back to empty lists; nothing is thrown.
 */
export function extractModelOutput(raw: string, logger: Logger = defaultLogger): NormalizedOutput {
  const text = stripFences(raw.trim());

  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start < 0 || end < 0 || start >= end) {
    logger.warn("no JSON object in model output", { stage: "extract", preview: raw.slice(0, 200) });
    return empty();
  }

  let parsed: unknown;
  try {
    parsed = parseLenient(text.slice(start, end + 1));
  } catch (err) {
    logger.warn("model output is not valid JSON", { stage: "extract", error: String(err) });
    return empty();
  }

  if (!isRecord(parsed)) {
    logger.warn("model output is not a JSON object", { stage: "extract" });
    return empty();
  }

  return {
    errors: listField(parsed, "errors", logger),
    possible_solutions: listField(parsed, "possible_solutions", logger)
  };
}
