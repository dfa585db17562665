import { z } from "zod";

export const UNKNOWN_ERROR_MESSAGE = "Unknown error";
export const UNKNOWN_ERROR_TYPE = "UnknownError";

const notBlank = (s: string) => s.trim().length > 0;

/** One detected error event. */
export const LogErrorSchema = z.object({
  timestamp: z
    .string()
    .nullish()
    .transform((t) => (t && t.trim() ? t : null)),
  // kept verbatim: solutions point back at errors by exact error_message
  error_message: z.string().refine(notBlank, "must not be blank"),
  error_type: z.string().refine(notBlank, "must not be blank")
});

export const FixSectionSchema = z.object({
  summary: z.string(),
  steps: z.array(z.string())
});

const LinksSchema = z.array(z.string()).optional();

/** Three-phase remediation bundle (canonical shape). */
export const PhasedSolutionSchema = z.object({
  error_message: z.string(),
  immediate_fix: FixSectionSchema,
  permanent_fix: FixSectionSchema,
  preventive_measures: FixSectionSchema,
  search_keywords: z.string().optional(),
  source_links: LinksSchema
});

export const SolutionItemSchema = z.object({
  solution_text: z.string(),
  search_keywords: z.string().optional(),
  source_links: LinksSchema
});

/** Flat list of solution texts, each with its own search keywords. */
export const FlatSolutionSchema = z.object({
  error_message: z.string(),
  solutions: z.array(SolutionItemSchema)
});

export const FeedbackChoiceSchema = z.enum(["Yes", "No"]);

export type LogError = z.infer<typeof LogErrorSchema>;
export type FixSection = z.infer<typeof FixSectionSchema>;
export type PhasedSolution = z.infer<typeof PhasedSolutionSchema>;
export type SolutionItem = z.infer<typeof SolutionItemSchema>;
export type FlatSolution = z.infer<typeof FlatSolutionSchema>;
export type PossibleSolution = PhasedSolution | FlatSolution;
export type FeedbackChoice = z.infer<typeof FeedbackChoiceSchema>;

/** Which solution shape the prompt asks the model for. */
export type SolutionFormat = "phased" | "flat";

export interface LogAnalysisResponse {
  log_id: number | null; // assigned by the store after persistence
  errors: LogError[];
  possible_solutions: PossibleSolution[];
}

export function isFlatSolution(s: PossibleSolution): s is FlatSolution {
  return "solutions" in s;
}

export function isPhasedSolution(s: PossibleSolution): s is PhasedSolution {
  return !isFlatSolution(s);
}

export function emptyAnalysis(): LogAnalysisResponse {
  return { log_id: null, errors: [], possible_solutions: [] };
}
