import { describe, it, expect } from "vitest";
import { parseStoredAnalysis, toLogError, validateAnalysis } from "../validate.js";
import { isFlatSolution, type PhasedSolution } from "../../domain/LogAnalysis.js";

const fix = (summary: string) => ({ summary, steps: [`${summary} step`] });

const phased = (error_message: string): PhasedSolution => ({
  error_message,
  immediate_fix: fix("restart"),
  permanent_fix: fix("patch"),
  preventive_measures: fix("alert")
});

describe("validateAnalysis", () => {
  it("keeps a well-formed error with exactly its three fields", () => {
    const out = validateAnalysis({
      errors: [
        { timestamp: "2025-01-01T00:00:00Z", error_message: "NPE in Foo", error_type: "ApplicationError" }
      ],
      possible_solutions: []
    });

    expect(out).toEqual({
      log_id: null,
      errors: [{ timestamp: "2025-01-01T00:00:00Z", error_message: "NPE in Foo", error_type: "ApplicationError" }],
      possible_solutions: []
    });
  });

  it("repairs an error missing error_type with a placeholder", () => {
    const out = validateAnalysis({
      errors: [{ timestamp: "2025-01-01T00:00:00Z", error_message: "Disk full" }],
      possible_solutions: []
    });
    expect(out.errors).toEqual([
      { timestamp: "2025-01-01T00:00:00Z", error_message: "Disk full", error_type: "UnknownError" }
    ]);
  });

  it("repairs missing message and timestamp", () => {
    expect(toLogError({ error_type: "ConfigError", timestamp: 1700000000 })).toEqual({
      timestamp: null,
      error_message: "Unknown error",
      error_type: "ConfigError"
    });
  });

  it("defaults an absent timestamp to null without repair", () => {
    expect(toLogError({ error_message: "m", error_type: "T" })).toEqual({
      timestamp: null,
      error_message: "m",
      error_type: "T"
    });
  });

  it("keeps padded messages verbatim so solutions still match their error", () => {
    const out = validateAnalysis({
      errors: [{ error_message: " NPE in Foo\n", error_type: " ApplicationError " }],
      possible_solutions: [phased(" NPE in Foo\n")]
    });

    expect(out.errors[0].error_message).toBe(" NPE in Foo\n");
    expect(out.errors[0].error_type).toBe(" ApplicationError ");
    expect(out.possible_solutions[0].error_message).toBe(out.errors[0].error_message);
  });

  it("treats a whitespace-only message as missing", () => {
    expect(toLogError({ error_message: " \t ", error_type: "T" })).toEqual({
      timestamp: null,
      error_message: "Unknown error",
      error_type: "T"
    });
  });

  it.each(["", "   "])("normalizes a blank timestamp %j to null", (timestamp) => {
    expect(toLogError({ timestamp, error_message: "m", error_type: "T" })).toEqual({
      timestamp: null,
      error_message: "m",
      error_type: "T"
    });
  });

  it("drops errors that cannot be repaired and keeps order", () => {
    const out = validateAnalysis({
      errors: [
        { error_message: "first", error_type: "A" },
        "just a string",
        { error_message: "bad type", error_type: 42 },
        { error_message: "second", error_type: "B" }
      ],
      possible_solutions: []
    });
    expect(out.errors.map((e) => e.error_message)).toEqual(["first", "second"]);
  });

  it("drops a solution missing permanent_fix and keeps the others", () => {
    const broken: Record<string, unknown> = { ...phased("timeout") };
    delete broken.permanent_fix;

    const out = validateAnalysis({
      errors: [],
      possible_solutions: [phased("NPE in Foo"), broken, phased("Disk full")]
    });

    expect(out.possible_solutions.map((s) => s.error_message)).toEqual(["NPE in Foo", "Disk full"]);
  });

  it("accepts the flat solution shape", () => {
    const out = validateAnalysis({
      errors: [],
      possible_solutions: [
        { error_message: "m", solutions: [{ solution_text: "Step 1", search_keywords: "fix step 1" }] }
      ]
    });
    const [s] = out.possible_solutions;
    expect(isFlatSolution(s)).toBe(true);
    expect(s).toEqual({ error_message: "m", solutions: [{ solution_text: "Step 1", search_keywords: "fix step 1" }] });
  });

  it("keeps solutions whose error_message matches no error", () => {
    const out = validateAnalysis({
      errors: [{ error_message: "A", error_type: "T" }],
      possible_solutions: [phased("something else")]
    });
    expect(out.possible_solutions).toHaveLength(1);
  });

  it("strips keys the schema does not know", () => {
    const out = validateAnalysis({
      errors: [{ error_message: "m", error_type: "T", severity: "high" }],
      possible_solutions: [{ ...phased("m"), confidence: 0.9 }]
    });
    expect(out.errors[0]).toEqual({ timestamp: null, error_message: "m", error_type: "T" });
    expect(out.possible_solutions[0]).toEqual(phased("m"));
  });

  it("never returns more records than it was given", () => {
    const inputs = [
      { errors: [], possible_solutions: [] },
      { errors: [1, 2, 3], possible_solutions: [null, {}] },
      { errors: [{}, { error_message: "x" }], possible_solutions: [phased("a"), { solutions: "no" }] }
    ];
    for (const input of inputs) {
      const out = validateAnalysis(input);
      expect(out.errors.length).toBeLessThanOrEqual(input.errors.length);
      expect(out.possible_solutions.length).toBeLessThanOrEqual(input.possible_solutions.length);
    }
  });
});

describe("parseStoredAnalysis", () => {
  it("decodes stored JSON and attaches the record id", () => {
    const json = JSON.stringify({
      log_id: null,
      errors: [{ timestamp: null, error_message: "m", error_type: "T" }],
      possible_solutions: [{ ...phased("m"), source_links: ["https://example.test/a"] }]
    });

    expect(parseStoredAnalysis(json, 12)).toEqual({
      log_id: 12,
      errors: [{ timestamp: null, error_message: "m", error_type: "T" }],
      possible_solutions: [{ ...phased("m"), source_links: ["https://example.test/a"] }]
    });
  });

  it("returns null for JSON that is not an object", () => {
    expect(parseStoredAnalysis("not json", 1)).toBeNull();
    expect(parseStoredAnalysis("[1,2]", 1)).toBeNull();
  });
});
