import { describe, it, expect, vi, afterEach } from "vitest";
import winston from "winston";
import { emptyAnalysis, type LogAnalysisResponse } from "@loglens/core";
import { LogAnalysisTransport, renderEntry } from "../index.js";

describe("renderEntry", () => {
  it("renders timestamp, level, service and message", () => {
    const line = renderEntry({ level: "error", message: "db down", timestamp: "2025-01-01T00:00:00Z" }, "billing");
    expect(line).toBe("2025-01-01T00:00:00Z [ERROR] billing: db down");
  });

  it("serializes non-string messages and appends the stack", () => {
    const line = renderEntry(
      { level: "error", message: { code: 42 }, timestamp: "t", stack: "Error: boom\n    at main (app.ts:3)" },
      "api"
    );
    expect(line).toBe('t [ERROR] api: {"code":42}\nError: boom\n    at main (app.ts:3)');
  });

  it("takes the stack from a nested error", () => {
    const err = new Error("boom");
    err.stack = "Error: boom\n    at x";
    expect(renderEntry({ level: "error", message: "failed", timestamp: "t", err }, "api")).toBe(
      "t [ERROR] api: failed\nError: boom\n    at x"
    );
  });
});

describe("LogAnalysisTransport", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("forwards error entries to the analyzer and emits the response", async () => {
    const response: LogAnalysisResponse = { ...emptyAnalysis(), log_id: 7 };
    const analyze = vi.fn(async (_text: string) => response);
    const transport = new LogAnalysisTransport({ analyze }, { service: "billing" });
    const logger = winston.createLogger({ transports: [transport] });
    const analyzed = new Promise((resolve) => transport.once("analyzed", resolve));

    logger.error("db down", { timestamp: "2025-01-01T00:00:00Z" });

    await expect(analyzed).resolves.toBe(response);
    expect(analyze).toHaveBeenCalledTimes(1);
    expect(analyze).toHaveBeenCalledWith("2025-01-01T00:00:00Z [ERROR] billing: db down");
  });

  it("ignores entries below its level", async () => {
    const analyze = vi.fn(async (_text: string) => emptyAnalysis());
    const transport = new LogAnalysisTransport({ analyze });
    const logger = winston.createLogger({ transports: [transport] });

    logger.warn("slow query");
    await new Promise((r) => setTimeout(r, 20));

    expect(analyze).not.toHaveBeenCalled();
  });

  it("reports analyzer failures without throwing", async () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const analyze = vi.fn(async (_text: string): Promise<LogAnalysisResponse> => {
      throw new Error("store offline");
    });
    const transport = new LogAnalysisTransport({ analyze });
    const logger = winston.createLogger({ transports: [transport] });

    logger.error("boom");

    await vi.waitFor(() => expect(consoleError).toHaveBeenCalled());
    expect(consoleError.mock.calls[0][0]).toBe("Error sending log entry to analyzer:");
  });
});
