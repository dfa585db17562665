import Transport from "winston-transport";
import type winston from "winston";
import type { Analyzer } from "@loglens/core";

export interface LogAnalysisTransportOptions extends Transport.TransportStreamOptions {
  level?: string;   // default: "error"
  service?: string; // default: "unknown"
}

type Info = winston.Logform.TransformableInfo;

function stackOf(info: Info): string | undefined {
  if (typeof info.stack === "string") return info.stack;
  for (const key of ["error", "err"]) {
    const nested = info[key];
    if (nested instanceof Error && nested.stack) return nested.stack;
  }
  return undefined;
}

/** One log line the way the analyzer expects raw log text. */
export function renderEntry(info: Info, service: string): string {
  const ts = typeof info.timestamp === "string" ? info.timestamp : new Date().toISOString();
  const message = typeof info.message === "string" ? info.message : JSON.stringify(info.message);
  const head = `${ts} [${String(info.level).toUpperCase()}] ${service}: ${message}`;
  const stack = stackOf(info);
  return stack ? `${head}\n${stack}` : head;
}

/**
 * Sends every entry at or above `level` to the analyzer. The host logger is
 * not held up while the model runs; results are emitted as "analyzed".
 */
export class LogAnalysisTransport extends Transport {
  private readonly analyzer: Pick<Analyzer, "analyze">;
  private readonly service: string;

  constructor(analyzer: Pick<Analyzer, "analyze">, opts: LogAnalysisTransportOptions = {}) {
    super({ ...opts, level: opts.level ?? "error" });
    this.analyzer = analyzer;
    this.service = opts.service ?? "unknown";
  }

  override log(info: Info, next: () => void): void {
    setImmediate(() => this.emit("logged", info));

    this.analyzer.analyze(renderEntry(info, this.service)).then(
      (response) => this.emit("analyzed", response),
      (err: unknown) => {
        // don't crash the app if the analyzer fails
        console.error("Error sending log entry to analyzer:", err);
      }
    );

    next();
  }
}
