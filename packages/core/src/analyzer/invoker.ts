import type { ModelPort } from "../ports/index.js";
import { defaultLogger, type Logger } from "../logger.js";
import { describeError } from "../errors.js";

/** Returned when every attempt failed; parses to an empty analysis. */
export const DEFAULT_MODEL_PAYLOAD = '{"errors": [], "possible_solutions": []}';

export interface InvokeOptions {
  maxAttempts?: number; // default: 3
  backoffMs?: number;   // default: 5000, fixed (no growth)
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export const sleep = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) return resolve();
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Calls the model with a bounded, fixed-delay retry. Never rejects: once the
 * attempts run out (or the signal aborts between them) the default payload is returned.
 */
export async function invokeWithRetry(model: ModelPort, prompt: string, opts: InvokeOptions = {}): Promise<string> {
  const maxAttempts = Math.max(1, opts.maxAttempts ?? 3);
  const backoffMs = Math.max(0, opts.backoffMs ?? 5000);
  const wait = opts.sleep ?? sleep;
  const log = opts.logger ?? defaultLogger;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (opts.signal?.aborted) {
      log.warn("model call cancelled", { stage: "invoke", attempt });
      return DEFAULT_MODEL_PAYLOAD;
    }
    try {
      const reply = await model.invoke(prompt, { signal: opts.signal });
      log.debug("model replied", { stage: "invoke", attempt, chars: reply.content.length });
      return reply.content;
    } catch (err) {
      log.warn(`model request failed (${attempt}/${maxAttempts}): ${describeError(err)}`, {
        stage: "invoke",
        attempt
      });
      if (attempt < maxAttempts) await wait(backoffMs, opts.signal);
    }
  }

  log.error("model unavailable after all attempts, using empty payload", { stage: "invoke", maxAttempts });
  return DEFAULT_MODEL_PAYLOAD;
}
