import { GoogleGenerativeAI } from "@google/generative-ai";
import type { ModelConfig, ModelPort } from "@loglens/core";

export interface GeminiModelOptions extends Partial<ModelConfig> {
  apiKey?: string;          // default: process.env.GEMINI_API_KEY
  model?: string;           // default: "gemini-1.5-flash"
  baseUrl?: string;         // default: SDK endpoint
  apiVersion?: string;      // default: SDK version ("v1beta")
  temperature?: number;     // default: 0
  maxOutputTokens?: number; // default: 8192
  timeoutMs?: number;       // default: 60000
  redact?: boolean;         // default: false; mask secrets before the prompt leaves the process
}

export function makeGeminiModel(opts: GeminiModelOptions = {}): ModelPort {
  const apiKey = opts.apiKey ?? process.env.GEMINI_API_KEY;
  if (!apiKey) throw new Error("GEMINI_API_KEY not set");

  const genAI = new GoogleGenerativeAI(apiKey);
  const model = genAI.getGenerativeModel(
    {
      model: opts.model ?? "gemini-1.5-flash",
      generationConfig: {
        temperature: opts.temperature ?? 0,
        maxOutputTokens: opts.maxOutputTokens ?? 8192,
        responseMimeType: "application/json"
      }
    },
    {
      timeout: Math.max(1000, opts.timeoutMs ?? 60_000),
      apiVersion: opts.apiVersion,
      baseUrl: opts.baseUrl
    }
  );
  const redact = opts.redact ?? false;

  return {
    async invoke(prompt, callOpts = {}) {
      const text = redact ? scrubSecrets(prompt) : prompt;
      const res = await model.generateContent(text, { signal: callOpts.signal });
      return { content: res.response.text() };
    }
  };
}

/* ---------------- helpers ---------------- */

export function scrubSecrets(text: string): string {
  return text
    // bearer/api keys
    .replace(/(bearer|api[-_ ]?key)([\s:=]+)[a-z0-9_\-.]{8,}/gi, "$1$2****")
    // JWT
    .replace(/\beyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g, "***.***.***")
    // emails
    .replace(/[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi, "****@****");
}
