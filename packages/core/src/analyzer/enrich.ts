import { isFlatSolution, type PossibleSolution } from "../domain/LogAnalysis.js";
import type { SearchPort } from "../ports/index.js";
import { defaultLogger, type Logger } from "../logger.js";
import { describeError } from "../errors.js";

export interface EnrichOptions {
  maxResults?: number;  // default: 3
  timeoutMs?: number;   // default: 8000, per search call
  concurrency?: number; // default: 4
  logger?: Logger;
}

interface LookupConfig {
  maxResults: number;
  timeoutMs: number;
  logger: Logger;
}

/** Deterministic link used when search fails or finds nothing. */
export function fallbackSearchUrl(term: string): string {
  return `https://duckduckgo.com/?q=${encodeURIComponent(term)}`;
}

function searchTerm(keywords: string | undefined, errorMessage: string): string {
  return keywords?.trim() || errorMessage.trim() || "error";
}

function mergeLinks(existing: string[] | undefined, added: string[]): string[] {
  return Array.from(new Set([...(existing ?? []), ...added]));
}

async function lookupLinks(search: SearchPort, term: string, cfg: LookupConfig): Promise<string[]> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new Error(`search timed out after ${cfg.timeoutMs}ms`));
    }, cfg.timeoutMs);
  });

  try {
    const hits = await Promise.race([search.search(term, cfg.maxResults, { signal: controller.signal }), timeout]);
    const urls = hits.map((h) => h.url).filter((u) => u.length > 0).slice(0, cfg.maxResults);
    if (urls.length) return urls;
    cfg.logger.info("search returned nothing, using fallback link", { stage: "enrich", term });
  } catch (err) {
    cfg.logger.warn(`search failed, using fallback link: ${describeError(err)}`, { stage: "enrich", term });
  } finally {
    clearTimeout(timer);
  }
  return [fallbackSearchUrl(term)];
}

async function runPool(jobs: Array<() => Promise<void>>, concurrency: number): Promise<void> {
  let next = 0;
  const worker = async () => {
    while (next < jobs.length) {
      const job = jobs[next++];
      await job();
    }
  };
  await Promise.all(Array.from({ length: Math.min(concurrency, jobs.length) }, worker));
}

/**
 * Attaches reference links to every solution (phased: per solution, flat: per item).
 * Step text is left untouched and existing links are kept. Returns copies; never rejects.
 */
export async function enrichSolutions(
  solutions: PossibleSolution[],
  search: SearchPort,
  opts: EnrichOptions = {}
): Promise<PossibleSolution[]> {
  const cfg: LookupConfig = {
    maxResults: Math.max(1, opts.maxResults ?? 3),
    timeoutMs: Math.max(1, opts.timeoutMs ?? 8000),
    logger: opts.logger ?? defaultLogger
  };
  const result = structuredClone(solutions);
  const jobs: Array<() => Promise<void>> = [];

  for (const s of result) {
    if (isFlatSolution(s)) {
      for (const item of s.solutions) {
        const term = searchTerm(item.search_keywords, s.error_message);
        jobs.push(async () => {
          item.source_links = mergeLinks(item.source_links, await lookupLinks(search, term, cfg));
        });
      }
    } else {
      const term = searchTerm(s.search_keywords, s.error_message);
      jobs.push(async () => {
        s.source_links = mergeLinks(s.source_links, await lookupLinks(search, term, cfg));
      });
    }
  }

  await runPool(jobs, Math.max(1, opts.concurrency ?? 4));
  return result;
}
