import { z } from "zod";
import type { SearchHit, SearchPort } from "@loglens/core";

export interface DuckDuckGoSearchOptions {
  fetch?: typeof fetch;  // default: global fetch (allow DI for tests)
  endpoint?: string;     // default: "https://api.duckduckgo.com/"
  siteFilter?: string;   // default: "stackoverflow.com"; "" searches the whole web
}

const TopicSchema = z.object({
  Text: z.string().optional(),
  FirstURL: z.string().optional()
});

const TopicGroupSchema = z.object({
  Name: z.string().optional(),
  Topics: z.array(TopicSchema)
});

const InstantAnswerSchema = z.object({
  RelatedTopics: z.array(z.union([TopicGroupSchema, TopicSchema])).default([])
});

type Topic = z.infer<typeof TopicSchema>;

function flattenTopics(related: z.infer<typeof InstantAnswerSchema>["RelatedTopics"]): Topic[] {
  return related.flatMap((t) => ("Topics" in t ? t.Topics : [t]));
}

export function makeDuckDuckGoSearch(opts: DuckDuckGoSearchOptions = {}): SearchPort {
  const doFetch = opts.fetch ?? fetch;
  const endpoint = opts.endpoint ?? "https://api.duckduckgo.com/";
  const siteFilter = opts.siteFilter ?? "stackoverflow.com";

  return {
    async search(query, maxResults, searchOpts = {}): Promise<SearchHit[]> {
      const q = siteFilter ? `${query} site:${siteFilter}` : query;
      const url = new URL(endpoint);
      url.search = new URLSearchParams({ q, format: "json", no_html: "1", skip_disambig: "1" }).toString();

      const res = await doFetch(url, { signal: searchOpts.signal, headers: { accept: "application/json" } });
      if (!res.ok) throw new Error(`DuckDuckGo search failed: HTTP ${res.status}`);

      const body = InstantAnswerSchema.parse(await res.json());
      const hits: SearchHit[] = [];
      for (const t of flattenTopics(body.RelatedTopics)) {
        if (!t.FirstURL) continue;
        hits.push({ title: t.Text ?? t.FirstURL, url: t.FirstURL });
        if (hits.length >= maxResults) break;
      }
      return hits;
    }
  };
}
