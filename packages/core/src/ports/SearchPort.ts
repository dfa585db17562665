export interface SearchHit {
  title: string;
  url: string;
}

export interface SearchOptions {
  signal?: AbortSignal;
}

/** Best-effort web search used to attach reference links to solutions. */
export interface SearchPort {
  search(query: string, maxResults: number, opts?: SearchOptions): Promise<SearchHit[]>;
}
