import { describe, it, expect, vi } from "vitest";
import { makeDuckDuckGoSearch } from "../index.js";

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

describe("makeDuckDuckGoSearch", () => {
  it("queries the instant-answer API restricted to the configured site", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ RelatedTopics: [] }));
    const search = makeDuckDuckGoSearch({ fetch: fetchMock });

    await search.search("NullPointerException in Foo", 3);

    const [url] = fetchMock.mock.calls[0];
    const parsed = new URL(String(url));
    expect(parsed.origin + parsed.pathname).toBe("https://api.duckduckgo.com/");
    expect(parsed.searchParams.get("q")).toBe("NullPointerException in Foo site:stackoverflow.com");
    expect(parsed.searchParams.get("format")).toBe("json");
  });

  it("flattens grouped topics, skips entries without a URL and honours maxResults", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({
        RelatedTopics: [
          { Text: "First answer", FirstURL: "https://stackoverflow.com/q/1" },
          { Text: "No link here" },
          {
            Name: "Related",
            Topics: [
              { Text: "Second answer", FirstURL: "https://stackoverflow.com/q/2" },
              { Text: "Third answer", FirstURL: "https://stackoverflow.com/q/3" }
            ]
          },
          { Text: "Fourth answer", FirstURL: "https://stackoverflow.com/q/4" }
        ]
      })
    );
    const search = makeDuckDuckGoSearch({ fetch: fetchMock });

    const hits = await search.search("timeout", 3);

    expect(hits).toEqual([
      { title: "First answer", url: "https://stackoverflow.com/q/1" },
      { title: "Second answer", url: "https://stackoverflow.com/q/2" },
      { title: "Third answer", url: "https://stackoverflow.com/q/3" }
    ]);
  });

  it("searches the whole web when the site filter is empty", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({}));
    const search = makeDuckDuckGoSearch({ fetch: fetchMock, siteFilter: "" });

    const hits = await search.search("disk full", 3);

    expect(hits).toEqual([]);
    const parsed = new URL(String(fetchMock.mock.calls[0][0]));
    expect(parsed.searchParams.get("q")).toBe("disk full");
  });

  it("rejects on HTTP errors", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ error: "nope" }, 503));
    const search = makeDuckDuckGoSearch({ fetch: fetchMock });

    await expect(search.search("x", 3)).rejects.toThrow("DuckDuckGo search failed: HTTP 503");
  });
});
