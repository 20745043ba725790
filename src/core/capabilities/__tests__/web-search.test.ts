/**
 * TavilySearchClient tests
 */

import { describe, it, expect, jest } from "@jest/globals";
import { TavilySearchClient } from "../tavily-web-search";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("TavilySearchClient", () => {
  it("should post the query and return results by score", async () => {
    const fetchMock = jest.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({
        query: "AAPL news",
        results: [
          { title: "Low", url: "https://news.test/low", content: "low relevance", score: 0.2 },
          { title: "High", url: "https://news.test/high", content: "high relevance", score: 0.9 },
          { title: "Mid", url: "https://news.test/mid", content: "mid relevance", score: 0.5 },
        ],
      })
    );
    const client = new TavilySearchClient({
      apiKey: "test-secret",
      maxResults: 2,
      fetch: fetchMock,
    });

    const results = await client.search("AAPL news");

    expect(results).toEqual([
      { title: "High", snippet: "high relevance", url: "https://news.test/high" },
      { title: "Mid", snippet: "mid relevance", url: "https://news.test/mid" },
    ]);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.tavily.com/search");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      query: "AAPL news",
      max_results: 2,
      search_depth: "basic",
      include_answer: false,
    });
  });

  it("should fill in missing titles and content", async () => {
    const fetchMock = jest
      .fn<typeof fetch>()
      .mockResolvedValue(jsonResponse({ results: [{ url: "https://news.test/bare" }] }));
    const client = new TavilySearchClient({ apiKey: "test-secret", fetch: fetchMock });

    expect(await client.search("bare")).toEqual([
      { title: "", snippet: "", url: "https://news.test/bare" },
    ]);
  });

  it("should report API errors", async () => {
    const fetchMock = jest
      .fn<typeof fetch>()
      .mockResolvedValue(new Response("Unauthorized", { status: 401 }));
    const client = new TavilySearchClient({ apiKey: "test-secret", fetch: fetchMock });

    await expect(client.search("AAPL news")).rejects.toThrow(
      'Capability "tavily-search" unavailable: Tavily API error 401: Unauthorized'
    );
  });

  it("should report an unexpected body", async () => {
    const fetchMock = jest
      .fn<typeof fetch>()
      .mockResolvedValue(jsonResponse({ answer: "no results field" }));
    const client = new TavilySearchClient({ apiKey: "test-secret", fetch: fetchMock });

    await expect(client.search("AAPL news")).rejects.toThrow("unexpected response shape");
  });

  it("should time out a body that never finishes", async () => {
    const stalled = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('{"results":['));
      },
    });
    const fetchMock = jest.fn<typeof fetch>().mockResolvedValue(new Response(stalled));
    const client = new TavilySearchClient({ apiKey: "test-secret", timeoutMs: 5, fetch: fetchMock });

    await expect(client.search("AAPL news")).rejects.toThrow(
      'Capability "tavily-search" unavailable: request timed out after 5ms'
    );
  });
});
