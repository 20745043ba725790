/**
 * Tavily web search client.
 *
 * Returns ranked text snippets for a query; results are ordered by
 * Tavily's relevance score, highest first.
 */

import { z } from "zod";
import { WebSearchCapability } from "./capability";
import { SearchResult } from "../models/market";
import { CapabilityUnavailableError } from "../errors/pipeline-errors";
import { startTimeout, untilAborted } from "../http/abortable";

const TAVILY_BASE_URL = "https://api.tavily.com";
const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_MAX_RESULTS = 5;

const TavilyResultSchema = z.object({
  title: z.string().default(""),
  url: z.string(),
  content: z.string().default(""),
  score: z.number().default(0),
});

const TavilyResponseSchema = z.object({
  query: z.string().optional(),
  results: z.array(TavilyResultSchema),
});

export interface TavilySearchConfig {
  apiKey: string;
  /** Maximum number of results per query */
  maxResults?: number;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export class TavilySearchClient implements WebSearchCapability {
  readonly kind = "web_search";
  readonly name = "tavily-search";
  readonly description = "Searches the internet about a given topic";

  private apiKey: string;
  private maxResults: number;
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor(config: TavilySearchConfig) {
    this.apiKey = config.apiKey;
    this.maxResults = config.maxResults ?? DEFAULT_MAX_RESULTS;
    this.baseUrl = (config.baseUrl ?? TAVILY_BASE_URL).replace(/\/$/, "");
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  async search(query: string): Promise<SearchResult[]> {
    const timeout = startTimeout(this.timeoutMs);

    let response: Response;
    let body: unknown;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/search`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          query,
          max_results: this.maxResults,
          search_depth: "basic",
          include_answer: false,
        }),
        signal: timeout.signal,
      });

      if (!response.ok) {
        const errorText = await untilAborted(
          response.text().catch(() => response.statusText),
          timeout.signal
        );
        throw new CapabilityUnavailableError(
          this.name,
          `Tavily API error ${response.status}: ${errorText}`
        );
      }

      body = await untilAborted(response.json().catch(() => null), timeout.signal);
    } catch (error) {
      if (error instanceof CapabilityUnavailableError) {
        throw error;
      }
      const reason = timeout.timedOut
        ? `request timed out after ${this.timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new CapabilityUnavailableError(this.name, reason, { cause: error });
    } finally {
      timeout.clear();
    }

    const parsed = TavilyResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CapabilityUnavailableError(this.name, "unexpected response shape");
    }

    return [...parsed.data.results]
      .sort((a, b) => b.score - a.score)
      .slice(0, this.maxResults)
      .map((r) => ({ title: r.title, snippet: r.content, url: r.url }));
  }
}
