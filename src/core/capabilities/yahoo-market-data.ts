/**
 * Yahoo Finance market data client.
 *
 * Uses the public chart endpoint through direct fetch calls:
 * - latest price, previous close, volume and currency (range=1d)
 * - daily closes for a range (used for the six month performance view)
 */

import { z } from "zod";
import { MarketDataCapability, PriceHistorySource } from "./capability";
import { MarketSnapshot, PriceBar, computeChange } from "../models/market";
import { CapabilityUnavailableError } from "../errors/pipeline-errors";
import { startTimeout, untilAborted } from "../http/abortable";

const YAHOO_BASE_URL = "https://query1.finance.yahoo.com";
const DEFAULT_TIMEOUT_MS = 30000;

// ============================================
// Response Schemas
// ============================================

const ChartMetaSchema = z.object({
  symbol: z.string(),
  currency: z.string().nullish(),
  regularMarketPrice: z.number().nullish(),
  previousClose: z.number().nullish(),
  chartPreviousClose: z.number().nullish(),
  regularMarketVolume: z.number().nullish(),
  regularMarketTime: z.number().nullish(),
});

const ChartResultSchema = z.object({
  meta: ChartMetaSchema,
  timestamp: z.array(z.number()).optional(),
  indicators: z
    .object({
      quote: z.array(
        z.object({
          close: z.array(z.number().nullable()).optional(),
        })
      ),
    })
    .optional(),
});
type ChartResult = z.infer<typeof ChartResultSchema>;

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z.array(ChartResultSchema).nullish(),
    error: z
      .object({
        code: z.string(),
        description: z.string(),
      })
      .nullish(),
  }),
});

// ============================================
// Client
// ============================================

export interface YahooMarketDataConfig {
  /** API base URL (defaults to query1.finance.yahoo.com) */
  baseUrl?: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  /** Fetch implementation (defaults to the global fetch) */
  fetch?: typeof fetch;
}

/**
 * Market data lookup backed by the Yahoo Finance chart API.
 *
 * @example
 * ```typescript
 * const marketData = new YahooMarketDataClient();
 * const snapshot = await marketData.lookup("AAPL");
 * const bars = await marketData.history("AAPL", "6mo");
 * ```
 */
export class YahooMarketDataClient implements MarketDataCapability, PriceHistorySource {
  readonly kind = "market_data";
  readonly name = "yahoo-market-data";
  readonly description = "Retrieves the latest stock price, change and volume";

  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor(config: YahooMarketDataConfig = {}) {
    this.baseUrl = (config.baseUrl ?? YAHOO_BASE_URL).replace(/\/$/, "");
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  async lookup(symbol: string): Promise<MarketSnapshot> {
    const result = await this.fetchChart(symbol, { range: "1d", interval: "1d" });
    const meta = result.meta;

    if (meta.regularMarketPrice === null || meta.regularMarketPrice === undefined) {
      throw new CapabilityUnavailableError(this.name, `no price for ${symbol}`);
    }

    const price = meta.regularMarketPrice;
    const previousClose = meta.previousClose ?? meta.chartPreviousClose ?? null;
    const timestamp =
      meta.regularMarketTime !== null && meta.regularMarketTime !== undefined
        ? new Date(meta.regularMarketTime * 1000).toISOString()
        : new Date().toISOString();

    return {
      symbol: meta.symbol,
      price,
      previousClose,
      ...computeChange(price, previousClose),
      volume: meta.regularMarketVolume ?? null,
      currency: meta.currency ?? "USD",
      timestamp,
    };
  }

  async history(symbol: string, range: string = "6mo"): Promise<PriceBar[]> {
    const result = await this.fetchChart(symbol, { range, interval: "1d" });
    const timestamps = result.timestamp ?? [];
    const closes = result.indicators?.quote[0]?.close ?? [];

    const bars: PriceBar[] = [];
    timestamps.forEach((ts, i) => {
      const close = closes[i];
      if (close === null || close === undefined) return;
      bars.push({ date: new Date(ts * 1000).toISOString().slice(0, 10), close });
    });

    if (bars.length === 0) {
      throw new CapabilityUnavailableError(this.name, `no price history for ${symbol}`);
    }
    return bars;
  }

  /**
   * Fetch one chart result, mapping API errors and empty results to
   * CapabilityUnavailableError.
   */
  private async fetchChart(
    symbol: string,
    params: Record<string, string>
  ): Promise<ChartResult> {
    const url = new URL(`/v8/finance/chart/${encodeURIComponent(symbol)}`, this.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    const timeout = startTimeout(this.timeoutMs);

    let response: Response;
    let body: unknown;
    try {
      response = await this.fetchImpl(url.toString(), {
        headers: {
          Accept: "application/json",
          "User-Agent": "stock-analyst-pipeline",
        },
        signal: timeout.signal,
      });
      body = await untilAborted(
        response.json().catch(() => null),
        timeout.signal
      );
    } catch (error) {
      const reason = timeout.timedOut
        ? `request timed out after ${this.timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new CapabilityUnavailableError(this.name, reason, { cause: error });
    } finally {
      timeout.clear();
    }

    const parsed = ChartResponseSchema.safeParse(body);

    if (parsed.success && parsed.data.chart.error) {
      const { code, description } = parsed.data.chart.error;
      throw new CapabilityUnavailableError(this.name, `${code}: ${description}`);
    }
    if (!response.ok) {
      throw new CapabilityUnavailableError(
        this.name,
        `Yahoo Finance API error ${response.status}`
      );
    }
    if (!parsed.success) {
      throw new CapabilityUnavailableError(this.name, "unexpected response shape");
    }

    const result = parsed.data.chart.result?.[0];
    if (!result) {
      throw new CapabilityUnavailableError(this.name, `no data found for ${symbol}`);
    }
    return result;
  }
}
