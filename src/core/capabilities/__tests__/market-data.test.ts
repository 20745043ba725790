/**
 * YahooMarketDataClient tests
 */

import { describe, it, expect, jest } from "@jest/globals";
import { YahooMarketDataClient } from "../yahoo-market-data";
import { CapabilityUnavailableError } from "../../errors/pipeline-errors";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function chart(meta: Record<string, unknown>, extra: Record<string, unknown> = {}) {
  return { chart: { result: [{ meta, ...extra }], error: null } };
}

describe("YahooMarketDataClient", () => {
  describe("lookup", () => {
    it("should map the chart meta to a snapshot", async () => {
      const fetchMock = jest.fn<typeof fetch>().mockResolvedValue(
        jsonResponse(
          chart({
            symbol: "AAPL",
            currency: "USD",
            regularMarketPrice: 150,
            chartPreviousClose: 120,
            regularMarketVolume: 10000000,
            regularMarketTime: 1700000000,
          })
        )
      );
      const client = new YahooMarketDataClient({ fetch: fetchMock });

      const snapshot = await client.lookup("AAPL");

      expect(snapshot).toEqual({
        symbol: "AAPL",
        price: 150,
        previousClose: 120,
        change: 30,
        changePercent: 25,
        volume: 10000000,
        currency: "USD",
        timestamp: "2023-11-14T22:13:20.000Z",
      });
      expect(fetchMock.mock.calls[0][0]).toBe(
        "https://query1.finance.yahoo.com/v8/finance/chart/AAPL?range=1d&interval=1d"
      );
    });

    it("should prefer previousClose and leave change empty when it is zero", async () => {
      const fetchMock = jest.fn<typeof fetch>().mockResolvedValue(
        jsonResponse(
          chart({
            symbol: "0700.HK",
            currency: "HKD",
            regularMarketPrice: 300,
            previousClose: 0,
            chartPreviousClose: 290,
          })
        )
      );
      const client = new YahooMarketDataClient({
        baseUrl: "https://market.test/",
        fetch: fetchMock,
      });

      const snapshot = await client.lookup("0700.HK");

      expect(snapshot.previousClose).toBe(0);
      expect(snapshot.change).toBeNull();
      expect(snapshot.changePercent).toBeNull();
      expect(snapshot.volume).toBeNull();
      expect(snapshot.currency).toBe("HKD");
      expect(fetchMock.mock.calls[0][0]).toBe(
        "https://market.test/v8/finance/chart/0700.HK?range=1d&interval=1d"
      );
    });

    it("should report an unknown symbol as unavailable", async () => {
      const fetchMock = jest.fn<typeof fetch>().mockResolvedValue(
        jsonResponse(
          {
            chart: {
              result: null,
              error: { code: "Not Found", description: "No data found, symbol may be delisted" },
            },
          },
          404
        )
      );
      const client = new YahooMarketDataClient({ fetch: fetchMock });

      await expect(client.lookup("ZZZZ")).rejects.toThrow(
        'Capability "yahoo-market-data" unavailable: Not Found: No data found, symbol may be delisted'
      );
    });

    it("should report a missing price", async () => {
      const fetchMock = jest
        .fn<typeof fetch>()
        .mockResolvedValue(jsonResponse(chart({ symbol: "AAPL", currency: "USD" })));
      const client = new YahooMarketDataClient({ fetch: fetchMock });

      await expect(client.lookup("AAPL")).rejects.toThrow(
        'Capability "yahoo-market-data" unavailable: no price for AAPL'
      );
    });

    it("should report HTTP errors without a JSON body", async () => {
      const fetchMock = jest
        .fn<typeof fetch>()
        .mockResolvedValue(new Response("Internal Server Error", { status: 500 }));
      const client = new YahooMarketDataClient({ fetch: fetchMock });

      await expect(client.lookup("AAPL")).rejects.toThrow(
        'Capability "yahoo-market-data" unavailable: Yahoo Finance API error 500'
      );
    });

    it("should report network failures", async () => {
      const fetchMock = jest.fn<typeof fetch>().mockRejectedValue(new Error("getaddrinfo ENOTFOUND"));
      const client = new YahooMarketDataClient({ fetch: fetchMock });

      await expect(client.lookup("AAPL")).rejects.toThrow(
        'Capability "yahoo-market-data" unavailable: getaddrinfo ENOTFOUND'
      );
    });

    it("should time out slow requests", async () => {
      const fetchMock = jest.fn<typeof fetch>(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
          })
      );
      const client = new YahooMarketDataClient({ timeoutMs: 5, fetch: fetchMock });

      await expect(client.lookup("AAPL")).rejects.toThrow("request timed out after 5ms");
    });

    it("should time out a body that never finishes", async () => {
      const stalled = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"chart":'));
        },
      });
      const fetchMock = jest.fn<typeof fetch>().mockResolvedValue(new Response(stalled));
      const client = new YahooMarketDataClient({ timeoutMs: 5, fetch: fetchMock });

      await expect(client.lookup("AAPL")).rejects.toThrow(
        'Capability "yahoo-market-data" unavailable: request timed out after 5ms'
      );
    });
  });

  describe("history", () => {
    it("should return daily closes and skip gaps", async () => {
      const fetchMock = jest.fn<typeof fetch>().mockResolvedValue(
        jsonResponse(
          chart(
            { symbol: "AAPL", regularMarketPrice: 155 },
            {
              timestamp: [1700000000, 1700086400, 1700172800],
              indicators: { quote: [{ close: [150, null, 155] }] },
            }
          )
        )
      );
      const client = new YahooMarketDataClient({ fetch: fetchMock });

      const bars = await client.history("AAPL");

      expect(bars).toEqual([
        { date: "2023-11-14", close: 150 },
        { date: "2023-11-16", close: 155 },
      ]);
      expect(fetchMock.mock.calls[0][0]).toBe(
        "https://query1.finance.yahoo.com/v8/finance/chart/AAPL?range=6mo&interval=1d"
      );
    });

    it("should report an empty history", async () => {
      const fetchMock = jest
        .fn<typeof fetch>()
        .mockResolvedValue(jsonResponse(chart({ symbol: "AAPL" }, { timestamp: [] })));
      const client = new YahooMarketDataClient({ fetch: fetchMock });

      await expect(client.history("AAPL", "1mo")).rejects.toThrow(CapabilityUnavailableError);
    });
  });
});
