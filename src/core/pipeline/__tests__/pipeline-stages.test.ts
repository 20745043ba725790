/**
 * Pipeline stages tests
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { MarketAnalystStage } from "../stages/market-analyst-stage";
import { TraderStage, parseRecommendation } from "../stages/trader-stage";
import { StageContext } from "../pipeline-context";
import { SequentialPipeline } from "../../orchestrator/sequential-pipeline";
import { createDefaultPipeline } from "../../stock-analyst-system";
import { AnalysisRequest } from "../../models/stage";
import { Confidence, MarketAnalysis, TradeAction } from "../../models/market";
import { StreamChunk } from "../../provider/agent-provider";
import {
  InvalidInputError,
  PipelineConfigurationError,
  StageContractViolationError,
} from "../../errors/pipeline-errors";
import {
  ANALYST_REPLY,
  FakeMarketData,
  FakeWebSearch,
  HEADLINES,
  MockProvider,
  analystRole,
  makeSnapshot,
  traderRole,
} from "../../__tests__/fakes";

function contextFor(
  symbol: string,
  outputs: ReadonlyMap<string, unknown> = new Map()
): StageContext<AnalysisRequest> {
  return { runId: "run-1", request: { symbol, market: "US" }, outputs };
}

function analysisOf(symbol = "AAPL"): MarketAnalysis {
  return {
    symbol,
    snapshot: makeSnapshot({ symbol }),
    headlines: HEADLINES,
    summary: ANALYST_REPLY,
  };
}

describe("MarketAnalystStage", () => {
  let marketData: FakeMarketData;
  let webSearch: FakeWebSearch;
  let provider: MockProvider;
  let stage: MarketAnalystStage;

  beforeEach(() => {
    marketData = new FakeMarketData();
    webSearch = new FakeWebSearch();
    provider = new MockProvider();
    stage = new MarketAnalystStage({
      definition: analystRole(),
      capabilities: [marketData, webSearch],
      provider,
    });
  });

  it("should take its identity from the role definition", () => {
    expect(stage.name).toBe("market-analyst");
    expect(stage.role).toBe("Financial Market Analyst");
    expect(stage.capabilities.map((c) => c.kind)).toEqual(["market_data", "web_search"]);
  });

  it("should refuse to build without a web_search capability", () => {
    expect(
      () =>
        new MarketAnalystStage({
          definition: analystRole(),
          capabilities: [marketData],
          provider,
        })
    ).toThrow(
      new PipelineConfigurationError(
        'Stage "market-analyst" requires a web_search capability but none is registered'
      )
    );
  });

  it("should complete a one-stage pipeline with price, change and news", async () => {
    const pipeline = new SequentialPipeline<AnalysisRequest>([stage]);

    const result = await pipeline.run({ symbol: "AAPL", market: "US" });

    expect(result.status).toBe("completed");
    if (result.status !== "completed") return;
    expect(result.output).toEqual({
      symbol: "AAPL",
      snapshot: makeSnapshot(),
      headlines: HEADLINES,
      summary: ANALYST_REPLY,
    });

    expect(marketData.calls).toEqual(["AAPL"]);
    expect(webSearch.queries).toEqual(["AAPL news"]);

    const prompt = provider.requests[0].prompt;
    expect(prompt).toContain("- Price: 150 USD");
    expect(prompt).toContain("- Change: +2.94 (+2.00%)");
    expect(prompt).toContain("- Volume: 10000000");
    expect(prompt).toContain("1. Company beats estimates");
    expect(provider.requests[0].systemPrompt).toContain("You are a Financial Market Analyst.");
  });

  it("should reject an invalid symbol without calling capabilities", async () => {
    const result = await stage.execute(contextFor("not a ticker"));

    expect(result.type).toBe("failed");
    expect(result.type === "failed" && result.error).toBeInstanceOf(InvalidInputError);
    expect(marketData.calls).toEqual([]);
  });

  it("should fail with CapabilityUnavailable when the symbol has no data", async () => {
    await expect(stage.execute(contextFor("ZZZZ"))).rejects.toThrow(
      'Capability "fake-market-data" unavailable: NotFound: no data for ZZZZ'
    );
    expect(provider.requests).toHaveLength(0);
  });

  it("should fail with CapabilityUnavailable when search fails", async () => {
    webSearch.error = new Error("search offline");

    await expect(stage.execute(contextFor("AAPL"))).rejects.toThrow(
      'Capability "fake-search" unavailable: search offline'
    );
  });

  it("should report model failures as the language-model capability", async () => {
    provider.error = new Error("[Groq] API error 503: unavailable");

    await expect(stage.execute(contextFor("AAPL"))).rejects.toThrow(
      'Capability "language-model" unavailable: [Groq] API error 503: unavailable'
    );
  });

  it("should stream model output when the provider supports it", async () => {
    provider.streaming = true;
    const chunks: [string, StreamChunk][] = [];

    await stage.execute({
      ...contextFor("AAPL"),
      onStreamChunk: (stageName, chunk) => chunks.push([stageName, chunk]),
    });

    expect(chunks).toEqual([["market-analyst", { type: "text", content: ANALYST_REPLY }]]);
  });

  it("should not stream when the provider cannot", async () => {
    const chunks: StreamChunk[] = [];

    await stage.execute({
      ...contextFor("AAPL"),
      onStreamChunk: (_stage, chunk) => chunks.push(chunk),
    });

    expect(chunks).toEqual([]);
  });
});

describe("TraderStage", () => {
  let provider: MockProvider;
  let stage: TraderStage;

  beforeEach(() => {
    provider = new MockProvider();
    stage = new TraderStage({ definition: traderRole(), provider });
  });

  it("should turn the analysis into a recommendation", async () => {
    const outputs = new Map<string, unknown>([["market-analyst", analysisOf()]]);

    const result = await stage.execute(contextFor("AAPL", outputs));

    expect(result).toEqual({
      type: "completed",
      output: {
        symbol: "AAPL",
        action: TradeAction.BUY,
        confidence: Confidence.HIGH,
        rationale: ["Price momentum is positive", "Earnings beat expectations"],
        summary: "Momentum and earnings support a buy.",
      },
    });
    expect(provider.requests[0].prompt).toContain(ANALYST_REPLY);
    expect(provider.requests[0].role).toBe("Strategic Stock Trader");
  });

  it("should reject a missing analysis", async () => {
    await expect(stage.execute(contextFor("AAPL"))).rejects.toThrow(StageContractViolationError);
    expect(provider.requests).toHaveLength(0);
  });

  it("should reject a malformed analysis", async () => {
    const outputs = new Map<string, unknown>([["market-analyst", { symbol: "AAPL" }]]);

    await expect(stage.execute(contextFor("AAPL", outputs))).rejects.toThrow(
      'upstream "market-analyst" snapshot: Required'
    );
  });

  it("should fail when the reply has no decision", async () => {
    provider.responses.set("Strategic Stock Trader", "The outlook is unclear.");
    const outputs = new Map<string, unknown>([["market-analyst", analysisOf()]]);

    const result = await stage.execute(contextFor("AAPL", outputs));

    expect(result.type).toBe("failed");
    if (result.type !== "failed") return;
    expect(result.error).toBeInstanceOf(StageContractViolationError);
    expect(result.error.message).toBe(
      'Stage "trader" violated its output contract: reply does not contain a BUY, SELL or HOLD decision'
    );
  });

  it("should read the analysis from a configured stage name", async () => {
    const custom = new TraderStage({
      definition: traderRole(),
      provider,
      analysisStage: "research",
    });
    const outputs = new Map<string, unknown>([["research", analysisOf("MSFT")]]);

    const result = await custom.execute(contextFor("MSFT", outputs));

    expect(result.type === "completed" && result.output.symbol).toBe("MSFT");
  });
});

describe("parseRecommendation", () => {
  it("should parse fenced JSON with lower-case values", () => {
    const reply = [
      "Here is my call:",
      "```json",
      '{"action": "sell", "confidence": "low", "rationale": "Weak guidance"}',
      "```",
    ].join("\n");

    expect(parseRecommendation("TSLA", reply)).toEqual({
      symbol: "TSLA",
      action: TradeAction.SELL,
      confidence: Confidence.LOW,
      rationale: ["Weak guidance"],
      summary: "Weak guidance",
    });
  });

  it("should fall back to the decision word and bullet lines", () => {
    const reply = [
      "Recommendation: HOLD",
      "Confidence: medium",
      "- Valuation is stretched",
      "- Momentum is fading",
    ].join("\n");

    expect(parseRecommendation("AAPL", reply)).toEqual({
      symbol: "AAPL",
      action: TradeAction.HOLD,
      confidence: Confidence.MEDIUM,
      rationale: ["Valuation is stretched", "Momentum is fading"],
      summary: reply,
    });
  });

  it("should accept a lower-case decision in prose", () => {
    expect(parseRecommendation("AAPL", "I would buy this stock.")).toEqual({
      symbol: "AAPL",
      action: TradeAction.BUY,
      confidence: null,
      rationale: ["I would buy this stock."],
      summary: "I would buy this stock.",
    });
  });

  it("should prefer a labelled decision over earlier decision words", () => {
    const reply = 'Answer with one of "BUY" | "SELL" | "HOLD".\nI looked at a BUY case first.\nAction: hold';

    expect(parseRecommendation("AAPL", reply)?.action).toBe(TradeAction.HOLD);
  });

  it("should skip negated decision words", () => {
    expect(parseRecommendation("AAPL", "I would not BUY here; HOLD and wait.")?.action).toBe(
      TradeAction.HOLD
    );
  });

  it("should skip an echoed list of options", () => {
    const reply = 'Options were BUY / SELL / HOLD. Given the weak guidance I lean towards SELL.';

    expect(parseRecommendation("AAPL", reply)?.action).toBe(TradeAction.SELL);
  });

  it("should return null when only the options are echoed", () => {
    expect(parseRecommendation("AAPL", 'Reply with "BUY", "SELL" or "HOLD".')).toBeNull();
  });

  it("should return null without a decision", () => {
    expect(parseRecommendation("AAPL", '{"action": "MAYBE"}')).toBeNull();
    expect(parseRecommendation("AAPL", "No opinion today.")).toBeNull();
  });
});

describe("Default pipeline", () => {
  const roles = new Map([
    ["market-analyst", analystRole()],
    ["trader", traderRole()],
  ]);

  it("should run analyst then trader", async () => {
    const provider = new MockProvider();
    const pipeline = createDefaultPipeline({
      roles,
      capabilities: [new FakeMarketData(), new FakeWebSearch()],
      provider,
    });

    const result = await pipeline.run({ symbol: "AAPL", market: "US" });

    expect(pipeline.stageNames).toEqual(["market-analyst", "trader"]);
    expect(result.status).toBe("completed");
    if (result.status !== "completed") return;
    expect(result.context.map((e) => e.stage)).toEqual(["market-analyst", "trader"]);
    expect(provider.requests.map((r) => r.role)).toEqual([
      "Financial Market Analyst",
      "Strategic Stock Trader",
    ]);
  });

  it("should fail at market-analyst when the symbol is unknown", async () => {
    const provider = new MockProvider();
    const pipeline = createDefaultPipeline({
      roles,
      capabilities: [new FakeMarketData(), new FakeWebSearch()],
      provider,
    });

    const result = await pipeline.run({ symbol: "ZZZZ", market: "US" });

    expect(result.status).toBe("failed");
    if (result.status !== "failed") return;
    expect(result.stage).toBe("market-analyst");
    expect(result.error.code).toBe("CAPABILITY_UNAVAILABLE");
    expect(result.completedStages).toEqual([]);
    expect(provider.requests).toHaveLength(0);
  });

  it("should require both roles", () => {
    expect(() =>
      createDefaultPipeline({
        roles: new Map([["trader", traderRole()]]),
        capabilities: [],
        provider: new MockProvider(),
      })
    ).toThrow('Role "market-analyst" is not defined (available: trader)');
  });
});
