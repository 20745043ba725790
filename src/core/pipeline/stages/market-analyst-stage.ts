/**
 * MarketAnalystStage - gathers price data and news, then summarizes them.
 */

import {
  Capability,
  MarketDataCapability,
  WebSearchCapability,
  bindCapabilities,
  findCapability,
  invokeCapability,
} from "../../capabilities/capability";
import { AgentProvider } from "../../provider/agent-provider";
import { RoleDefinition, buildSystemPrompt } from "../../role/role-definition";
import {
  MarketAnalysis,
  MarketAnalysisSchema,
  MarketSnapshot,
  SearchResult,
} from "../../models/market";
import { AnalysisRequest } from "../../models/stage";
import { InvalidInputError, PipelineConfigurationError } from "../../errors/pipeline-errors";
import { isValidSymbol } from "../../market/market-config";
import { PipelineStage } from "../pipeline-stage";
import { StageContext } from "../pipeline-context";
import { OutputContract } from "../output-contract";
import { StageResult } from "../stage-result";
import { callAgent } from "./agent-call";

export interface MarketAnalystStageConfig {
  definition: RoleDefinition;
  /** Available capabilities; the stage binds the kinds its definition lists */
  capabilities: readonly Capability[];
  provider: AgentProvider;
}

/**
 * Stage 1: Market Analysis
 *
 * This stage:
 * 1. Validates the requested symbol
 * 2. Looks up the latest price, change and volume
 * 3. Searches for recent news about the symbol
 * 4. Asks the model for a bullet point summary of performance
 */
export class MarketAnalystStage implements PipelineStage<AnalysisRequest, MarketAnalysis> {
  readonly name: string;
  readonly role: string;
  readonly goal: string;
  readonly capabilities: readonly Capability[];
  readonly outputContract: OutputContract<MarketAnalysis>;

  private definition: RoleDefinition;
  private marketData: MarketDataCapability;
  private webSearch: WebSearchCapability;
  private provider: AgentProvider;

  constructor(config: MarketAnalystStageConfig) {
    this.definition = config.definition;
    this.name = config.definition.name;
    this.role = config.definition.role;
    this.goal = config.definition.goal;
    this.provider = config.provider;
    this.capabilities = bindCapabilities(
      this.name,
      config.definition.capabilities,
      config.capabilities
    );
    this.outputContract = {
      description: config.definition.expectedOutput,
      schema: MarketAnalysisSchema,
    };

    const marketData = findCapability(this.capabilities, "market_data");
    const webSearch = findCapability(this.capabilities, "web_search");
    if (!marketData || !webSearch) {
      throw new PipelineConfigurationError(
        `Stage "${this.name}" needs market_data and web_search in its role definition`
      );
    }
    this.marketData = marketData;
    this.webSearch = webSearch;
  }

  async execute(context: StageContext<AnalysisRequest>): Promise<StageResult<MarketAnalysis>> {
    const symbol = context.request.symbol;
    if (!isValidSymbol(symbol)) {
      return StageResult.Failed(new InvalidInputError(symbol, "not a valid ticker symbol"));
    }

    const snapshot = await invokeCapability(this.marketData.name, () =>
      this.marketData.lookup(symbol)
    );
    const headlines = await invokeCapability(this.webSearch.name, () =>
      this.webSearch.search(`${symbol} news`)
    );

    const summary = await callAgent(this.provider, this.name, context, {
      role: this.role,
      systemPrompt: buildSystemPrompt(this.definition),
      prompt: this.buildAnalysisPrompt(symbol, snapshot, headlines),
    });

    return StageResult.Completed({
      symbol,
      snapshot,
      headlines,
      summary: summary.trim(),
    });
  }

  private buildAnalysisPrompt(
    symbol: string,
    snapshot: MarketSnapshot,
    headlines: SearchResult[]
  ): string {
    const news =
      headlines.length > 0
        ? headlines
            .map((h, i) => `${i + 1}. ${h.title}\n   ${h.snippet}\n   (${h.url})`)
            .join("\n")
        : "No recent news found.";

    return `
Analyze the performance of ${symbol}. Focus on today's price and news.

## Market Data
${formatSnapshot(snapshot)}

## News
${news}

## Your Response

${this.definition.expectedOutput} Reference the current price and the change explicitly.
`.trim();
  }
}

/**
 * Render a snapshot as the key/value block given to the model.
 */
export function formatSnapshot(snapshot: MarketSnapshot): string {
  const change =
    snapshot.change !== null && snapshot.changePercent !== null
      ? `${formatSigned(snapshot.change)} (${formatSigned(snapshot.changePercent)}%)`
      : "N/A";

  return [
    `- Symbol: ${snapshot.symbol}`,
    `- Price: ${snapshot.price} ${snapshot.currency}`,
    `- Previous Close: ${snapshot.previousClose ?? "N/A"}`,
    `- Change: ${change}`,
    `- Volume: ${snapshot.volume ?? "N/A"}`,
    `- As Of: ${snapshot.timestamp}`,
  ].join("\n");
}

function formatSigned(value: number): string {
  const fixed = value.toFixed(2);
  return value > 0 ? `+${fixed}` : fixed;
}
