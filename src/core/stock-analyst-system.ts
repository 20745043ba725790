/**
 * StockAnalystSystem - wires configuration into a ready-to-use analyst.
 *
 * Central object that holds the capabilities, provider, pipeline, run store
 * and event bus for one process.
 */

import { AppConfig } from "./config/app-config";
import { Capability } from "./capabilities/capability";
import { YahooMarketDataClient } from "./capabilities/yahoo-market-data";
import { TavilySearchClient } from "./capabilities/tavily-web-search";
import { AgentProvider } from "./provider/agent-provider";
import { LlmAgentProvider } from "./provider/llm-agent-provider";
import { RoleDefinition } from "./role/role-definition";
import { loadRoles, requireRole } from "./role/role-loader";
import { MarketAnalystStage } from "./pipeline/stages/market-analyst-stage";
import { TraderStage } from "./pipeline/stages/trader-stage";
import { SequentialPipeline } from "./orchestrator/sequential-pipeline";
import { StockAnalyst } from "./orchestrator/stock-analyst";
import { AnalysisRequest } from "./models/stage";
import { EventBus } from "./events/event-bus";
import { InMemoryRunStore, RunStore } from "./store/run-store";
import { RedisRunStore, createRedisClient } from "./store/redis-run-store";

export interface StockAnalystSystem {
  analyst: StockAnalyst;
  pipeline: SequentialPipeline<AnalysisRequest>;
  marketData: YahooMarketDataClient;
  eventBus: EventBus;
  runStore: RunStore;
  /** Release connections held by the system */
  shutdown(): Promise<void>;
}

/**
 * Build the default market-analyst → trader pipeline.
 */
export function createDefaultPipeline(params: {
  roles: Map<string, RoleDefinition>;
  capabilities: readonly Capability[];
  provider: AgentProvider;
}): SequentialPipeline<AnalysisRequest> {
  const analyst = new MarketAnalystStage({
    definition: requireRole(params.roles, "market-analyst"),
    capabilities: params.capabilities,
    provider: params.provider,
  });
  const trader = new TraderStage({
    definition: requireRole(params.roles, "trader"),
    capabilities: params.capabilities,
    provider: params.provider,
    analysisStage: analyst.name,
  });
  return new SequentialPipeline<AnalysisRequest>([analyst, trader]);
}

/**
 * Create the system from configuration.
 */
export function createStockAnalystSystem(config: AppConfig): StockAnalystSystem {
  const marketData = new YahooMarketDataClient({
    baseUrl: config.marketData.baseUrl,
    timeoutMs: config.httpTimeoutMs,
  });
  const webSearch = new TavilySearchClient({
    apiKey: config.search.apiKey,
    maxResults: config.search.maxResults,
    timeoutMs: config.httpTimeoutMs,
  });
  const provider = new LlmAgentProvider({
    name: "Groq",
    apiKey: config.llm.apiKey,
    baseUrl: config.llm.baseUrl,
    model: config.llm.model,
    temperature: config.llm.temperature,
    timeoutMs: config.llm.timeoutMs,
  });

  const pipeline = createDefaultPipeline({
    roles: loadRoles(config.rolesDir),
    capabilities: [marketData, webSearch],
    provider,
  });

  const redis = config.redisUrl ? createRedisClient(config.redisUrl) : undefined;
  const runStore: RunStore = redis
    ? new RedisRunStore({ client: redis, ttlSeconds: config.runTtlSeconds })
    : new InMemoryRunStore();
  const eventBus = new EventBus();

  return {
    analyst: new StockAnalyst({ pipeline, runStore, eventBus }),
    pipeline,
    marketData,
    eventBus,
    runStore,
    async shutdown() {
      if (redis) {
        await redis.quit();
      }
    },
  };
}
