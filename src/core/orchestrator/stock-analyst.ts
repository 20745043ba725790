/**
 * StockAnalyst - the stock analysis entry point.
 */

import { v4 as uuidv4 } from "uuid";
import { SequentialPipeline } from "./sequential-pipeline";
import { AnalysisRequest, RunPhase } from "../models/stage";
import { Recommendation, RecommendationSchema } from "../models/market";
import { PipelineRunResult } from "../pipeline/stage-result";
import { StreamChunk } from "../provider/agent-provider";
import { StageContractViolationError } from "../errors/pipeline-errors";
import { DEFAULT_MARKET, getMarket, normalizeTicker } from "../market/market-config";
import { EventBus } from "../events/event-bus";
import { InMemoryRunStore, RunRecord, RunStore } from "../store/run-store";

/**
 * Configuration for the analyst.
 */
export interface StockAnalystConfig {
  /** Pipeline whose last stage produces a Recommendation */
  pipeline: SequentialPipeline<AnalysisRequest>;

  /** Run history (default: in-memory) */
  runStore?: RunStore;

  /** Event bus for run events (default: a private bus) */
  eventBus?: EventBus;
}

export interface AnalyzeOptions {
  /** Cancels the run at the next stage boundary */
  signal?: AbortSignal;

  /** Callback for streaming model output */
  onStreamChunk?: (stage: string, chunk: StreamChunk) => void;
}

export type AnalysisOutcome = PipelineRunResult<Recommendation>;

/**
 * The stock analysis entry point.
 *
 * Normalizes the ticker, runs the pipeline and reports the run:
 *
 * ```
 * "reliance" + NSE
 *   → normalize → RELIANCE.NS
 *     → [market-analyst] price, change, news → summary
 *       → [trader] BUY / SELL / HOLD with reasons
 * ```
 */
export class StockAnalyst {
  readonly eventBus: EventBus;
  readonly runStore: RunStore;
  private pipeline: SequentialPipeline<AnalysisRequest>;

  constructor(config: StockAnalystConfig) {
    this.pipeline = config.pipeline;
    this.runStore = config.runStore ?? new InMemoryRunStore();
    this.eventBus = config.eventBus ?? new EventBus();
  }

  /**
   * Analyze one ticker.
   *
   * @param ticker Raw user input, e.g. "aapl" or "RELIANCE"
   * @param market Market identifier (default "US")
   * @throws InvalidInputError before any stage runs if the ticker or market is invalid
   */
  async analyze(
    ticker: string,
    market: string = DEFAULT_MARKET,
    options: AnalyzeOptions = {}
  ): Promise<AnalysisOutcome> {
    const symbol = normalizeTicker(ticker, market);
    const request: AnalysisRequest = {
      symbol,
      market: getMarket(market)?.id ?? market,
    };
    const runId = uuidv4();
    const startedAt = new Date();

    console.log(`[StockAnalyst] Analyzing ${symbol} (run ${runId})`);
    this.eventBus.emit({
      type: "run_started",
      runId,
      symbol,
      market: request.market,
      timestamp: startedAt,
    });

    const result = await this.pipeline.run(request, {
      runId,
      signal: options.signal,
      onStreamChunk: options.onStreamChunk,
      onPhaseChange: (phase: RunPhase) => {
        this.eventBus.emit({ type: "phase", runId, symbol, phase, timestamp: new Date() });
      },
    });

    const outcome = toOutcome(result);

    try {
      await this.runStore.save(toRunRecord(request, outcome, startedAt));
    } catch (err) {
      console.error(`[StockAnalyst] Failed to record run ${runId}:`, err);
    }
    this.eventBus.emit({
      type: "run_finished",
      runId,
      symbol,
      status: outcome.status,
      durationMs: outcome.durationMs,
      timestamp: new Date(),
    });

    return outcome;
  }

  /**
   * Recorded runs, newest first.
   */
  history(limit?: number): Promise<RunRecord[]> {
    return this.runStore.list(limit);
  }

  /**
   * Recorded runs for one ticker, newest first.
   *
   * Rejects with InvalidInputError if the ticker or market is invalid.
   */
  async historyFor(ticker: string, market: string = DEFAULT_MARKET): Promise<RunRecord[]> {
    return this.runStore.listBySymbol(normalizeTicker(ticker, market));
  }
}

/**
 * Narrow a completed run's output to a Recommendation.
 */
function toOutcome(result: PipelineRunResult): AnalysisOutcome {
  if (result.status !== "completed") {
    return result;
  }

  const parsed = RecommendationSchema.safeParse(result.output);
  if (parsed.success) {
    return { ...result, output: parsed.data };
  }

  const finalStage = result.context[result.context.length - 1]?.stage ?? "unknown";
  return {
    status: "failed",
    runId: result.runId,
    stage: finalStage,
    error: new StageContractViolationError(finalStage, [
      "final output is not a recommendation",
    ]),
    completedStages: result.context.slice(0, -1).map((entry) => entry.stage),
    durationMs: result.durationMs,
  };
}

function toRunRecord(
  request: AnalysisRequest,
  outcome: AnalysisOutcome,
  startedAt: Date
): RunRecord {
  const base = {
    runId: outcome.runId,
    symbol: request.symbol,
    market: request.market,
    startedAt: startedAt.toISOString(),
    finishedAt: new Date().toISOString(),
  };

  switch (outcome.status) {
    case "completed":
      return {
        ...base,
        status: "completed",
        stage: null,
        errorCode: null,
        errorMessage: null,
        action: outcome.output.action,
      };
    case "failed":
      return {
        ...base,
        status: "failed",
        stage: outcome.stage,
        errorCode: outcome.error.code,
        errorMessage: outcome.error.message,
        action: null,
      };
    case "cancelled":
      return {
        ...base,
        status: "cancelled",
        stage: outcome.stage,
        errorCode: null,
        errorMessage: null,
        action: null,
      };
  }
}
