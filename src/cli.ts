#!/usr/bin/env node
/**
 * stock-analyst - command line entry point.
 *
 * @example
 * # Analyze a US ticker
 * stock-analyst AAPL
 *
 * # Indian listing with six months of closes, streaming the model's text
 * stock-analyst reliance --market NSE --history --stream
 *
 * # Recorded runs (all tickers, or one)
 * stock-analyst --runs 5
 * stock-analyst AAPL --runs
 */

import "dotenv/config";
import { Command, InvalidArgumentError } from "commander";
import { loadConfig, ConfigError } from "./core/config/app-config";
import { createStockAnalystSystem } from "./core/stock-analyst-system";
import { DEFAULT_MARKET, MARKETS, normalizeTicker } from "./core/market/market-config";
import { AnalysisOutcome, StockAnalyst } from "./core/orchestrator/stock-analyst";
import { PriceBar, computeChange } from "./core/models/market";
import { PriceHistorySource } from "./core/capabilities/capability";
import { EventBus } from "./core/events/event-bus";
import { RunRecord } from "./core/store/run-store";
import { isPipelineError } from "./core/errors/pipeline-errors";

const DEFAULT_RUN_LIMIT = 10;

/**
 * The parts of the system the CLI drives.
 */
export interface CliSystem {
  analyst: StockAnalyst;
  pipeline: { readonly stageNames: string[] };
  marketData: PriceHistorySource;
  eventBus: EventBus;
  shutdown(): Promise<void>;
}

interface CliOptions {
  market: string;
  history?: boolean;
  stream?: boolean;
  listMarkets?: boolean;
  runs?: number | true;
}

/**
 * Summarize closes as first/last/min/max over the range.
 */
export function formatHistory(symbol: string, bars: PriceBar[]): string {
  if (bars.length === 0) {
    return `${symbol} - no price history`;
  }
  const closes = bars.map((b) => b.close);
  const first = bars[0];
  const last = bars[bars.length - 1];
  const { changePercent } = computeChange(last.close, first.close);
  const change =
    changePercent === null
      ? "N/A"
      : `${changePercent >= 0 ? "+" : ""}${changePercent.toFixed(2)}%`;
  return [
    `${symbol} - ${bars.length} sessions from ${first.date} to ${last.date}`,
    `  First close: ${first.close.toFixed(2)}`,
    `  Last close:  ${last.close.toFixed(2)} (${change})`,
    `  Low / High:  ${Math.min(...closes).toFixed(2)} / ${Math.max(...closes).toFixed(2)}`,
  ].join("\n");
}

/**
 * Render a finished run for the terminal.
 */
export function formatOutcome(outcome: AnalysisOutcome): string {
  switch (outcome.status) {
    case "completed": {
      const rec = outcome.output;
      const lines = [
        `Recommendation for ${rec.symbol}: ${rec.action}${rec.confidence ? ` (confidence: ${rec.confidence})` : ""}`,
        "",
        ...rec.rationale.map((reason) => `  - ${reason}`),
      ];
      if (rec.summary !== rec.rationale.join(" ")) {
        lines.push("", rec.summary);
      }
      return lines.join("\n");
    }
    case "failed":
      return `Analysis failed at stage "${outcome.stage}" [${outcome.error.code}]: ${outcome.error.message}`;
    case "cancelled":
      return `Analysis cancelled before stage "${outcome.stage}"`;
  }
}

/**
 * One line per recorded run: start time, symbol, status, then the decision
 * or the stage that stopped the run.
 */
export function formatRuns(records: RunRecord[]): string {
  if (records.length === 0) {
    return "No recorded runs";
  }
  return records
    .map((record) => {
      const result =
        record.status === "completed"
          ? record.action ?? "-"
          : `${record.stage ?? "-"}${record.errorCode ? ` [${record.errorCode}]` : ""}`;
      return `${record.startedAt}  ${record.symbol.padEnd(12)}${record.status.padEnd(11)}${result}`;
    })
    .join("\n");
}

function parseRunLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidArgumentError("Run count must be a positive integer.");
  }
  return limit;
}

function listMarkets(): void {
  for (const market of MARKETS) {
    console.log(
      `${market.id.padEnd(5)} ${market.displayName.padEnd(20)} suffix "${market.suffix}"  e.g. ${market.example}`
    );
  }
}

async function showRuns(system: CliSystem, ticker: string | undefined, options: CliOptions): Promise<void> {
  const records = ticker
    ? await system.analyst.historyFor(ticker, options.market)
    : await system.analyst.history(options.runs === true ? DEFAULT_RUN_LIMIT : options.runs);
  console.log(formatRuns(records));
}

async function analyze(system: CliSystem, ticker: string, options: CliOptions): Promise<void> {
  const controller = new AbortController();
  const onInterrupt = () => {
    console.log("\n[cli] Cancelling after the current stage...");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  const unsubscribe = system.eventBus.subscribe((event) => {
    if (event.type === "phase" && event.phase.type === "running") {
      console.log(`[cli] ${event.phase.stage} is working on ${event.symbol}...`);
    }
  });

  try {
    console.log(`[cli] Pipeline: ${system.pipeline.stageNames.join(" -> ")}`);

    if (options.history) {
      const symbol = normalizeTicker(ticker, options.market);
      const bars = await system.marketData.history(symbol, "6mo");
      console.log(formatHistory(symbol, bars));
      console.log("");
    }

    const outcome = await system.analyst.analyze(ticker, options.market, {
      signal: controller.signal,
      onStreamChunk: options.stream
        ? (_stage, chunk) => {
            if (chunk.type === "text") process.stdout.write(chunk.content);
          }
        : undefined,
    });

    if (options.stream) process.stdout.write("\n\n");
    console.log(formatOutcome(outcome));
    process.exitCode = outcome.status === "completed" ? 0 : 1;
  } finally {
    unsubscribe();
    process.off("SIGINT", onInterrupt);
  }
}

/**
 * Build the `stock-analyst` command. The system is created only when a
 * command needs it, so `--list-markets` runs without API keys.
 */
export function createProgram(
  createSystem: () => CliSystem = () => createStockAnalystSystem(loadConfig())
): Command {
  const program = new Command();

  program
    .name("stock-analyst")
    .description("Buy/Sell/Hold recommendation for a ticker from a market analyst and a trader")
    .version("0.1.0")
    .argument("[ticker]", "ticker symbol, without the market suffix")
    .option("-m, --market <id>", `market (${MARKETS.map((m) => m.id).join(", ")})`, DEFAULT_MARKET)
    .option("--history", "print six months of closing prices first")
    .option("--stream", "stream the model's text as it arrives")
    .option("--list-markets", "list supported markets")
    .option("--runs [limit]", "list recorded runs, for the ticker when one is given", parseRunLimit)
    .action(async (ticker: string | undefined, options: CliOptions) => {
      if (options.listMarkets) {
        listMarkets();
        return;
      }
      if (!ticker && options.runs === undefined) {
        console.error("[cli] A ticker is required. See --help.");
        process.exitCode = 1;
        return;
      }

      const system = createSystem();
      try {
        if (options.runs !== undefined) {
          await showRuns(system, ticker, options);
        } else if (ticker) {
          await analyze(system, ticker, options);
        }
      } finally {
        await system.shutdown();
      }
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      if (error instanceof ConfigError) {
        console.error(`[cli] ${error.message}`);
      } else if (isPipelineError(error)) {
        console.error(`[cli] ${error.code}: ${error.message}`);
      } else {
        console.error("[cli] Unexpected error:", error);
      }
      process.exitCode = 1;
    });
}
