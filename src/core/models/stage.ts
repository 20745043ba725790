/**
 * Stage models - the request a pipeline runs for and the per-run phases.
 */

import { PipelineError } from "../errors/pipeline-errors";

/**
 * One analysis request: a normalized ticker and the market it trades on.
 */
export interface AnalysisRequest {
  /** Ticker with its market suffix, e.g. "RELIANCE.NS" */
  symbol: string;

  /** Market identifier, e.g. "US" or "NSE" */
  market: string;
}

/**
 * Lifecycle of a single pipeline run.
 *
 * pending → running(stage_0) → ... → completed
 *                          ↘ failed(stage_i) | cancelled(stage_i)
 */
export type RunPhase =
  | { type: "pending" }
  | { type: "running"; stage: string; index: number }
  | { type: "stage_completed"; stage: string; index: number; durationMs: number }
  | { type: "completed" }
  | { type: "failed"; stage: string; error: PipelineError }
  | { type: "cancelled"; stage: string };

export type RunStatus = "completed" | "failed" | "cancelled";
