/**
 * StageResult - the outcome of a PipelineStage execution.
 */

import { PipelineError } from "../errors/pipeline-errors";

/**
 * The outcome of a stage execution.
 */
export type StageResult<TOutput = unknown> =
  | { type: "completed"; output: TOutput }
  | { type: "failed"; error: PipelineError };

/**
 * Helper functions to create stage results
 */
export const StageResult = {
  Completed: <TOutput>(output: TOutput): StageResult<TOutput> => ({
    type: "completed",
    output,
  }),

  Failed: (error: PipelineError): StageResult<never> => ({
    type: "failed",
    error,
  }),
};

/**
 * One entry of an accumulated run context.
 */
export interface ContextEntry {
  stage: string;
  output: unknown;
}

/**
 * The outcome of a whole pipeline run.
 *
 * A failed or cancelled run carries no stage output: downstream advice
 * is only meaningful when every upstream stage succeeded.
 */
export type PipelineRunResult<TOutput = unknown> =
  | {
      status: "completed";
      runId: string;
      output: TOutput;
      context: ContextEntry[];
      durationMs: number;
    }
  | {
      status: "failed";
      runId: string;
      stage: string;
      error: PipelineError;
      completedStages: string[];
      durationMs: number;
    }
  | {
      status: "cancelled";
      runId: string;
      /** The stage that did not start */
      stage: string;
      completedStages: string[];
      durationMs: number;
    };
