/**
 * SequentialPipeline - executes PipelineStages strictly in order.
 *
 * The pipeline owns stage order, output validation and failure handling.
 * It holds no per-run state, so one instance can serve concurrent runs.
 */

import { v4 as uuidv4 } from "uuid";
import { PipelineStage } from "../pipeline/pipeline-stage";
import { PipelineContext, StageContext } from "../pipeline/pipeline-context";
import { PipelineRunResult, StageResult } from "../pipeline/stage-result";
import { checkContract } from "../pipeline/output-contract";
import { RunPhase } from "../models/stage";
import { StreamChunk } from "../provider/agent-provider";
import {
  PipelineConfigurationError,
  PipelineError,
  StageContractViolationError,
  StageExecutionError,
  isPipelineError,
} from "../errors/pipeline-errors";

/**
 * Per-run options.
 */
export interface RunOptions {
  /** Run identifier (generated when omitted) */
  runId?: string;

  /** Cancels the run at the next stage boundary */
  signal?: AbortSignal;

  /** Callback for run phase changes */
  onPhaseChange?: (phase: RunPhase) => void | Promise<void>;

  /** Callback for streaming model output */
  onStreamChunk?: (stage: string, chunk: StreamChunk) => void;
}

/**
 * A composable, sequential analysis pipeline.
 *
 * ```
 * request
 *   → stage 1 (context: {})
 *     → stage 2 (context: {stage 1})
 *       → ...
 *         → stage n (context: {stage 1 .. stage n-1}) → output
 * ```
 *
 * Any stage failure aborts the run; no later stage executes and no
 * partial output is returned.
 */
export class SequentialPipeline<TRequest> {
  private readonly stages: readonly PipelineStage<TRequest, unknown>[];

  /**
   * @throws PipelineConfigurationError if there are no stages or names repeat
   */
  constructor(stages: readonly PipelineStage<TRequest, unknown>[]) {
    if (stages.length === 0) {
      throw new PipelineConfigurationError("A pipeline needs at least one stage");
    }

    const seen = new Set<string>();
    for (const stage of stages) {
      if (!stage.name) {
        throw new PipelineConfigurationError("Every stage needs a name");
      }
      if (seen.has(stage.name)) {
        throw new PipelineConfigurationError(`Duplicate stage name "${stage.name}"`);
      }
      seen.add(stage.name);
    }

    this.stages = [...stages];
  }

  /**
   * Stage names in execution order.
   */
  get stageNames(): string[] {
    return this.stages.map((s) => s.name);
  }

  /**
   * Execute the pipeline for one request.
   *
   * @returns The final stage's output, or the failing/cancelled stage
   */
  async run(request: TRequest, options: RunOptions = {}): Promise<PipelineRunResult> {
    const runId = options.runId ?? uuidv4();
    const context = new PipelineContext();
    const startTime = Date.now();
    const log = (message: string) => console.log(`[SequentialPipeline:${runId.slice(0, 8)}] ${message}`);

    log(`Starting run with ${this.stages.length} stage(s)`);
    await emitPhase(options, { type: "pending" });

    let output: unknown = undefined;

    for (const [index, stage] of this.stages.entries()) {
      if (options.signal?.aborted) {
        log(`Cancelled before stage ${stage.name}`);
        await emitPhase(options, { type: "cancelled", stage: stage.name });
        return {
          status: "cancelled",
          runId,
          stage: stage.name,
          completedStages: context.stageNames(),
          durationMs: Date.now() - startTime,
        };
      }

      await emitPhase(options, { type: "running", stage: stage.name, index });
      const stageStart = Date.now();

      const outcome = await this.executeStage(stage, {
        runId,
        request,
        outputs: context.snapshot(),
        onStreamChunk: options.onStreamChunk,
      });

      const error =
        outcome.type === "failed"
          ? outcome.error
          : recordOutput(context, stage.name, outcome.output);
      if (error) {
        console.error(
          `[SequentialPipeline:${runId.slice(0, 8)}] Stage ${stage.name} failed (${error.code}): ${error.message}`
        );
        await emitPhase(options, { type: "failed", stage: stage.name, error });
        return {
          status: "failed",
          runId,
          stage: stage.name,
          error,
          completedStages: context.stageNames(),
          durationMs: Date.now() - startTime,
        };
      }

      const durationMs = Date.now() - stageStart;
      if (outcome.type === "completed") {
        output = outcome.output;
      }
      log(`Stage ${stage.name} completed in ${durationMs}ms`);
      await emitPhase(options, { type: "stage_completed", stage: stage.name, index, durationMs });
    }

    log(`Run completed in ${Date.now() - startTime}ms`);
    await emitPhase(options, { type: "completed" });

    return {
      status: "completed",
      runId,
      output,
      context: context.entries(),
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Execute a single stage and check its output against the contract.
   * Whatever the stage throws becomes a failed result.
   */
  private async executeStage(
    stage: PipelineStage<TRequest, unknown>,
    stageContext: StageContext<TRequest>
  ): Promise<StageResult> {
    let result: StageResult;
    try {
      result = await stage.execute(stageContext);
    } catch (error) {
      return StageResult.Failed(toPipelineError(stage.name, error));
    }

    if (result.type === "failed") {
      return result;
    }

    const check = checkContract(stage.outputContract, result.output);
    if (!check.valid) {
      return StageResult.Failed(new StageContractViolationError(stage.name, check.issues));
    }

    return StageResult.Completed(check.value);
  }
}

/**
 * Record a validated output. Outputs that cannot be structured-cloned
 * (functions, class instances with private state) are rejected.
 */
function recordOutput(context: PipelineContext, stage: string, output: unknown): PipelineError | null {
  try {
    context.record(stage, output);
    return null;
  } catch (error) {
    return new StageContractViolationError(stage, [
      `output is not plain data: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }
}

function toPipelineError(stage: string, error: unknown): PipelineError {
  return isPipelineError(error) ? error : new StageExecutionError(stage, error);
}

/**
 * Helper to emit phase changes
 */
async function emitPhase(options: RunOptions, phase: RunPhase): Promise<void> {
  if (options.onPhaseChange) {
    await options.onPhaseChange(phase);
  }
}
