/**
 * PipelineStage - base interface for stages in the analysis pipeline.
 */

import { Capability } from "../capabilities/capability";
import { StageContext } from "./pipeline-context";
import { OutputContract } from "./output-contract";
import { StageResult } from "./stage-result";

/**
 * A single stage in the analysis pipeline.
 *
 * Stages are composable, testable units that execute in sequence.
 * Each stage reads earlier outputs from the context; it never writes to it.
 * The runner records the returned output once the contract check passes.
 */
export interface PipelineStage<TRequest = unknown, TOutput = unknown> {
  /** Unique stage identifier */
  readonly name: string;

  /** Display role */
  readonly role: string;

  /** What the stage is trying to achieve */
  readonly goal: string;

  /** External calls the stage is bound to */
  readonly capabilities: readonly Capability[];

  /** Declared shape of the output */
  readonly outputContract: OutputContract<TOutput>;

  /**
   * Execute this stage.
   *
   * @param context The request plus the outputs of every earlier stage
   * @returns The stage result
   */
  execute(context: StageContext<TRequest>): Promise<StageResult<TOutput>>;
}
