/**
 * PipelineContext - per-run context flowing through all pipeline stages.
 *
 * The context only grows: each stage's output is recorded once, deep-frozen,
 * and never replaced. Stages receive a read-only snapshot.
 */

import { StreamChunk } from "../provider/agent-provider";
import { StageContractViolationError } from "../errors/pipeline-errors";
import { ContextEntry } from "./stage-result";
import { OutputContract, checkContract } from "./output-contract";

/**
 * What a stage sees when it executes.
 */
export interface StageContext<TRequest = unknown> {
  /** Identifier of the current run */
  runId: string;

  /** The request the pipeline runs for */
  request: TRequest;

  /** Outputs of every earlier stage, in execution order */
  outputs: ReadonlyMap<string, unknown>;

  /** Callback for streaming model output */
  onStreamChunk?: (stage: string, chunk: StreamChunk) => void;
}

/**
 * Accumulated outputs of one run. Owned by the runner.
 */
export class PipelineContext {
  private outputs = new Map<string, unknown>();

  /**
   * Record a stage's output.
   *
   * @throws Error if the stage already recorded an output in this run
   */
  record(stage: string, output: unknown): void {
    if (this.has(stage)) {
      throw new Error(`[PipelineContext] Output for stage "${stage}" already recorded`);
    }
    this.outputs.set(stage, deepFreeze(structuredClone(output)));
  }

  has(stage: string): boolean {
    return this.outputs.has(stage);
  }

  /**
   * Read-only view handed to stages. Later records do not show up in an
   * earlier snapshot.
   */
  snapshot(): ReadonlyMap<string, unknown> {
    return new Map(this.outputs);
  }

  entries(): ContextEntry[] {
    return Array.from(this.outputs, ([stage, output]) => ({ stage, output }));
  }

  stageNames(): string[] {
    return Array.from(this.outputs.keys());
  }
}

/**
 * Read and validate an upstream stage's output.
 *
 * @throws StageContractViolationError if the output is missing or malformed
 */
export function readStageOutput<TOutput>(
  context: StageContext<unknown>,
  reader: string,
  upstream: string,
  contract: OutputContract<TOutput>
): TOutput {
  if (!context.outputs.has(upstream)) {
    throw new StageContractViolationError(reader, [
      `missing output from upstream stage "${upstream}"`,
    ]);
  }
  const check = checkContract(contract, context.outputs.get(upstream));
  if (!check.valid) {
    throw new StageContractViolationError(
      reader,
      check.issues.map((issue) => `upstream "${upstream}" ${issue}`)
    );
  }
  return check.value;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
