/**
 * Pipeline errors - typed failures surfaced by stages and the runner.
 *
 * Every error a caller receives from a run is a PipelineError; the `code`
 * field is stable and safe to switch on.
 */

export type PipelineErrorCode =
  | "CAPABILITY_UNAVAILABLE"
  | "INVALID_INPUT"
  | "STAGE_CONTRACT_VIOLATION"
  | "STAGE_EXECUTION_FAILED"
  | "PIPELINE_CONFIGURATION";

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * An external call (market data, web search, language model) failed or
 * returned no data.
 */
export class CapabilityUnavailableError extends PipelineError {
  readonly code = "CAPABILITY_UNAVAILABLE";

  constructor(
    public readonly capability: string,
    public readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Capability "${capability}" unavailable: ${reason}`, options);
  }
}

/**
 * The request itself is malformed (bad ticker, unknown market).
 */
export class InvalidInputError extends PipelineError {
  readonly code = "INVALID_INPUT";

  constructor(
    public readonly input: string,
    public readonly reason: string
  ) {
    super(`Invalid input "${input}": ${reason}`);
  }
}

/**
 * A stage produced, or was handed, output that does not match its contract.
 */
export class StageContractViolationError extends PipelineError {
  readonly code = "STAGE_CONTRACT_VIOLATION";

  constructor(
    public readonly stage: string,
    public readonly issues: string[]
  ) {
    super(`Stage "${stage}" violated its output contract: ${issues.join("; ")}`);
  }
}

/**
 * A stage threw something that is not a PipelineError.
 */
export class StageExecutionError extends PipelineError {
  readonly code = "STAGE_EXECUTION_FAILED";

  constructor(
    public readonly stage: string,
    cause: unknown
  ) {
    super(
      `Stage "${stage}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

/**
 * The pipeline could not be assembled from its configuration.
 */
export class PipelineConfigurationError extends PipelineError {
  readonly code = "PIPELINE_CONFIGURATION";
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
