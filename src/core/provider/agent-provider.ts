/**
 * AgentProvider - base interface for language model execution.
 *
 * Stages hand a role-specific system prompt and a task prompt to a provider
 * and get text back. Providers can stream partial output.
 */

/**
 * Stream chunk types for real-time output
 */
export type StreamChunk =
  | { type: "text"; content: string }
  | { type: "error"; message: string };

/**
 * A single completion request.
 */
export interface AgentRequest {
  /** Display role of the calling stage, e.g. "Strategic Stock Trader" */
  role: string;

  /** Role behavior prompt (goal, backstory, expected output) */
  systemPrompt: string;

  /** The task for this turn */
  prompt: string;
}

/**
 * Base interface for agent execution providers
 */
export interface AgentProvider {
  /**
   * Execute a request and wait for the full output.
   *
   * @returns The model's final text
   */
  run(request: AgentRequest): Promise<string>;

  /**
   * Execute a request with streaming output.
   *
   * @param onChunk Callback for each output chunk
   * @returns The model's final text (all text chunks joined)
   */
  runStreaming(
    request: AgentRequest,
    onChunk: (chunk: StreamChunk) => void
  ): Promise<string>;

  /**
   * Declare what this provider can do.
   */
  capabilities(): ProviderCapabilities;
}

/**
 * Declares what a provider can do.
 */
export interface ProviderCapabilities {
  /** Human-readable provider name */
  name: string;

  /** Model identifier sent to the API */
  model: string;

  /** Whether runStreaming emits chunks as they arrive */
  supportsStreaming: boolean;
}
