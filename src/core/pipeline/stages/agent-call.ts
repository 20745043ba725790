/**
 * Shared helper for stages that ask the language model for their output.
 */

import { AgentProvider, AgentRequest } from "../../provider/agent-provider";
import { invokeCapability } from "../../capabilities/capability";
import { StageContext } from "../pipeline-context";

export const LANGUAGE_MODEL_CAPABILITY = "language-model";

/**
 * Run the provider for a stage, streaming when the run asked for chunks.
 * Provider failures surface as CapabilityUnavailableError.
 */
export function callAgent(
  provider: AgentProvider,
  stage: string,
  context: StageContext<unknown>,
  request: AgentRequest
): Promise<string> {
  const onStreamChunk = context.onStreamChunk;
  return invokeCapability(LANGUAGE_MODEL_CAPABILITY, () =>
    onStreamChunk && provider.capabilities().supportsStreaming
      ? provider.runStreaming(request, (chunk) => onStreamChunk(stage, chunk))
      : provider.run(request)
  );
}
