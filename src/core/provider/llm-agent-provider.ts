/**
 * LlmAgentProvider - OpenAI-compatible chat completions provider.
 *
 * Works against any endpoint that speaks the /chat/completions protocol
 * (Groq, OpenAI, local gateways). Streaming uses server-sent events.
 */

import { z } from "zod";
import {
  AgentProvider,
  AgentRequest,
  ProviderCapabilities,
  StreamChunk,
} from "./agent-provider";
import { startTimeout, untilAborted } from "../http/abortable";

const GROQ_BASE_URL = "https://api.groq.com/openai/v1";
const DEFAULT_MODEL = "llama-3.3-70b-versatile";
const DEFAULT_TIMEOUT_MS = 120000;

/**
 * Configuration for LLM provider
 */
export interface LlmProviderConfig {
  /** Provider name (e.g., "Groq") */
  name: string;

  /** API key */
  apiKey: string;

  /** Model name */
  model?: string;

  /** Base URL for API (without /chat/completions) */
  baseUrl?: string;

  /** Sampling temperature */
  temperature?: number;

  /** Request timeout in milliseconds */
  timeoutMs?: number;

  /** Fetch implementation (defaults to the global fetch) */
  fetch?: typeof fetch;
}

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
});

const CompletionChunkSchema = z.object({
  choices: z.array(
    z.object({
      delta: z.object({
        content: z.string().nullish(),
      }),
    })
  ),
});

/**
 * LLM-based agent provider.
 */
export class LlmAgentProvider implements AgentProvider {
  private config: LlmProviderConfig;
  private baseUrl: string;
  private model: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor(config: LlmProviderConfig) {
    this.config = config;
    this.baseUrl = (config.baseUrl ?? GROQ_BASE_URL).replace(/\/$/, "");
    this.model = config.model ?? DEFAULT_MODEL;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  async run(request: AgentRequest): Promise<string> {
    return this.post(request, false, async (response, signal) => {
      const parsed = CompletionSchema.safeParse(await untilAborted(response.json(), signal));
      if (!parsed.success) {
        throw new Error(`[${this.config.name}] Unexpected completion response shape`);
      }
      return parsed.data.choices[0].message.content ?? "";
    });
  }

  async runStreaming(
    request: AgentRequest,
    onChunk: (chunk: StreamChunk) => void
  ): Promise<string> {
    return this.post(request, true, async (response, signal) => {
      if (!response.body) {
        throw new Error(`[${this.config.name}] Streaming response has no body`);
      }

      const reader = response.body.getReader();
      const decoder = new TextDecoder();
      const events = new SseEventBuffer();
      let output = "";

      const handle = (payload: string) => {
        if (payload === "[DONE]") return;

        let data: unknown;
        try {
          data = JSON.parse(payload);
        } catch (err) {
          console.warn(`[LlmAgentProvider:${this.config.name}] Skipping malformed SSE event:`, err);
          return;
        }
        const parsed = CompletionChunkSchema.safeParse(data);
        const content = parsed.success ? parsed.data.choices[0]?.delta.content : undefined;
        if (content) {
          output += content;
          onChunk({ type: "text", content });
        }
      };

      try {
        for (;;) {
          const { done, value } = await untilAborted(reader.read(), signal);
          if (done) break;
          events.push(decoder.decode(value, { stream: true })).forEach(handle);
        }
        events.push(decoder.decode()).forEach(handle);
        events.flush().forEach(handle);
      } finally {
        if (signal.aborted) {
          reader.cancel().catch((err: unknown) => {
            console.warn(`[LlmAgentProvider:${this.config.name}] Failed to cancel stream:`, err);
          });
        }
      }

      return output;
    });
  }

  capabilities(): ProviderCapabilities {
    return {
      name: this.config.name,
      model: this.model,
      supportsStreaming: true,
    };
  }

  /**
   * POST a completion request and consume the response while the timeout
   * is still armed.
   */
  private async post<T>(
    request: AgentRequest,
    stream: boolean,
    consume: (response: Response, signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const timeout = startTimeout(this.timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          temperature: this.config.temperature ?? 0.2,
          stream,
          messages: [
            { role: "system", content: request.systemPrompt },
            { role: "user", content: request.prompt },
          ],
        }),
        signal: timeout.signal,
      });

      if (!response.ok) {
        const errorText = await untilAborted(
          response.text().catch(() => response.statusText),
          timeout.signal
        );
        throw new Error(`[${this.config.name}] API error ${response.status}: ${errorText}`);
      }
      return await consume(response, timeout.signal);
    } catch (error) {
      if (timeout.timedOut) {
        throw new Error(`[${this.config.name}] Request timed out after ${this.timeoutMs}ms`, {
          cause: error,
        });
      }
      throw error;
    } finally {
      timeout.clear();
    }
  }
}

/**
 * Splits a server-sent event stream into the data payloads of its events.
 * Accepts LF, CRLF and CR line endings; multi-line data is joined with "\n".
 */
export class SseEventBuffer {
  private buffer = "";

  /**
   * Add decoded text and return the payloads of every completed event.
   */
  push(text: string): string[] {
    this.buffer += text;
    // A trailing CR may be the first half of a CRLF split across reads
    const heldCr = this.buffer.endsWith("\r");
    const normalized = (heldCr ? this.buffer.slice(0, -1) : this.buffer).replace(/\r\n?/g, "\n");
    const events = normalized.split("\n\n");
    const rest = events.pop() ?? "";
    this.buffer = heldCr ? rest + "\r" : rest;
    return events.map(dataOf).filter((payload): payload is string => payload !== null);
  }

  /**
   * Return the payload of a final event that was not followed by a blank line.
   */
  flush(): string[] {
    const last = dataOf(this.buffer.replace(/\r\n?/g, "\n"));
    this.buffer = "";
    return last === null ? [] : [last];
  }
}

function dataOf(event: string): string | null {
  const lines = event
    .split("\n")
    .filter((line) => line.startsWith("data:"))
    .map((line) => line.slice(5).replace(/^ /, ""));
  if (lines.length === 0) return null;
  return lines.join("\n").trim();
}
