/**
 * EventBus - publish/subscribe for pipeline run events.
 *
 * Handlers run synchronously in subscription order. A failing handler is
 * logged and never stops delivery to the others.
 */

import { RunPhase, RunStatus } from "../models/stage";

export type PipelineEvent =
  | { type: "run_started"; runId: string; symbol: string; market: string; timestamp: Date }
  | { type: "phase"; runId: string; symbol: string; phase: RunPhase; timestamp: Date }
  | {
      type: "run_finished";
      runId: string;
      symbol: string;
      status: RunStatus;
      durationMs: number;
      timestamp: Date;
    };

export type PipelineEventType = PipelineEvent["type"];

type EventHandler = (event: PipelineEvent) => void | Promise<void>;

export class EventBus {
  private handlers = new Map<number, { types?: ReadonlySet<PipelineEventType>; handler: EventHandler }>();
  private nextKey = 0;

  /**
   * Subscribe to events, optionally filtered by type.
   * @returns Unsubscribe function
   */
  subscribe(handler: EventHandler, types?: PipelineEventType[]): () => void {
    const key = this.nextKey++;
    this.handlers.set(key, { handler, types: types ? new Set(types) : undefined });
    return () => {
      this.handlers.delete(key);
    };
  }

  /**
   * Publish an event to all subscribed handlers
   */
  emit(event: PipelineEvent): void {
    for (const { handler, types } of Array.from(this.handlers.values())) {
      if (types && !types.has(event.type)) continue;
      try {
        const result = handler(event);
        // Handle async handlers
        if (result instanceof Promise) {
          result.catch((err: unknown) => {
            console.error("[EventBus] Async handler error:", err);
          });
        }
      } catch (err) {
        console.error("[EventBus] Handler error:", err);
      }
    }
  }

  get subscriberCount(): number {
    return this.handlers.size;
  }
}
