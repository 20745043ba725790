/**
 * RunStore - history of pipeline runs.
 *
 * Records are summaries; stage outputs are not persisted.
 */

import { RunStatus } from "../models/stage";
import { TradeAction } from "../models/market";
import { PipelineErrorCode } from "../errors/pipeline-errors";

export interface RunRecord {
  runId: string;
  symbol: string;
  market: string;
  status: RunStatus;
  /** Failing or cancelled stage */
  stage: string | null;
  errorCode: PipelineErrorCode | null;
  errorMessage: string | null;
  action: TradeAction | null;
  /** ISO-8601 */
  startedAt: string;
  /** ISO-8601 */
  finishedAt: string;
}

export interface RunStore {
  save(record: RunRecord): Promise<void>;
  get(runId: string): Promise<RunRecord | undefined>;
  /** Newest first */
  list(limit?: number): Promise<RunRecord[]>;
  /** Newest first */
  listBySymbol(symbol: string): Promise<RunRecord[]>;
}

export class InMemoryRunStore implements RunStore {
  private runs = new Map<string, RunRecord>();

  async save(record: RunRecord): Promise<void> {
    this.runs.set(record.runId, { ...record });
  }

  async get(runId: string): Promise<RunRecord | undefined> {
    const record = this.runs.get(runId);
    return record ? { ...record } : undefined;
  }

  async list(limit?: number): Promise<RunRecord[]> {
    const sorted = newestFirst(Array.from(this.runs.values()));
    return (limit === undefined ? sorted : sorted.slice(0, limit)).map((r) => ({ ...r }));
  }

  async listBySymbol(symbol: string): Promise<RunRecord[]> {
    return newestFirst(Array.from(this.runs.values()).filter((r) => r.symbol === symbol)).map(
      (r) => ({ ...r })
    );
  }
}

export function newestFirst(records: RunRecord[]): RunRecord[] {
  return [...records].sort((a, b) => b.startedAt.localeCompare(a.startedAt));
}
