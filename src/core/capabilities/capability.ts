/**
 * Capability - external calls a stage may be bound to.
 *
 * Capabilities are polymorphic over `kind`. A stage declares which kinds it
 * needs; `bindCapabilities` resolves them from the available set once, when
 * the pipeline is assembled.
 */

import { MarketSnapshot, PriceBar, SearchResult } from "../models/market";
import {
  CapabilityUnavailableError,
  PipelineConfigurationError,
  isPipelineError,
} from "../errors/pipeline-errors";

export interface MarketDataCapability {
  kind: "market_data";
  name: string;
  description: string;
  lookup(symbol: string): Promise<MarketSnapshot>;
}

export interface WebSearchCapability {
  kind: "web_search";
  name: string;
  description: string;
  search(query: string): Promise<SearchResult[]>;
}

export type Capability = MarketDataCapability | WebSearchCapability;

export type CapabilityKind = Capability["kind"];

export const CAPABILITY_KINDS: readonly CapabilityKind[] = ["market_data", "web_search"];

/**
 * Optional extension for market data sources that can serve price history.
 */
export interface PriceHistorySource {
  history(symbol: string, range: string): Promise<PriceBar[]>;
}

type CapabilityOf<K extends CapabilityKind> = Extract<Capability, { kind: K }>;

/**
 * Find the first capability of a kind.
 */
export function findCapability<K extends CapabilityKind>(
  capabilities: readonly Capability[],
  kind: K
): CapabilityOf<K> | undefined {
  for (const capability of capabilities) {
    if (isKind(capability, kind)) {
      return capability;
    }
  }
  return undefined;
}

/**
 * Resolve one capability per required kind from the available set.
 *
 * @throws PipelineConfigurationError if a required kind has no provider
 */
export function bindCapabilities(
  stageName: string,
  required: readonly CapabilityKind[],
  available: readonly Capability[]
): Capability[] {
  const bound: Capability[] = [];
  for (const kind of required) {
    const capability = findCapability(available, kind);
    if (!capability) {
      throw new PipelineConfigurationError(
        `Stage "${stageName}" requires a ${kind} capability but none is registered`
      );
    }
    bound.push(capability);
  }
  return bound;
}

/**
 * Run a capability call, converting any failure into CapabilityUnavailableError.
 */
export async function invokeCapability<T>(
  name: string,
  call: () => Promise<T>
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (isPipelineError(error)) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new CapabilityUnavailableError(name, reason, { cause: error });
  }
}

function isKind<K extends CapabilityKind>(
  capability: Capability,
  kind: K
): capability is CapabilityOf<K> {
  return capability.kind === kind;
}
