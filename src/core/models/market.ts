/**
 * Market models - snapshots, search results and trade recommendations.
 *
 * Each type is derived from its zod schema so the same definition serves
 * as the compile-time type and the runtime output contract.
 */

import { z } from "zod";

export const MarketSnapshotSchema = z.object({
  symbol: z.string().min(1),
  price: z.number().finite(),
  previousClose: z.number().finite().nullable(),
  /** Absolute change against the previous close */
  change: z.number().finite().nullable(),
  /** Percentage change against the previous close (2 means +2%) */
  changePercent: z.number().finite().nullable(),
  volume: z.number().nonnegative().nullable(),
  currency: z.string().min(1),
  /** ISO-8601 time of the last trade */
  timestamp: z.string().min(1),
});
export type MarketSnapshot = z.infer<typeof MarketSnapshotSchema>;

export const PriceBarSchema = z.object({
  date: z.string(),
  close: z.number().finite(),
});
export type PriceBar = z.infer<typeof PriceBarSchema>;

export const SearchResultSchema = z.object({
  title: z.string(),
  snippet: z.string(),
  url: z.string(),
});
export type SearchResult = z.infer<typeof SearchResultSchema>;

export enum TradeAction {
  BUY = "BUY",
  SELL = "SELL",
  HOLD = "HOLD",
}

export enum Confidence {
  LOW = "LOW",
  MEDIUM = "MEDIUM",
  HIGH = "HIGH",
}

export const MarketAnalysisSchema = z.object({
  symbol: z.string().min(1),
  snapshot: MarketSnapshotSchema,
  headlines: z.array(SearchResultSchema),
  summary: z.string().trim().min(1),
});
export type MarketAnalysis = z.infer<typeof MarketAnalysisSchema>;

export const RecommendationSchema = z.object({
  symbol: z.string().min(1),
  action: z.nativeEnum(TradeAction),
  confidence: z.nativeEnum(Confidence).nullable(),
  rationale: z.array(z.string().min(1)).min(1),
  summary: z.string().trim().min(1),
});
export type Recommendation = z.infer<typeof RecommendationSchema>;

/**
 * Compute change fields from a price and an optional previous close.
 */
export function computeChange(
  price: number,
  previousClose: number | null
): { change: number | null; changePercent: number | null } {
  if (previousClose === null || previousClose === 0) {
    return { change: null, changePercent: null };
  }
  const change = price - previousClose;
  return { change, changePercent: (change / previousClose) * 100 };
}
