/**
 * MarketConfig - exchanges a ticker can be looked up on.
 *
 * Yahoo-style symbols carry the exchange as a suffix (RELIANCE.NS, 0700.HK);
 * US listings have none.
 */

import { InvalidInputError } from "../errors/pipeline-errors";

export interface MarketDefinition {
  id: string;
  displayName: string;
  suffix: string;
  example: string;
}

export const MARKETS: readonly MarketDefinition[] = [
  { id: "US", displayName: "USA (NASDAQ/NYSE)", suffix: "", example: "TSLA" },
  { id: "NSE", displayName: "India (NSE)", suffix: ".NS", example: "RELIANCE" },
  { id: "BSE", displayName: "India (BSE)", suffix: ".BO", example: "TCS" },
  { id: "SSE", displayName: "China (SSE)", suffix: ".SS", example: "600519" },
  { id: "SEHK", displayName: "Hong Kong (SEHK)", suffix: ".HK", example: "0700" },
  { id: "JPX", displayName: "Japan (JPX)", suffix: ".T", example: "7203" },
];

export const DEFAULT_MARKET = "US";

const SYMBOL_REGEX = /^[A-Z0-9^][A-Z0-9.\-=^]{0,19}$/;

export function isValidSymbol(symbol: string): boolean {
  return SYMBOL_REGEX.test(symbol);
}

export function getMarket(id: string): MarketDefinition | undefined {
  const key = id.trim().toUpperCase();
  return MARKETS.find((m) => m.id === key);
}

/**
 * Normalize user input into a market-qualified ticker.
 *
 * @throws InvalidInputError for an unknown market or a malformed symbol
 */
export function normalizeTicker(input: string, marketId: string = DEFAULT_MARKET): string {
  const market = getMarket(marketId);
  if (!market) {
    throw new InvalidInputError(
      marketId,
      `unknown market (expected one of ${MARKETS.map((m) => m.id).join(", ")})`
    );
  }

  const symbol = input.trim().toUpperCase();
  if (symbol.length === 0) {
    throw new InvalidInputError(input, "ticker is empty");
  }

  const qualified = symbol.endsWith(market.suffix) ? symbol : `${symbol}${market.suffix}`;
  if (!isValidSymbol(qualified)) {
    throw new InvalidInputError(input, "ticker contains unsupported characters");
  }
  return qualified;
}
