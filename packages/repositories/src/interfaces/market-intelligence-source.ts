/**
 * Market Intelligence Source Interface
 *
 * Read-only tables behind the market intelligence resolver.
 * Loaded once per process.
 */

import type { ResultAsync } from "neverthrow";

import type { MarketIntelligenceTables } from "@bid-advisor/core";

export type MarketIntelligenceSourceError =
  | { type: "READ_FAILED"; file: string; message: string }
  | { type: "INVALID_DATA"; file: string; message: string };

export interface MarketIntelligenceSource {
  load(): ResultAsync<MarketIntelligenceTables, MarketIntelligenceSourceError>;
}
